import * as vscode from 'vscode';
import type { BufferId, Disposable, EditorHost, Viewport, ViewportChangeEvent, WindowId } from './dataStructures';
import { DEFAULT_STYLE } from './annotationFormatter';
import type { InMemoryOverlayPrimitive } from './overlayStore';

/**
 * EditorHost implementation on top of the VS Code extension API
 *
 * Buffers are document URIs, windows are visible text editors. VS Code
 * decorations cannot be read back, so overlays live in an in-memory
 * primitive and are flushed into a decoration type whenever they change.
 */

const CONFIG_SECTION = 'relativeLineAnnotations';
const FALLBACK_COLUMNS = 80;

export class VsCodeEditorHost implements EditorHost, Disposable {
	private readonly decorationType: vscode.TextEditorDecorationType;
	private readonly disposables: vscode.Disposable[] = [];

	constructor(
		private readonly primitive: InMemoryOverlayPrimitive,
		private readonly namespace: string
	) {
		this.decorationType = vscode.window.createTextEditorDecorationType({
			after: { margin: '0 0 0 1em' },
			rangeBehavior: vscode.DecorationRangeBehavior.ClosedClosed
		});

		const flush = this.primitive.onDidChange(buffer => this.flush(buffer));
		this.disposables.push({ dispose: () => flush.dispose() });

		// Forget overlays of closed documents
		this.disposables.push(vscode.workspace.onDidCloseTextDocument(document => {
			this.primitive.dropBuffer(document.uri.toString());
		}));

		console.log('Initialized relative line decoration type');
	}

	public getLine(buffer: BufferId, index: number): string | undefined {
		const document = this.findDocument(buffer);
		if (!document || index < 0 || index >= document.lineCount) {
			return undefined;
		}
		return document.lineAt(index).text;
	}

	public lineCount(buffer: BufferId): number {
		return this.findDocument(buffer)?.lineCount ?? 0;
	}

	public viewport(window: WindowId): Viewport | undefined {
		const editor = this.findEditor(window);
		if (!editor || editor.visibleRanges.length === 0) {
			return undefined;
		}
		const ranges = editor.visibleRanges;
		// 'auto' only before the editor has resolved it
		const tabSize = editor.options.tabSize;
		return {
			windowId: window,
			bufferId: editor.document.uri.toString(),
			firstLine: ranges[0].start.line,
			lastLine: ranges[ranges.length - 1].end.line,
			width: this.windowColumns(editor),
			cursorLine: editor.selection.active.line,
			tabSize: typeof tabSize === 'number' ? tabSize : undefined
		};
	}

	public currentWindow(): WindowId | undefined {
		const editor = vscode.window.activeTextEditor;
		return editor ? windowIdOf(editor) : undefined;
	}

	public filetype(buffer: BufferId): string {
		return this.findDocument(buffer)?.languageId ?? '';
	}

	public onViewportChange(handler: (event: ViewportChangeEvent) => void): Disposable {
		const emit = (kind: ViewportChangeEvent['kind'], editor: vscode.TextEditor) => {
			handler({ kind, bufferId: editor.document.uri.toString(), windowId: windowIdOf(editor) });
		};

		const subscriptions = [
			vscode.window.onDidChangeActiveTextEditor(editor => {
				if (editor) {
					emit('viewport-entered', editor);
				}
			}),
			vscode.window.onDidChangeTextEditorSelection(event => emit('cursor-moved', event.textEditor)),
			vscode.window.onDidChangeTextEditorVisibleRanges(event => emit('viewport-scrolled', event.textEditor))
		];

		return {
			dispose: () => subscriptions.forEach(subscription => subscription.dispose())
		};
	}

	public dispose(): void {
		this.disposables.forEach(disposable => disposable.dispose());
		this.decorationType.dispose();
	}

	/**
	 * Push this namespace's overlays of a buffer into every editor showing it
	 */
	private flush(buffer: BufferId): void {
		const marks = this.primitive
			.query(buffer, 0, Number.POSITIVE_INFINITY)
			.filter(mark => mark.namespace === this.namespace);

		for (const editor of vscode.window.visibleTextEditors) {
			const document = editor.document;
			if (document.uri.toString() !== buffer) {
				continue;
			}

			const decorations: vscode.DecorationOptions[] = [];
			for (const mark of marks) {
				if (mark.line >= document.lineCount) {
					continue;
				}
				const end = document.lineAt(mark.line).range.end;
				for (const chunk of mark.chunks) {
					decorations.push({
						range: new vscode.Range(end, end),
						renderOptions: {
							after: { contentText: chunk.text, color: colorForStyle(chunk.style) }
						}
					});
				}
			}
			editor.setDecorations(this.decorationType, decorations);
		}
	}

	private windowColumns(editor: vscode.TextEditor): number {
		const columns = vscode.workspace.getConfiguration(CONFIG_SECTION).get<number>('viewportColumns') ?? 0;
		if (columns > 0) {
			return columns;
		}
		const wrapColumn = vscode.workspace
			.getConfiguration('editor', editor.document.uri)
			.get<number>('wordWrapColumn');
		return wrapColumn && wrapColumn > 0 ? wrapColumn : FALLBACK_COLUMNS;
	}

	private findEditor(window: WindowId): vscode.TextEditor | undefined {
		return vscode.window.visibleTextEditors.find(editor => windowIdOf(editor) === window);
	}

	private findDocument(buffer: BufferId): vscode.TextDocument | undefined {
		return vscode.workspace.textDocuments.find(document => document.uri.toString() === buffer);
	}
}

/**
 * Editors have no stable id; column + document identifies one on screen
 */
export function windowIdOf(editor: vscode.TextEditor): WindowId {
	return `${editor.viewColumn ?? 0}|${editor.document.uri.toString()}`;
}

/**
 * Style tags are theme color ids or literal CSS colors
 */
function colorForStyle(style: string): string | vscode.ThemeColor {
	if (style === DEFAULT_STYLE || style === '') {
		return new vscode.ThemeColor('editorLineNumber.foreground');
	}
	if (style.startsWith('#') || style.startsWith('rgb')) {
		return style;
	}
	return new vscode.ThemeColor(style);
}
