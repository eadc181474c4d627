/**
 * Data structures shared by the annotation engine and the host bindings
 *
 * The engine never talks to an editor directly: everything it needs from the
 * host (lines, viewport geometry, overlays, notifications) goes through the
 * interfaces declared here.
 */

/** Opaque identifier of a text buffer (a document URI in VS Code) */
export type BufferId = string;

/** Opaque identifier of a window showing a buffer */
export type WindowId = string;

/**
 * Snapshot of what a window shows right now
 * All line numbers are 0-based. Never cached across renders.
 */
export interface Viewport {
	readonly windowId: WindowId;
	readonly bufferId: BufferId;
	readonly firstLine: number;
	readonly lastLine: number;
	/** Window width in display columns */
	readonly width: number;
	readonly cursorLine: number;
	/** Tab stop width used by the window, when the host knows it */
	readonly tabSize?: number;
}

/**
 * One piece of overlay text with its style tag
 */
export interface VirtualTextChunk {
	readonly text: string;
	readonly style: string;
}

/**
 * The relative number shown at the end of a line
 */
export interface Annotation {
	readonly line: number;
	readonly text: string;
	readonly style: string;
}

/**
 * An overlay as the host stores it, whichever namespace owns it
 */
export interface OverlayMark {
	readonly namespace: string;
	readonly id: number;
	readonly line: number;
	readonly chunks: readonly VirtualTextChunk[];
}

/**
 * What a formatter may hand back: bare text, or text with a style tag
 */
export type FormatResult = string | VirtualTextChunk | readonly [string, string];

/**
 * Maps a signed relative offset (line - cursorLine) to display text
 */
export type NumberFormatter = (relativeOffset: number) => FormatResult;

/**
 * Formatter output after normalization
 */
export type FormattedNumber =
	| { readonly kind: 'text-only'; readonly text: string }
	| { readonly kind: 'styled'; readonly text: string; readonly style: string };

export type ViewportChangeKind = 'viewport-entered' | 'cursor-moved' | 'viewport-scrolled';

/**
 * Notification delivered by the host when a window's view changes
 */
export interface ViewportChangeEvent {
	readonly kind: ViewportChangeKind;
	readonly bufferId: BufferId;
	readonly windowId: WindowId;
}

export interface Disposable {
	dispose(): void;
}

/**
 * Read access to buffers and windows, plus change notifications
 */
export interface EditorHost {
	/** Text of a 0-based line, undefined when the line does not exist */
	getLine(buffer: BufferId, index: number): string | undefined;
	lineCount(buffer: BufferId): number;
	/** Undefined for a closed or unknown window */
	viewport(window: WindowId): Viewport | undefined;
	currentWindow(): WindowId | undefined;
	filetype(buffer: BufferId): string;
	onViewportChange(handler: (event: ViewportChangeEvent) => void): Disposable;
}

/**
 * Host overlay primitive, addressed by namespace + stable identifier
 *
 * query() returns marks from every namespace, not only ours, so other
 * sources sharing a row count toward overflow checks.
 */
export interface OverlayPrimitive {
	set(buffer: BufferId, namespace: string, id: number, line: number, chunks: readonly VirtualTextChunk[]): void;
	/** Removes this namespace's marks on lines [fromLine, toLineExclusive) */
	clear(buffer: BufferId, namespace: string, fromLine: number, toLineExclusive: number): void;
	/** Marks on lines [fromLine, toLineInclusive] from all namespaces */
	query(buffer: BufferId, fromLine: number, toLineInclusive: number): OverlayMark[];
	/** Run a group of mutations as one change, for hosts that redraw on change */
	batch?<T>(mutations: () => T): T;
}
