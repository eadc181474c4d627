import type { Annotation, BufferId, Disposable, OverlayMark, OverlayPrimitive, VirtualTextChunk } from './dataStructures';
import { annotationWidth } from './widthEstimator';

/**
 * Per-line annotation slots on top of the host overlay primitive
 */

export const DEFAULT_NAMESPACE = 'rel_lines';

/**
 * Stable identifier of the annotation at a 0-based line
 * Using line + 1 keeps ids positive and makes repeated renders overwrite in place.
 */
export function annotationId(line: number): number {
	return line + 1;
}

export class OverlayStore {
	constructor(
		private readonly primitive: OverlayPrimitive,
		public readonly namespace: string = DEFAULT_NAMESPACE
	) {}

	/**
	 * Remove this namespace's annotations on [fromLine, toLineInclusive]
	 */
	public clearRange(buffer: BufferId, fromLine: number, toLineInclusive: number): void {
		if (toLineInclusive < fromLine) {
			return;
		}
		this.primitive.clear(buffer, this.namespace, fromLine, toLineInclusive + 1);
	}

	/**
	 * Set or replace the single annotation at a line
	 */
	public setAnnotation(buffer: BufferId, line: number, text: string, style: string): void {
		this.primitive.set(buffer, this.namespace, annotationId(line), line, [{ text, style }]);
	}

	/**
	 * Apply several changes as one, when the primitive supports batching
	 */
	public batch<T>(mutations: () => T): T {
		return this.primitive.batch ? this.primitive.batch(mutations) : mutations();
	}

	public clearAll(buffer: BufferId): void {
		this.primitive.clear(buffer, this.namespace, 0, Number.POSITIVE_INFINITY);
	}

	/**
	 * Combined display width of every overlay on the line, from any source
	 */
	public totalWidthAt(buffer: BufferId, line: number): number {
		let width = 0;
		for (const mark of this.primitive.query(buffer, line, line)) {
			width += annotationWidth(mark.chunks);
		}
		return width;
	}

	/**
	 * This namespace's annotations, ascending by line
	 */
	public annotationsIn(buffer: BufferId): Annotation[] {
		return this.primitive
			.query(buffer, 0, Number.POSITIVE_INFINITY)
			.filter(mark => mark.namespace === this.namespace)
			.sort((a, b) => a.line - b.line)
			.map(mark => ({
				line: mark.line,
				text: mark.chunks.map(chunk => chunk.text).join(''),
				style: mark.chunks.length > 0 ? mark.chunks[0].style : ''
			}));
	}
}

/**
 * Overlay primitive kept in memory
 *
 * Used directly by hosts whose own decoration API cannot be queried (the
 * VS Code binding flushes it into editor decorations on every change, so
 * renders run inside batch()).
 */
export class InMemoryOverlayPrimitive implements OverlayPrimitive {
	// buffer -> namespace -> id -> mark
	private readonly marks = new Map<BufferId, Map<string, Map<number, OverlayMark>>>();
	private readonly listeners: Array<(buffer: BufferId) => void> = [];
	// Buffers changed inside the running batch, notified when it ends
	private readonly pending = new Set<BufferId>();
	private batchDepth = 0;

	/**
	 * Register a callback run after every mutation of a buffer's marks
	 */
	public onDidChange(listener: (buffer: BufferId) => void): Disposable {
		this.listeners.push(listener);
		return {
			dispose: () => {
				const index = this.listeners.indexOf(listener);
				if (index >= 0) {
					this.listeners.splice(index, 1);
				}
			}
		};
	}

	public set(buffer: BufferId, namespace: string, id: number, line: number, chunks: readonly VirtualTextChunk[]): void {
		this.namespaceMarks(buffer, namespace).set(id, {
			namespace,
			id,
			line,
			chunks: chunks.map(chunk => ({ text: chunk.text, style: chunk.style }))
		});
		this.notify(buffer);
	}

	public clear(buffer: BufferId, namespace: string, fromLine: number, toLineExclusive: number): void {
		const byId = this.marks.get(buffer)?.get(namespace);
		if (!byId) {
			return;
		}
		let removed = 0;
		for (const [id, mark] of byId) {
			if (mark.line >= fromLine && mark.line < toLineExclusive) {
				byId.delete(id);
				removed++;
			}
		}
		if (removed > 0) {
			this.notify(buffer);
		}
	}

	public query(buffer: BufferId, fromLine: number, toLineInclusive: number): OverlayMark[] {
		const result: OverlayMark[] = [];
		const byNamespace = this.marks.get(buffer);
		if (!byNamespace) {
			return result;
		}
		for (const byId of byNamespace.values()) {
			for (const mark of byId.values()) {
				if (mark.line >= fromLine && mark.line <= toLineInclusive) {
					result.push(mark);
				}
			}
		}
		return result;
	}

	/**
	 * Hold change notifications until `mutations` returns, then send one per
	 * changed buffer. Nested batches flush with the outermost one.
	 */
	public batch<T>(mutations: () => T): T {
		this.batchDepth++;
		try {
			return mutations();
		} finally {
			this.batchDepth--;
			if (this.batchDepth === 0) {
				const buffers = [...this.pending];
				this.pending.clear();
				buffers.forEach(buffer => this.notify(buffer));
			}
		}
	}

	/**
	 * Forget every mark of a buffer, e.g. when its document closes
	 */
	public dropBuffer(buffer: BufferId): void {
		if (this.marks.delete(buffer)) {
			this.notify(buffer);
		}
	}

	private namespaceMarks(buffer: BufferId, namespace: string): Map<number, OverlayMark> {
		let byNamespace = this.marks.get(buffer);
		if (!byNamespace) {
			byNamespace = new Map();
			this.marks.set(buffer, byNamespace);
		}
		let byId = byNamespace.get(namespace);
		if (!byId) {
			byId = new Map();
			byNamespace.set(namespace, byId);
		}
		return byId;
	}

	private notify(buffer: BufferId): void {
		if (this.batchDepth > 0) {
			this.pending.add(buffer);
			return;
		}
		for (const listener of [...this.listeners]) {
			listener(buffer);
		}
	}
}
