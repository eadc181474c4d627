import type { BufferId, EditorHost, WindowId } from './dataStructures';
import type { Configuration } from './configuration';
import type { OverlayStore } from './overlayStore';
import { normalizeFormatResult } from './annotationFormatter';
import { isBlankLine, shouldSuppress } from './suppressionPolicy';
import { displayWidth } from './widthEstimator';

/**
 * Summary of one render pass
 */
export interface RenderResult {
	firstLine: number;
	lastLine: number;
	rendered: number;
	suppressed: number;
}

/**
 * Draws relative numbers for the visible range of a window
 */
export class RenderEngine {
	constructor(
		private readonly host: EditorHost,
		private readonly store: OverlayStore
	) {}

	/**
	 * Re-render every visible line of the window showing `buffer`
	 *
	 * Returns undefined when the window is gone, shows another buffer, or
	 * nothing is visible. A formatter error propagates; lines written before
	 * it stay in place.
	 */
	public render(buffer: BufferId, window: WindowId, config: Configuration): RenderResult | undefined {
		const viewport = this.host.viewport(window);
		if (!viewport || viewport.bufferId !== buffer) {
			return undefined;
		}

		const lastBufferLine = this.host.lineCount(buffer) - 1;
		const firstLine = Math.max(0, viewport.firstLine);
		const lastLine = Math.min(lastBufferLine, viewport.lastLine);
		if (lastLine < firstLine) {
			return undefined;
		}

		// Drop stale numbers before deciding anything, so the overflow check
		// only sees overlays from other sources
		this.store.clearRange(buffer, firstLine, lastLine);
		// Numbers left over from an earlier, different range
		this.store.clearRange(buffer, 0, firstLine - 1);
		this.store.clearRange(buffer, lastLine + 1, Number.POSITIVE_INFINITY);

		const tabSize = viewport.tabSize ?? config.tabSize;
		const result: RenderResult = { firstLine, lastLine, rendered: 0, suppressed: 0 };
		for (let line = firstLine; line <= lastLine; line++) {
			const text = this.host.getLine(buffer, line) ?? '';
			const suppressed = shouldSuppress(
				{
					line,
					cursorLine: viewport.cursorLine,
					isBlank: isBlankLine(text),
					viewportWidth: viewport.width,
					lineTextWidth: displayWidth(text, tabSize),
					otherOverlayWidth: this.store.totalWidthAt(buffer, line)
				},
				config
			);
			if (suppressed) {
				result.suppressed++;
				continue;
			}

			const relativeOffset = line - viewport.cursorLine;
			const chunk = normalizeFormatResult(config.format(relativeOffset), relativeOffset);
			this.store.setAnnotation(buffer, line, chunk.text, chunk.style);
			result.rendered++;
		}

		return result;
	}
}
