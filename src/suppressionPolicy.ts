import type { Configuration } from './configuration';

/**
 * Decides whether a line gets a relative number on this render
 */

export type SuppressionConfig = Pick<
	Configuration,
	'showOnCursorLine' | 'minLineDistance' | 'showOnBlankLines' | 'spaceReserve'
>;

/**
 * Everything the policy looks at for one line
 */
export interface LineState {
	line: number;
	cursorLine: number;
	isBlank: boolean;
	viewportWidth: number;
	/** Display width of the buffer text on the line */
	lineTextWidth: number;
	/** Display width of overlays already on the row, from any source */
	otherOverlayWidth: number;
}

export type SuppressionReason = 'cursor-line' | 'min-distance' | 'blank' | 'overflow';

/**
 * First rule that hides the line, or undefined when it is shown
 * Rules are independent; the order only picks which reason is reported.
 */
export function suppressionReason(state: LineState, config: SuppressionConfig): SuppressionReason | undefined {
	const distance = state.line - state.cursorLine;

	if (distance === 0 && !config.showOnCursorLine) {
		return 'cursor-line';
	}
	if (Math.abs(distance) <= config.minLineDistance) {
		return 'min-distance';
	}
	if (state.isBlank && !config.showOnBlankLines) {
		return 'blank';
	}
	// Annotation would reach the window edge or run into other overlays
	if (state.lineTextWidth + state.otherOverlayWidth + config.spaceReserve >= state.viewportWidth) {
		return 'overflow';
	}
	return undefined;
}

export function shouldSuppress(state: LineState, config: SuppressionConfig): boolean {
	return suppressionReason(state, config) !== undefined;
}

/**
 * Empty or whitespace-only
 */
export function isBlankLine(text: string): boolean {
	return /^\s*$/.test(text);
}
