import type { VirtualTextChunk } from './dataStructures';

/**
 * Display width estimation in terminal columns
 */

const DEFAULT_TAB_SIZE = 8;

/**
 * Number of columns the text occupies once rendered
 * Tabs advance to the next tab stop.
 */
export function displayWidth(text: string, tabSize: number = DEFAULT_TAB_SIZE): number {
	let width = 0;
	for (const ch of text) {
		if (ch === '\t') {
			const stop = tabSize > 0 ? tabSize : DEFAULT_TAB_SIZE;
			width += stop - (width % stop);
			continue;
		}
		width += charWidth(ch);
	}
	return width;
}

/**
 * Sum of the display widths of every chunk's text
 */
export function annotationWidth(chunks: readonly VirtualTextChunk[]): number {
	let total = 0;
	for (const chunk of chunks) {
		total += displayWidth(chunk.text);
	}
	return total;
}

/**
 * Width of a single code point: 0, 1 or 2
 */
export function charWidth(ch: string): number {
	const codePoint = ch.codePointAt(0);
	if (codePoint === undefined) {
		return 0;
	}

	// C0/C1 control characters
	if (codePoint <= 0x1f || (codePoint >= 0x7f && codePoint <= 0x9f)) {
		return 0;
	}

	if (isZeroWidth(codePoint) || /\p{Mark}/u.test(ch)) {
		return 0;
	}

	return isWide(codePoint) ? 2 : 1;
}

function isZeroWidth(codePoint: number): boolean {
	return (
		codePoint === 0x200b || // zero width space
		codePoint === 0x200c ||
		codePoint === 0x200d || // zero width joiner
		codePoint === 0x2060 ||
		codePoint === 0xfeff ||
		(codePoint >= 0xfe00 && codePoint <= 0xfe0f) || // variation selectors
		(codePoint >= 0xe0100 && codePoint <= 0xe01ef)
	);
}

// East Asian Wide/Fullwidth ranges and the common emoji blocks
function isWide(codePoint: number): boolean {
	if (codePoint < 0x1100) {
		return false;
	}
	return (
		codePoint <= 0x115f ||
		codePoint === 0x2329 ||
		codePoint === 0x232a ||
		(codePoint >= 0x2e80 && codePoint <= 0xa4cf && codePoint !== 0x303f) ||
		(codePoint >= 0xac00 && codePoint <= 0xd7a3) ||
		(codePoint >= 0xf900 && codePoint <= 0xfaff) ||
		(codePoint >= 0xfe10 && codePoint <= 0xfe19) ||
		(codePoint >= 0xfe30 && codePoint <= 0xfe6f) ||
		(codePoint >= 0xff00 && codePoint <= 0xff60) ||
		(codePoint >= 0xffe0 && codePoint <= 0xffe6) ||
		(codePoint >= 0x1f300 && codePoint <= 0x1f64f) ||
		(codePoint >= 0x1f900 && codePoint <= 0x1f9ff) ||
		(codePoint >= 0x20000 && codePoint <= 0x3fffd)
	);
}
