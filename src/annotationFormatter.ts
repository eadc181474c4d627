import type { FormatResult, FormattedNumber, VirtualTextChunk } from './dataStructures';

/**
 * Formatting of relative numbers and normalization of formatter output
 */

/** Style tag used when a formatter returns bare text */
export const DEFAULT_STYLE = 'LineNr';

/**
 * Raised when a formatter returns something that is neither text nor a
 * (text, style) pair
 */
export class FormatterError extends Error {
	constructor(
		message: string,
		public readonly relativeOffset: number
	) {
		super(message);
		this.name = 'FormatterError';
	}
}

/**
 * Default formatter: distance from the cursor as a plain decimal
 */
export function absoluteFormat(relativeOffset: number): FormatResult {
	return { text: String(Math.abs(relativeOffset)), style: DEFAULT_STYLE };
}

/**
 * Signed variant: "+2" below the cursor, "-2" above it
 */
export function signedFormat(relativeOffset: number): FormatResult {
	const sign = relativeOffset > 0 ? '+' : '';
	return { text: `${sign}${relativeOffset}`, style: DEFAULT_STYLE };
}

/**
 * Tag formatter output as text-only or styled
 * Takes unknown because formatters come from user code.
 */
export function classifyFormatResult(value: unknown, relativeOffset: number): FormattedNumber {
	if (typeof value === 'string') {
		return { kind: 'text-only', text: value };
	}

	if (Array.isArray(value)) {
		const [text, style] = value;
		if (value.length === 2 && typeof text === 'string' && typeof style === 'string') {
			return { kind: 'styled', text, style };
		}
	} else if (typeof value === 'object' && value !== null && 'text' in value && 'style' in value) {
		const { text, style } = value;
		if (typeof text === 'string' && typeof style === 'string') {
			return { kind: 'styled', text, style };
		}
	}

	throw new FormatterError(
		`Formatter returned malformed output for offset ${relativeOffset}: ${describe(value)}`,
		relativeOffset
	);
}

/**
 * Single internal shape written to the overlay store
 */
export function normalizeFormatResult(value: unknown, relativeOffset: number): VirtualTextChunk {
	const formatted = classifyFormatResult(value, relativeOffset);
	switch (formatted.kind) {
		case 'text-only':
			return { text: formatted.text, style: DEFAULT_STYLE };
		case 'styled':
			return { text: formatted.text, style: formatted.style };
	}
}

function describe(value: unknown): string {
	if (value === undefined) {
		return 'undefined';
	}
	try {
		return JSON.stringify(value) ?? typeof value;
	} catch {
		return typeof value;
	}
}
