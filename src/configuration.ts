import type { NumberFormatter } from './dataStructures';
import { DEFAULT_STYLE, absoluteFormat, signedFormat } from './annotationFormatter';

/**
 * Utility functions for handling extension configuration
 */

/**
 * Configuration structure for the annotation engine
 * Frozen once built; setup produces a new value.
 */
export interface Configuration {
    /** Filetype patterns (anchored regular expressions) that are never rendered */
    readonly ignoredFiletypes: readonly string[];
    /** Extra columns to leave empty at the end of a line */
    readonly spaceReserve: number;
    readonly showOnBlankLines: boolean;
    readonly showOnCursorLine: boolean;
    /** Lines this close to the cursor (inclusive) get no number */
    readonly minLineDistance: number;
    /** Tab stop used when measuring line text */
    readonly tabSize: number;
    readonly format: NumberFormatter;
}

export type ConfigurationOptions = Partial<Configuration>;

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Configuration = Object.freeze({
    ignoredFiletypes: Object.freeze([]),
    spaceReserve: 0,
    showOnBlankLines: false,
    showOnCursorLine: true,
    minLineDistance: 1,
    tabSize: 8,
    format: absoluteFormat
});

const NUMERIC_KEYS = ['spaceReserve', 'minLineDistance', 'tabSize'] as const;
const BOOLEAN_KEYS = ['showOnBlankLines', 'showOnCursorLine'] as const;

/**
 * Merge options over a base configuration
 * Options that are undefined keep the base value; invalid ones are reported
 * and ignored.
 */
export function mergeConfig(base: Configuration, options?: ConfigurationOptions): Configuration {
    if (!options) {
        return base;
    }

    let ignoredFiletypes = base.ignoredFiletypes;
    if (options.ignoredFiletypes !== undefined) {
        if (Array.isArray(options.ignoredFiletypes) && options.ignoredFiletypes.every(p => typeof p === 'string')) {
            ignoredFiletypes = Object.freeze([...options.ignoredFiletypes]);
        } else {
            console.warn('Ignoring invalid ignoredFiletypes option: expected a list of strings');
        }
    }

    const numbers = {
        spaceReserve: base.spaceReserve,
        minLineDistance: base.minLineDistance,
        tabSize: base.tabSize
    };
    for (const key of NUMERIC_KEYS) {
        const value = options[key];
        if (value === undefined) {
            continue;
        }
        if (Number.isInteger(value) && value >= 0) {
            numbers[key] = value;
        } else {
            console.warn(`Ignoring invalid ${key} option ${String(value)}: expected a non-negative integer`);
        }
    }

    const flags = {
        showOnBlankLines: base.showOnBlankLines,
        showOnCursorLine: base.showOnCursorLine
    };
    for (const key of BOOLEAN_KEYS) {
        const value = options[key];
        if (value === undefined) {
            continue;
        }
        if (typeof value === 'boolean') {
            flags[key] = value;
        } else {
            console.warn(`Ignoring invalid ${key} option: expected a boolean`);
        }
    }

    let format = base.format;
    if (options.format !== undefined) {
        if (typeof options.format === 'function') {
            format = options.format;
        } else {
            console.warn('Ignoring invalid format option: expected a function');
        }
    }

    return Object.freeze({
        ignoredFiletypes,
        ...numbers,
        ...flags,
        format
    });
}

/**
 * Compile filetype patterns, anchored at both ends
 * A pattern that is not a valid regular expression matches literally.
 */
export function compileFiletypePatterns(patterns: readonly string[]): RegExp[] {
    return patterns.map(pattern => {
        try {
            return new RegExp(`^(?:${pattern})$`);
        } catch (error) {
            console.warn(`Filetype pattern '${pattern}' is not a valid expression, matching it literally:`, error);
            return new RegExp(`^${escapeRegExp(pattern)}$`);
        }
    });
}

/**
 * Check if a filetype matches any of the ignore patterns
 */
export function isIgnoredFiletype(filetype: string, patterns: readonly RegExp[]): boolean {
    return patterns.some(pattern => pattern.test(filetype));
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Minimal view of a settings section (vscode.WorkspaceConfiguration fits)
 */
export interface SettingsReader {
    get<T>(key: string): T | undefined;
}

export type NumberStyle = 'absolute' | 'signed';

/**
 * Read engine options from editor settings
 * Settings cannot carry a function, so the formatter is picked from
 * `numberStyle` and tagged with `highlight`.
 */
export function optionsFromSettings(settings: SettingsReader): ConfigurationOptions {
    const options: { -readonly [K in keyof Configuration]?: Configuration[K] } = {
        ignoredFiletypes: settings.get<string[]>('ignoredFiletypes'),
        spaceReserve: settings.get<number>('spaceReserve'),
        showOnBlankLines: settings.get<boolean>('showOnBlankLines'),
        showOnCursorLine: settings.get<boolean>('showOnCursorLine'),
        minLineDistance: settings.get<number>('minLineDistance')
    };

    const numberStyle = settings.get<NumberStyle>('numberStyle');
    const highlight = settings.get<string>('highlight');
    if (numberStyle !== undefined || highlight !== undefined) {
        const base = numberStyle === 'signed' ? signedFormat : absoluteFormat;
        const style = highlight && highlight.trim() ? highlight.trim() : DEFAULT_STYLE;
        options.format = (relativeOffset: number) => {
            const formatted = base(relativeOffset);
            const text = typeof formatted === 'string' ? formatted : 'text' in formatted ? formatted.text : formatted[0];
            return { text, style };
        };
    }

    return options;
}
