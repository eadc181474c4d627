import * as assert from 'assert';
import {
    absoluteFormat,
    classifyFormatResult,
    DEFAULT_STYLE,
    FormatterError,
    normalizeFormatResult,
    signedFormat
} from '../annotationFormatter';

suite('Annotation Formatter Tests', () => {

    suite('built-in formatters', () => {
        test('absoluteFormat should drop the sign', () => {
            assert.deepStrictEqual(absoluteFormat(-3), { text: '3', style: 'LineNr' });
            assert.deepStrictEqual(absoluteFormat(12), { text: '12', style: 'LineNr' });
        });

        test('signedFormat should prefix lines below the cursor with +', () => {
            assert.deepStrictEqual(signedFormat(2), { text: '+2', style: DEFAULT_STYLE });
            assert.deepStrictEqual(signedFormat(-2), { text: '-2', style: DEFAULT_STYLE });
            assert.deepStrictEqual(signedFormat(0), { text: '0', style: DEFAULT_STYLE });
        });
    });

    suite('classifyFormatResult', () => {
        test('should tag bare text as text-only', () => {
            assert.deepStrictEqual(classifyFormatResult('7', 7), { kind: 'text-only', text: '7' });
        });

        test('should tag pairs and objects as styled', () => {
            assert.deepStrictEqual(classifyFormatResult(['7', 'Comment'], 7), { kind: 'styled', text: '7', style: 'Comment' });
            assert.deepStrictEqual(
                classifyFormatResult({ text: '7', style: 'Comment' }, 7),
                { kind: 'styled', text: '7', style: 'Comment' }
            );
        });
    });

    suite('normalizeFormatResult', () => {
        test('should apply the default style to bare text', () => {
            assert.deepStrictEqual(normalizeFormatResult('4', -4), { text: '4', style: 'LineNr' });
        });

        test('should keep the style of styled output', () => {
            assert.deepStrictEqual(normalizeFormatResult(['4', 'Special'], 4), { text: '4', style: 'Special' });
        });

        test('should reject malformed output with the offending offset', () => {
            const malformed: unknown[] = [undefined, null, 42, ['only-text'], ['a', 1], { text: 'a' }, { text: 1, style: 'x' }];
            for (const value of malformed) {
                assert.throws(
                    () => normalizeFormatResult(value, -5),
                    (error: unknown) => error instanceof FormatterError && error.relativeOffset === -5,
                    `value ${JSON.stringify(value)}`
                );
            }
        });

        test('should name the offset in the error message', () => {
            assert.throws(() => normalizeFormatResult(42, 3), /offset 3: 42/);
        });
    });
});
