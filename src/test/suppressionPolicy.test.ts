import * as assert from 'assert';
import { isBlankLine, type LineState, shouldSuppress, type SuppressionConfig, suppressionReason } from '../suppressionPolicy';

suite('Suppression Policy Tests', () => {
    const config: SuppressionConfig = {
        showOnCursorLine: true,
        minLineDistance: 1,
        showOnBlankLines: false,
        spaceReserve: 0
    };

    // A non-blank short line five lines below the cursor in an 80-column window
    function state(overrides: Partial<LineState> = {}): LineState {
        return {
            line: 15,
            cursorLine: 10,
            isBlank: false,
            viewportWidth: 80,
            lineTextWidth: 20,
            otherOverlayWidth: 0,
            ...overrides
        };
    }

    test('should show a short line far from the cursor', () => {
        assert.strictEqual(shouldSuppress(state(), config), false);
        assert.strictEqual(suppressionReason(state(), config), undefined);
    });

    suite('cursor line', () => {
        test('should hide the cursor line when showOnCursorLine is false', () => {
            const result = suppressionReason(
                state({ line: 10 }),
                { ...config, showOnCursorLine: false, minLineDistance: 0 }
            );
            assert.strictEqual(result, 'cursor-line');
        });

        test('should still hide the cursor line through the distance rule when minLineDistance is 0', () => {
            assert.strictEqual(suppressionReason(state({ line: 10 }), { ...config, minLineDistance: 0 }), 'min-distance');
            assert.strictEqual(shouldSuppress(state({ line: 11 }), { ...config, minLineDistance: 0 }), false);
        });
    });

    suite('minimum line distance', () => {
        test('should hide the cursor line and its neighbours at distance 1', () => {
            for (const line of [9, 10, 11]) {
                assert.strictEqual(suppressionReason(state({ line }), config), 'min-distance', `line ${line}`);
            }
        });

        test('should show lines just beyond the distance', () => {
            assert.strictEqual(shouldSuppress(state({ line: 8 }), config), false);
            assert.strictEqual(shouldSuppress(state({ line: 12 }), config), false);
        });

        test('should apply regardless of showOnCursorLine', () => {
            const showAll = { ...config, showOnCursorLine: true, showOnBlankLines: true, minLineDistance: 3 };
            assert.strictEqual(suppressionReason(state({ line: 13 }), showAll), 'min-distance');
        });
    });

    suite('blank lines', () => {
        test('should hide blank lines by default', () => {
            assert.strictEqual(suppressionReason(state({ isBlank: true }), config), 'blank');
        });

        test('should show blank lines when showOnBlankLines is true', () => {
            assert.strictEqual(shouldSuppress(state({ isBlank: true }), { ...config, showOnBlankLines: true }), false);
        });
    });

    suite('overflow', () => {
        test('should hide the line when text reaches the window edge', () => {
            assert.strictEqual(suppressionReason(state({ lineTextWidth: 80 }), config), 'overflow');
            assert.strictEqual(shouldSuppress(state({ lineTextWidth: 79 }), config), false);
        });

        test('should count other overlays and the space reserve', () => {
            // 70 + 6 + 4 = 80 >= 80
            const result = suppressionReason(
                state({ lineTextWidth: 70, otherOverlayWidth: 6 }),
                { ...config, spaceReserve: 4 }
            );
            assert.strictEqual(result, 'overflow');
            // 70 + 6 + 3 = 79 < 80
            assert.strictEqual(
                shouldSuppress(state({ lineTextWidth: 70, otherOverlayWidth: 6 }), { ...config, spaceReserve: 3 }),
                false
            );
        });

        test('should hide overflowing lines whatever the flags', () => {
            const permissive = { showOnCursorLine: true, showOnBlankLines: true, minLineDistance: 0, spaceReserve: 0 };
            assert.strictEqual(shouldSuppress(state({ lineTextWidth: 100, isBlank: true }), permissive), true);
        });
    });

    suite('isBlankLine', () => {
        test('should treat empty and whitespace-only text as blank', () => {
            assert.strictEqual(isBlankLine(''), true);
            assert.strictEqual(isBlankLine('   \t'), true);
        });

        test('should not treat text as blank', () => {
            assert.strictEqual(isBlankLine('  x '), false);
        });
    });
});
