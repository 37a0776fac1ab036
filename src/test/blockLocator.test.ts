import * as assert from 'assert';
import { locateBlock, locateBlocks } from '../blockLocator';
import { createPatternLibrary } from '../patternLibrary';
import { DO_X_BLOCK } from './testHelpers';

suite('Block Locator Tests', () => {
    const patterns = createPatternLibrary();

    test('should locate a decorated pseudocode comment', () => {
        const text = `int main() {}\n${DO_X_BLOCK}\nint y;`;
        const start = text.indexOf('/*');

        const block = locateBlock(text, 0, patterns);

        assert.deepStrictEqual(block, { start, end: start + DO_X_BLOCK.length });
    });

    test('should skip comments that do not open with a Function header', () => {
        const text = '/* plain comment */\n/* Function f() */';

        const block = locateBlock(text, 0, patterns);

        assert.deepStrictEqual(block, { start: 20, end: text.length });
    });

    test('should accept doc comment openers', () => {
        const text = '/**\n * Function g(n)\n */';

        const block = locateBlock(text, 0, patterns);

        assert.deepStrictEqual(block, { start: 0, end: text.length });
    });

    test('should stop at the first comment terminator', () => {
        const text = '/* Function f() */ x = 1; /* trailing */';

        const block = locateBlock(text, 0, patterns);

        assert.deepStrictEqual(block, { start: 0, end: 18 });
    });

    test('should return undefined for an unterminated comment', () => {
        const text = '/* Function f(a)\n * x <- 1\n';

        assert.strictEqual(locateBlock(text, 0, patterns), undefined);
    });

    test('should return undefined when the header has no parameter list', () => {
        const text = '/* Function f\n * x <- 1\n */';

        assert.strictEqual(locateBlock(text, 0, patterns), undefined);
    });

    test('should only find blocks starting at or after the search start', () => {
        const text = '/* Function a() */\n/* Function b(x) */';

        const block = locateBlock(text, 1, patterns);

        assert.deepStrictEqual(block, { start: 19, end: text.length });
    });

    test('should return undefined when the search start is past the end', () => {
        assert.strictEqual(locateBlock('/* Function a() */', 18, patterns), undefined);
    });

    test('should locate every block in order', () => {
        const text = '/* Function a() */\ncode();\n/* Function b(x) */';

        const blocks = locateBlocks(text, patterns);

        assert.deepStrictEqual(blocks, [
            { start: 0, end: 18 },
            { start: 27, end: text.length }
        ]);
    });
});
