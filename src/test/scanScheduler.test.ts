import * as assert from 'assert';
import * as sinon from 'sinon';
import { ScanScheduler, type ScanResult } from '../scanScheduler';
import { AnnotationStore } from '../annotationSystem';
import { createPatternLibrary } from '../patternLibrary';
import { createTextBuffer, type TextBuffer } from '../dataStructures';
import { DO_X_BLOCK, EditableBuffer, describeSpans, textsOf } from './testHelpers';

suite('Scan Scheduler Tests', () => {
    const patterns = createPatternLibrary();

    setup(() => {
        sinon.stub(console, 'log');
    });

    teardown(() => {
        sinon.restore();
    });

    test('should annotate every block of the document', () => {
        const text = `int a;\n${DO_X_BLOCK}\nint b;\n/* Function f(x)\n * y <- x\n */\n`;
        const store = new AnnotationStore();
        const scheduler = new ScanScheduler(createTextBuffer(text), store, { patterns });

        const result = scheduler.rescan();

        assert.strictEqual(result?.blocks.length, 2);
        assert.strictEqual(result?.annotationCount, 15);
        assert.deepStrictEqual(textsOf(text, store.getAnnotations(), 'function-name'), ['doX', 'f']);
        assert.deepStrictEqual(textsOf(text, store.getAnnotations(), 'variable'), ['y']);
    });

    test('should give the same store state when rescanned twice', () => {
        const store = new AnnotationStore();
        const scheduler = new ScanScheduler(createTextBuffer(DO_X_BLOCK), store, { patterns });

        scheduler.rescan();
        const once = store.getAnnotations();
        scheduler.rescan();

        assert.deepStrictEqual(store.getAnnotations(), once);
        assert.strictEqual(store.getAnnotations().length, 10);
    });

    test('should scan from the document start whatever range is requested', () => {
        const text = '/* Function a() */\n\n\n/* Function b() */';
        const store = new AnnotationStore();
        const scheduler = new ScanScheduler(createTextBuffer(text), store, { patterns });

        const result = scheduler.rescan({ start: 30, end: 31 });

        assert.deepStrictEqual(result?.requested, { start: 30, end: 31 });
        assert.deepStrictEqual(textsOf(text, store.getAnnotations(), 'function-name'), ['a', 'b']);
    });

    test('should drop annotations of a block that was deleted', () => {
        const buffer = new EditableBuffer(`${DO_X_BLOCK}\n/* Function f() */`);
        const store = new AnnotationStore();
        const scheduler = new ScanScheduler(buffer, store, { patterns });
        scheduler.rescan();

        buffer.text = '/* Function f() */';
        scheduler.rescan();

        assert.deepStrictEqual(describeSpans(buffer.text, store.getAnnotations()), [
            ['keyword', 'Function'],
            ['function-name', 'f']
        ]);
    });

    test('should move annotations with a block shifted by an edit', () => {
        const buffer = new EditableBuffer('/* Function f() */');
        const store = new AnnotationStore();
        const scheduler = new ScanScheduler(buffer, store, { patterns });
        scheduler.rescan();

        buffer.text = 'int x;\n/* Function f() */';
        scheduler.rescan();

        assert.deepStrictEqual(store.getAnnotations().map(annotation => [annotation.start, annotation.end]), [
            [10, 18],
            [19, 20]
        ]);
    });

    test('should clear everything when the document empties', () => {
        const buffer = new EditableBuffer(DO_X_BLOCK);
        const store = new AnnotationStore();
        const scheduler = new ScanScheduler(buffer, store, { patterns });
        scheduler.rescan();

        buffer.text = '';
        const result = scheduler.rescan();

        assert.strictEqual(store.getAnnotations().length, 0);
        assert.strictEqual(result?.blocks.length, 0);
    });

    test('should annotate the whole text in whole-document mode', () => {
        const text = 'x <- 1\nx <- 2\nif x then return x';
        const store = new AnnotationStore();
        const scheduler = new ScanScheduler(createTextBuffer(text), store, { patterns, mode: 'whole-document' });

        const result = scheduler.rescan();

        assert.deepStrictEqual(result?.blocks, []);
        assert.deepStrictEqual(describeSpans(text, store.getAnnotations()), [
            ['variable', 'x'],
            ['keyword', '<-'],
            ['variable', 'x'],
            ['keyword', '<-'],
            ['keyword', 'if'],
            ['keyword', 'then'],
            ['keyword', 'return']
        ]);
    });

    test('should give identical output with and without the block memo', () => {
        const text = `${DO_X_BLOCK}\n\n${DO_X_BLOCK}\n${DO_X_BLOCK}`;
        const cachedStore = new AnnotationStore();
        const plainStore = new AnnotationStore();

        const cached = new ScanScheduler(createTextBuffer(text), cachedStore, { patterns, cacheSize: 1 });
        const plain = new ScanScheduler(createTextBuffer(text), plainStore, { patterns, cacheSize: 0 });
        cached.rescan();
        cached.rescan();
        plain.rescan();

        assert.deepStrictEqual(cachedStore.getAnnotations(), plainStore.getAnnotations());
        assert.strictEqual(plainStore.getAnnotations().length, 30);
    });

    test('should notify rescan listeners until disposed', () => {
        const scheduler = new ScanScheduler(createTextBuffer(DO_X_BLOCK), new AnnotationStore(), { patterns });
        const listener = sinon.spy();
        const subscription = scheduler.onDidRescan(listener);

        const result = scheduler.rescan();
        subscription.dispose();
        scheduler.rescan();

        assert.strictEqual(listener.callCount, 1);
        assert.strictEqual(listener.firstCall.args[0], result);
    });

    test('should restart from the top when a rescan arrives during a pass', () => {
        const text = DO_X_BLOCK;
        const inner: Array<ScanResult | undefined> = [];
        let scheduler: ScanScheduler | undefined;

        const substring = sinon.spy((start: number, end: number) => {
            if (inner.length === 0) {
                inner.push(scheduler?.rescan({ start: 5, end: 10 }));
            }
            return text.substring(start, end);
        });
        const buffer: TextBuffer = { length: text.length, substring };
        const store = new AnnotationStore();
        scheduler = new ScanScheduler(buffer, store, { patterns });

        const result = scheduler.rescan();

        assert.deepStrictEqual(inner, [undefined]);
        assert.strictEqual(substring.callCount, 2);
        assert.deepStrictEqual(result?.requested, { start: 5, end: 10 });
        assert.strictEqual(store.getAnnotations().length, 10);
    });
});
