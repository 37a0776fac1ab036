import type { Span, TextBuffer } from '../dataStructures';

/**
 * Pseudocode block used across the suites
 */
export const DO_X_BLOCK = [
    '/*',
    ' * Function doX(a, b)',
    ' * Input a and b',
    ' * Output does x',
    ' * a <- 1',
    ' * if b = 0 then',
    ' *   doSomething(a, b)',
    ' * return a * b',
    ' */'
].join('\n');

/**
 * Render spans as [category, covered text] pairs
 */
export function describeSpans(text: string, spans: readonly Span[]): Array<[string, string]> {
    return spans.map(span => [span.category, text.slice(span.start, span.end)]);
}

export function textsOf(text: string, spans: readonly Span[], category: Span['category']): string[] {
    return spans
        .filter(span => span.category === category)
        .map(span => text.slice(span.start, span.end));
}

/**
 * A buffer whose content can be replaced between rescans
 */
export class EditableBuffer implements TextBuffer {
    constructor(public text: string) {}

    get length(): number {
        return this.text.length;
    }

    substring(start: number, end: number): string {
        return this.text.substring(start, end);
    }
}
