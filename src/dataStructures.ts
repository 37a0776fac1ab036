/**
 * Data structures shared by the pseudocode highlighting engine
 *
 * Offsets are character offsets into the document text and every range is half-open.
 */

export type Category = 'keyword' | 'function-name' | 'parameter' | 'variable';

export const CATEGORIES: readonly Category[] = ['keyword', 'function-name', 'parameter', 'variable'];

/**
 * A half-open interval [start, end) over document offsets
 */
export interface TextRange {
	start: number;
	end: number;
}

/**
 * A highlighted range tagged with its category
 */
export interface Span extends TextRange {
	category: Category;
}

/**
 * A located pseudocode function comment
 */
export type Block = TextRange;

/**
 * A span installed in the store, marked with the engine that owns it
 */
export interface Annotation extends Span {
	owner: string;
}

/**
 * A lexical rule with a named highlight extractor instead of group indices
 */
export interface Pattern {
	name: string;
	category: Category;
	regex: RegExp;
	highlight(match: RegExpExecArray): TextRange | undefined;
}

/**
 * Read access to the host document
 */
export interface TextBuffer {
	readonly length: number;
	substring(start: number, end: number): string;
}

export interface Disposable {
	dispose(): void;
}

export function createTextBuffer(text: string): TextBuffer {
	return {
		length: text.length,
		substring: (start: number, end: number) => text.substring(start, end)
	};
}

export function intersects(a: TextRange, b: TextRange): boolean {
	return a.start < b.end && b.start < a.end;
}
