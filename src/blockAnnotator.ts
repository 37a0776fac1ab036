import type { Block, Pattern, Span, TextRange } from './dataStructures';
import { execAll, IDENTIFIER_PATTERN, type PatternLibrary } from './patternLibrary';

/**
 * Per-block annotation
 *
 * A block is annotated by four sub-scans that always run in this order:
 * keywords, function name, parameters, variable declarations. Every sub-scan
 * starts again at the beginning of the block. Parameters are recorded in the
 * declared set before the variable scan runs, so a parameter that is reassigned
 * in the body is never highlighted as a new variable.
 */

/**
 * Position of the function header inside a block's text
 */
export interface FunctionHeader {
	name: TextRange;
	open: number; // Offset of '('
}

/**
 * States of the parameter list scanner
 */
export type ParameterScanState =
	| { kind: 'before-parameter' }
	| { kind: 'inside-parameter'; start: number; end: number }
	| { kind: 'at-separator'; parameter?: TextRange; closing: boolean };

/**
 * Annotate one located block of `text`
 * Returned spans use document offsets and follow sub-scan order.
 */
export function annotateBlock(text: string, block: Block, patterns: PatternLibrary): Span[] {
	const source = text.slice(block.start, block.end);
	const declared = new Set<string>();
	const spans: Span[] = [];

	spans.push(...scanPattern(source, patterns.keyword));

	const header = findFunctionHeader(source, patterns);
	if (header) {
		spans.push({ ...header.name, category: 'function-name' });

		for (const parameter of scanParameters(source, header.open)) {
			spans.push({ ...parameter, category: 'parameter' });

			// A parameter such as 'int x' declares every identifier it names
			const text = source.slice(parameter.start, parameter.end);
			declared.add(text);
			for (const identifier of execAll(IDENTIFIER_PATTERN, text)) {
				declared.add(identifier[0]);
			}
		}
	}

	spans.push(...scanDeclarations(source, patterns.variableDeclaration, declared));

	return spans.map(span => ({
		start: span.start + block.start,
		end: span.end + block.start,
		category: span.category
	}));
}

/**
 * Annotate a document that is pseudocode as a whole
 * Keywords and declarations only; there is no block location and no declared set.
 */
export function annotateDocument(text: string, patterns: PatternLibrary): Span[] {
	return [
		...scanPattern(text, patterns.keyword),
		...scanDeclarations(text, patterns.variableDeclaration)
	];
}

export function findFunctionHeader(source: string, patterns: PatternLibrary): FunctionHeader | undefined {
	const next = execAll(patterns.functionName.regex, source).next();
	if (next.done) {
		return undefined;
	}

	const match = next.value;
	const name = patterns.functionName.highlight(match);
	if (!name) {
		return undefined;
	}

	// The function-name pattern ends on the opening parenthesis
	return { name, open: match.index + match[0].length - 1 };
}

/**
 * Walk the parameter list that opens at `open`, one character at a time
 *
 * Each non-empty run between separators becomes one parameter range. Whitespace
 * around a run is left out; anything inside it is kept as written. Scanning
 * stops once ')' is consumed. A list that never closes before `limit` loses its
 * unfinished run.
 */
export function scanParameters(source: string, open: number, limit: number = source.length): TextRange[] {
	const parameters: TextRange[] = [];
	if (source[open] !== '(') {
		return parameters;
	}

	let state: ParameterScanState = { kind: 'before-parameter' };
	for (let index = open + 1; index < Math.min(limit, source.length); index++) {
		state = stepParameterScan(state, source[index], index);

		if (state.kind === 'at-separator') {
			if (state.parameter) {
				parameters.push(state.parameter);
			}
			if (state.closing) {
				break;
			}
		}
	}

	return parameters;
}

export function stepParameterScan(state: ParameterScanState, char: string, index: number): ParameterScanState {
	if (char === ',' || char === ')') {
		return {
			kind: 'at-separator',
			parameter: state.kind === 'inside-parameter' ? { start: state.start, end: state.end } : undefined,
			closing: char === ')'
		};
	}

	if (/\s/.test(char)) {
		return state.kind === 'at-separator' ? { kind: 'before-parameter' } : state;
	}

	if (state.kind === 'inside-parameter') {
		return { ...state, end: index + 1 };
	}
	return { kind: 'inside-parameter', start: index, end: index + 1 };
}

function scanPattern(source: string, pattern: Pattern): Span[] {
	const spans: Span[] = [];

	for (const match of execAll(pattern.regex, source)) {
		const range = pattern.highlight(match);
		if (range) {
			spans.push({ ...range, category: pattern.category });
		}
	}

	return spans;
}

/**
 * Highlight declarations whose identifier is not yet in `declared`
 * Without a declared set every declaration is highlighted.
 */
function scanDeclarations(source: string, pattern: Pattern, declared?: Set<string>): Span[] {
	const spans: Span[] = [];

	for (const match of execAll(pattern.regex, source)) {
		const range = pattern.highlight(match);
		if (!range) {
			continue;
		}

		if (declared) {
			const identifier = source.slice(range.start, range.end);
			if (declared.has(identifier)) {
				continue;
			}
			declared.add(identifier);
		}

		spans.push({ ...range, category: pattern.category });
	}

	return spans;
}
