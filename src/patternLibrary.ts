import type { Pattern, TextRange } from './dataStructures';

/**
 * Lexical patterns used by the block locator and the block annotator
 *
 * All patterns are built once per keyword list and never mutated. Scans run on
 * private copies of the regexes, so sharing a library between documents is safe.
 */

export const DEFAULT_KEYWORDS: readonly string[] = [
	'Function',
	'Input',
	'Output',
	'<--',
	'<-',
	'if',
	'then',
	'else',
	'NOT',
	'AND',
	'while',
	'repeat',
	'return'
];

const IDENTIFIER = '[A-Za-z_][A-Za-z0-9_]*';
const NOT_AFTER_IDENTIFIER = '(?<![A-Za-z0-9_])';

export const IDENTIFIER_PATTERN = new RegExp(IDENTIFIER, 'g');

/**
 * Locates pseudocode function comments
 */
export interface BlockMatcher {
	name: string;
	regex: RegExp;
}

export interface PatternLibrary {
	keywords: readonly string[];
	keyword: Pattern;
	functionName: Pattern;
	variableDeclaration: Pattern;
	commentBlock: BlockMatcher;
}

/**
 * Build the pattern set for a keyword list
 * Falls back to the default keywords when the list has no usable token
 */
export function createPatternLibrary(keywords: readonly string[] = DEFAULT_KEYWORDS): PatternLibrary {
	let tokens = normalizeKeywords(keywords);
	if (tokens.length === 0) {
		console.warn('Keyword list is empty, using the default pseudocode keywords');
		tokens = normalizeKeywords(DEFAULT_KEYWORDS);
	}

	// Longest first so that '<--' is tried before '<-'
	const alternation = [...tokens]
		.sort((a, b) => b.length - a.length)
		.map(escapeRegExp)
		.join('|');

	return {
		keywords: tokens,
		keyword: {
			name: 'keyword',
			category: 'keyword',
			regex: new RegExp(`(?<=^|\\s)(?:${alternation})(?=\\s|$)`, 'g'),
			highlight: (match) => ({ start: match.index, end: match.index + match[0].length })
		},
		functionName: {
			name: 'function-name',
			category: 'function-name',
			regex: new RegExp(`${NOT_AFTER_IDENTIFIER}Function[ \\t]+(?<name>${IDENTIFIER})[ \\t]*\\(`, 'dg'),
			highlight: (match) => groupRange(match, 'name')
		},
		variableDeclaration: {
			name: 'variable-declaration',
			category: 'variable',
			regex: new RegExp(`${NOT_AFTER_IDENTIFIER}(?<name>${IDENTIFIER})[ \\t]*<--?.*`, 'dg'),
			highlight: (match) => groupRange(match, 'name')
		},
		commentBlock: {
			name: 'comment-block',
			regex: new RegExp(
				`/\\*[\\s*]*Function[ \\t]+${IDENTIFIER}[ \\t]*\\([^()\\n]*\\)[\\s\\S]*?\\*/`,
				'g'
			)
		}
	};
}

/**
 * Iterate every match of a regex over text, starting at offset `from`
 * The regex is copied, so its own lastIndex is never touched.
 */
export function* execAll(regex: RegExp, text: string, from: number = 0): Generator<RegExpExecArray, void, undefined> {
	const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
	const scanner = new RegExp(regex.source, flags);
	scanner.lastIndex = from;

	let match: RegExpExecArray | null;
	while ((match = scanner.exec(text)) !== null) {
		yield match;
		if (match[0].length === 0) {
			scanner.lastIndex++;
		}
	}
}

function groupRange(match: RegExpExecArray, group: string): TextRange | undefined {
	const indices = match.indices?.groups?.[group];
	if (!indices) {
		return undefined;
	}
	return { start: indices[0], end: indices[1] };
}

function normalizeKeywords(keywords: readonly string[]): string[] {
	const seen = new Set<string>();
	for (const keyword of keywords) {
		const token = keyword.trim();
		if (token && !/\s/.test(token)) {
			seen.add(token);
		}
	}
	return [...seen];
}

function escapeRegExp(token: string): string {
	return token.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
