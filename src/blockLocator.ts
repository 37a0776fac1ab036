import type { Block } from './dataStructures';
import { execAll, type PatternLibrary } from './patternLibrary';

/**
 * Find the next pseudocode function comment starting at or after searchStart
 * Unterminated or malformed comments never match; the caller just sees no block.
 */
export function locateBlock(text: string, searchStart: number, patterns: PatternLibrary): Block | undefined {
	if (searchStart < 0 || searchStart >= text.length) {
		return undefined;
	}

	const next = execAll(patterns.commentBlock.regex, text, searchStart).next();
	if (next.done) {
		return undefined;
	}

	const match = next.value;
	return {
		start: match.index,
		end: match.index + match[0].length
	};
}

/**
 * Locate every block in the text, in document order
 */
export function locateBlocks(text: string, patterns: PatternLibrary): Block[] {
	const blocks: Block[] = [];
	let cursor = 0;

	while (cursor < text.length) {
		const block = locateBlock(text, cursor, patterns);
		if (!block) {
			break;
		}
		blocks.push(block);
		cursor = block.end;
	}

	return blocks;
}
