import type { TextRange } from './dataStructures';

/**
 * One edit as the host reports it
 * `rangeOffset` and `rangeLength` are measured in the document before the edit.
 */
export interface ContentChange {
	rangeOffset: number;
	rangeLength: number;
	text: string;
}

/**
 * Offsets touched by a set of simultaneous changes, measured in the changed document
 *
 * Each change is shifted by the growth of every change that comes before it.
 */
export function dirtyRange(changes: readonly ContentChange[]): TextRange {
	if (changes.length === 0) {
		return { start: 0, end: 0 };
	}

	const ordered = [...changes].sort((a, b) => a.rangeOffset - b.rangeOffset);
	let shift = 0;
	let start = Number.MAX_SAFE_INTEGER;
	let end = 0;

	for (const change of ordered) {
		const changeStart = change.rangeOffset + shift;
		start = Math.min(start, changeStart);
		end = Math.max(end, changeStart + change.text.length);
		shift += change.text.length - change.rangeLength;
	}

	return { start, end };
}

/**
 * Debounced rescans keyed by document
 * Scheduling a key that already waits replaces its timer.
 */
export class RescanQueue {
	private readonly timers: Map<string, NodeJS.Timeout> = new Map();

	public schedule(key: string, delay: number, callback: () => void): void {
		this.cancel(key);
		this.timers.set(key, setTimeout(() => {
			this.timers.delete(key);
			callback();
		}, delay));
	}

	public cancel(key: string): void {
		const timer = this.timers.get(key);
		if (timer) {
			clearTimeout(timer);
			this.timers.delete(key);
		}
	}

	public cancelAll(): void {
		for (const key of [...this.timers.keys()]) {
			this.cancel(key);
		}
	}

	public isPending(key: string): boolean {
		return this.timers.has(key);
	}

	public get size(): number {
		return this.timers.size;
	}
}
