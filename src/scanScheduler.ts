import type { Block, Disposable, Span, TextBuffer, TextRange } from './dataStructures';
import type { AnnotationStore } from './annotationSystem';
import { locateBlock } from './blockLocator';
import { annotateBlock, annotateDocument } from './blockAnnotator';
import { createPatternLibrary, type PatternLibrary } from './patternLibrary';

export type ScanMode = 'comment-blocks' | 'whole-document';

export interface ScanSchedulerOptions {
	patterns?: PatternLibrary;
	mode?: ScanMode;
	cacheSize?: number; // Blocks remembered between passes, 0 disables the memo
}

/**
 * Outcome of one completed pass
 */
export interface ScanResult {
	requested: TextRange;
	scanned: TextRange;
	blocks: Block[];
	annotationCount: number;
}

export type RescanListener = (result: ScanResult) => void;

const DEFAULT_CACHE_SIZE = 256;

/**
 * Entry point for the host's re-highlighting requests
 *
 * Every pass scans the whole document from offset 0, whatever range was asked
 * for, and reconciles each block and each gap between blocks. The per-block memo
 * only skips re-annotating block text that was already seen.
 */
export class ScanScheduler {
	private readonly patterns: PatternLibrary;
	private readonly mode: ScanMode;
	private readonly cacheSize: number;
	private readonly blockCache: Map<string, Span[]> = new Map();
	private readonly listeners: Set<RescanListener> = new Set();

	private scanning: boolean = false;
	private queued: TextRange | undefined;

	constructor(
		private readonly buffer: TextBuffer,
		private readonly store: AnnotationStore,
		options: ScanSchedulerOptions = {}
	) {
		this.patterns = options.patterns ?? createPatternLibrary();
		this.mode = options.mode ?? 'comment-blocks';
		this.cacheSize = Math.max(0, options.cacheSize ?? DEFAULT_CACHE_SIZE);
	}

	/**
	 * Re-highlight the document
	 * A request made while a pass is running is queued; the running pass is then
	 * thrown away and the scan restarts from the top. Returns undefined for a queued request.
	 */
	public rescan(range?: TextRange): ScanResult | undefined {
		const requested = range ?? { start: 0, end: this.buffer.length };

		if (this.scanning) {
			console.log(`Rescan requested during a pass, queueing [${requested.start}, ${requested.end})`);
			this.queued = requested;
			return undefined;
		}

		let result: ScanResult | undefined;
		this.scanning = true;
		try {
			let next: TextRange | undefined = requested;
			while (next) {
				const snapshot = this.buffer.substring(0, this.buffer.length);
				const pass = this.computePass(snapshot, next);
				const restart = this.takeQueued();
				if (restart) {
					next = restart;
					continue;
				}
				this.applyPass(pass);
				result = pass.result;
				next = this.takeQueued();
			}
		} finally {
			this.scanning = false;
		}

		if (result) {
			console.log(`Rescanned ${result.blocks.length} blocks, ${result.annotationCount} annotations`);
			for (const listener of this.listeners) {
				listener(result);
			}
		}
		return result;
	}

	/**
	 * Called after every completed pass
	 */
	public onDidRescan(listener: RescanListener): Disposable {
		this.listeners.add(listener);
		return { dispose: () => this.listeners.delete(listener) };
	}

	public dispose(): void {
		this.listeners.clear();
		this.blockCache.clear();
		this.queued = undefined;
	}

	private takeQueued(): TextRange | undefined {
		const queued = this.queued;
		this.queued = undefined;
		return queued;
	}

	private computePass(text: string, requested: TextRange): PendingPass {
		// Annotations past the current end of the document are stale too
		const scanned: TextRange = { start: 0, end: Number.MAX_SAFE_INTEGER };

		if (this.mode === 'whole-document') {
			const spans = annotateDocument(text, this.patterns);
			return {
				updates: [{ range: scanned, spans }],
				result: { requested, scanned, blocks: [], annotationCount: spans.length }
			};
		}

		const updates: RangeUpdate[] = [];
		const blocks: Block[] = [];
		let annotationCount = 0;
		let cursor = 0;

		while (cursor < text.length) {
			const block = locateBlock(text, cursor, this.patterns);
			if (!block) {
				break;
			}

			const spans = this.annotate(text, block);
			if (block.start > cursor) {
				updates.push({ range: { start: cursor, end: block.start }, spans: [] });
			}
			updates.push({ range: block, spans });
			blocks.push(block);
			annotationCount += spans.length;
			cursor = block.end;
		}
		updates.push({ range: { start: cursor, end: scanned.end }, spans: [] });

		return { updates, result: { requested, scanned, blocks, annotationCount } };
	}

	private applyPass(pass: PendingPass): void {
		for (const update of pass.updates) {
			this.store.reconcile(update.range, update.spans);
		}
	}

	private annotate(text: string, block: Block): Span[] {
		if (this.cacheSize === 0) {
			return annotateBlock(text, block, this.patterns);
		}

		const source = text.slice(block.start, block.end);
		let relative = this.blockCache.get(source);
		if (relative) {
			// Refresh recency
			this.blockCache.delete(source);
		} else {
			relative = annotateBlock(source, { start: 0, end: source.length }, this.patterns);
		}
		this.blockCache.set(source, relative);
		this.evictBlocks();

		return relative.map(span => ({
			start: span.start + block.start,
			end: span.end + block.start,
			category: span.category
		}));
	}

	private evictBlocks(): void {
		for (const key of this.blockCache.keys()) {
			if (this.blockCache.size <= this.cacheSize) {
				break;
			}
			this.blockCache.delete(key);
		}
	}
}

interface RangeUpdate {
	range: TextRange;
	spans: Span[];
}

interface PendingPass {
	updates: RangeUpdate[];
	result: ScanResult;
}
