import type { TextBuffer } from './dataStructures';
import { AnnotationStore } from './annotationSystem';
import { ScanScheduler, type ScanMode } from './scanScheduler';
import type { PatternLibrary } from './patternLibrary';

/**
 * Highlighting state for one open document
 */
export interface DocumentSession {
	key: string;
	mode: ScanMode;
	store: AnnotationStore;
	scheduler: ScanScheduler;
}

export interface SessionOptions {
	patterns: PatternLibrary;
	cacheSize?: number;
}

/**
 * Registry of document sessions, keyed by document URI
 * Each session owns its store; nothing is shared between documents.
 */
export class DocumentSessions {
	private sessions: Map<string, DocumentSession> = new Map();

	constructor(private options: SessionOptions) {}

	/**
	 * Get the session for a document, creating it on first use
	 * The buffer is read lazily on every rescan, so a live document can be passed.
	 * An existing session is recreated when the mode differs.
	 */
	public open(key: string, buffer: TextBuffer, mode: ScanMode): DocumentSession {
		const existing = this.sessions.get(key);
		if (existing && existing.mode === mode) {
			return existing;
		}
		if (existing) {
			this.close(key);
		}

		const store = new AnnotationStore();
		const scheduler = new ScanScheduler(buffer, store, {
			patterns: this.options.patterns,
			mode,
			cacheSize: this.options.cacheSize
		});
		const session: DocumentSession = { key, mode, store, scheduler };
		this.sessions.set(key, session);

		console.log(`Opened ${mode} session for ${key}`);
		return session;
	}

	public get(key: string): DocumentSession | undefined {
		return this.sessions.get(key);
	}

	public close(key: string): void {
		const session = this.sessions.get(key);
		if (!session) {
			return;
		}
		session.scheduler.dispose();
		this.sessions.delete(key);
		console.log(`Closed session for ${key}`);
	}

	/**
	 * Swap in new options; open sessions are dropped and rebuilt on next use
	 */
	public reconfigure(options: SessionOptions): void {
		this.options = options;
		this.dispose();
	}

	public get size(): number {
		return this.sessions.size;
	}

	public dispose(): void {
		for (const key of [...this.sessions.keys()]) {
			this.close(key);
		}
	}
}
