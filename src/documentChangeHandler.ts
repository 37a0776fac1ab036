import type * as vscode from 'vscode';
import type { DocumentSessions } from './documentSessions';
import { sessionForDocument, renderSession, getWorkspaceRoot } from './hostDocument';
import { loadConfig } from './configuration';
import { dirtyRange, RescanQueue } from './rescanQueue';

// Pending rescans per document; a newer edit replaces the timer
const pendingRescans = new RescanQueue();

/**
 * Handle document changes by scheduling a debounced rescan of the document
 */
export function handleDocumentChange(
	sessions: DocumentSessions,
	event: vscode.TextDocumentChangeEvent
): void {
	const document = event.document;
	if (event.contentChanges.length === 0) {
		return;
	}

	const session = sessionForDocument(sessions, document);
	if (!session) {
		return;
	}

	const dirty = dirtyRange(event.contentChanges);
	const key = session.key;
	const delay = loadConfig(getWorkspaceRoot()).rescanDelay;

	pendingRescans.schedule(key, delay, () => {
		// The session may have been closed or rebuilt while waiting
		const current = sessions.get(key);
		if (!current) {
			return;
		}

		console.log(`Document changed: ${document.uri.fsPath} (version: ${document.version})`);
		current.scheduler.rescan(dirty);
		renderSession(current);
	});
}

export function cancelPendingRescan(key: string): void {
	pendingRescans.cancel(key);
}

export function cancelAllPendingRescans(): void {
	pendingRescans.cancelAll();
}
