import type * as vscode from 'vscode';
import type { DocumentSessions } from './documentSessions';
import { sessionForDocument, renderSession } from './hostDocument';

/**
 * Handle when a document is opened - scan it and apply highlighting
 */
export function handleDocumentOpen(sessions: DocumentSessions, document: vscode.TextDocument): void {
	const session = sessionForDocument(sessions, document);
	if (!session) {
		return;
	}

	console.log(`Document opened: ${document.uri.fsPath} (version: ${document.version})`);

	session.scheduler.rescan();
	renderSession(session);
}
