import * as vscode from 'vscode';
import type { DocumentSessions } from './documentSessions';
import { sessionForDocument, renderSession } from './hostDocument';
import { clearHighlighting } from './highlightingHandler';

/**
 * Handle when the active editor changes - rescan and apply highlighting to the new editor
 */
export function handleActiveEditorChange(
	sessions: DocumentSessions,
	editor: vscode.TextEditor | undefined
): void {
	if (!editor) {
		console.log('No active editor');
		return;
	}

	const session = sessionForDocument(sessions, editor.document);
	if (!session) {
		clearHighlighting(editor);
		return;
	}

	console.log(`Active editor changed to: ${editor.document.uri.fsPath}`);

	session.scheduler.rescan();
	renderSession(session);
}

/**
 * Handle scrolling - the newly visible region is requested for re-highlighting
 */
export function handleVisibleRangesChange(
	sessions: DocumentSessions,
	event: vscode.TextEditorVisibleRangesChangeEvent
): void {
	const session = sessions.get(event.textEditor.document.uri.toString());
	if (!session || event.visibleRanges.length === 0) {
		return;
	}

	const document = event.textEditor.document;
	const first = event.visibleRanges[0];
	const last = event.visibleRanges[event.visibleRanges.length - 1];

	session.scheduler.rescan({
		start: document.offsetAt(first.start),
		end: document.offsetAt(last.end)
	});
	renderSession(session);
}

/**
 * Rescan every document shown in a visible editor
 */
export function refreshVisibleEditors(sessions: DocumentSessions): void {
	vscode.window.visibleTextEditors.forEach(editor => {
		handleActiveEditorChange(sessions, editor);
	});
}
