import * as vscode from 'vscode';
import type { TextBuffer } from './dataStructures';
import { configRootOf, loadConfig, modeForLanguage } from './configuration';
import type { DocumentSession, DocumentSessions } from './documentSessions';
import { applyAnnotationsToEditor } from './highlightingHandler';

/**
 * Read a live VS Code document through the engine's buffer interface
 */
export function createDocumentBuffer(document: vscode.TextDocument): TextBuffer {
	return {
		get length(): number {
			return document.offsetAt(document.lineAt(document.lineCount - 1).range.end);
		},
		substring: (start: number, end: number) =>
			document.getText(new vscode.Range(document.positionAt(start), document.positionAt(end)))
	};
}

/**
 * Root of the config file shared by every document in the window
 */
export function getWorkspaceRoot(): string | undefined {
	return configRootOf((vscode.workspace.workspaceFolders ?? []).map(folder => folder.uri.fsPath));
}

/**
 * Get the session for a document, or undefined when its language is not monitored
 */
export function sessionForDocument(
	sessions: DocumentSessions,
	document: vscode.TextDocument
): DocumentSession | undefined {
	const mode = modeForLanguage(loadConfig(getWorkspaceRoot()), document.languageId);
	const key = document.uri.toString();

	if (!mode) {
		sessions.close(key);
		return undefined;
	}

	return sessions.open(key, createDocumentBuffer(document), mode);
}

/**
 * Draw a session's annotations in every visible editor showing its document
 */
export function renderSession(session: DocumentSession): void {
	for (const editor of vscode.window.visibleTextEditors) {
		if (editor.document.uri.toString() !== session.key) {
			continue;
		}
		const config = loadConfig(getWorkspaceRoot());
		applyAnnotationsToEditor(editor, session.store.getAnnotations(session.store.owner), config);
	}
}
