// The module 'vscode' contains the VS Code extensibility API
import * as vscode from 'vscode';
import { DocumentSessions, type SessionOptions } from './documentSessions';
import { createPatternLibrary } from './patternLibrary';
import { handleDocumentOpen } from './documentOpenHandler';
import { handleDocumentChange, cancelAllPendingRescans, cancelPendingRescan } from './documentChangeHandler';
import { handleActiveEditorChange, handleVisibleRangesChange, refreshVisibleEditors } from './activeEditorHandler';
import { initializeHighlighting, disposeHighlighting, reinitializeHighlighting, clearHighlighting } from './highlightingHandler';
import { getWorkspaceRoot } from './hostDocument';
import {
	loadConfig,
	refreshConfigCache,
	initializeConfigFile,
	getConfigFilePath,
	type ExtensionConfig
} from './configuration';

let sessions: DocumentSessions | undefined;

// This method is called when your extension is activated
export function activate(context: vscode.ExtensionContext) {
	console.log('Pseudocode highlighter is now active');

	const config = loadConfig(getWorkspaceRoot());
	initializeHighlighting(config);

	const documentSessions = new DocumentSessions(sessionOptions(config));
	sessions = documentSessions;

	const openConfigCommand = vscode.commands.registerCommand('pseudocode-highlighter.openConfiguration', async () => {
		await openConfigFile();
	});

	const initConfigCommand = vscode.commands.registerCommand('pseudocode-highlighter.initializeConfiguration', () => {
		const workspaceRoot = getWorkspaceRoot();
		if (workspaceRoot && initializeConfigFile(workspaceRoot)) {
			void vscode.window.showInformationMessage('Configuration file created successfully');
		} else {
			void vscode.window.showErrorMessage('Failed to create configuration file');
		}
	});

	const rescanCommand = vscode.commands.registerCommand('pseudocode-highlighter.rescanDocument', () => {
		handleActiveEditorChange(documentSessions, vscode.window.activeTextEditor);
	});

	const clearCommand = vscode.commands.registerCommand('pseudocode-highlighter.clearHighlights', () => {
		const editor = vscode.window.activeTextEditor;
		if (!editor) {
			return;
		}
		const session = documentSessions.get(editor.document.uri.toString());
		session?.store.clear();
		clearHighlighting(editor);
	});

	const onDidOpenTextDocument = vscode.workspace.onDidOpenTextDocument((document) => {
		try {
			handleDocumentOpen(documentSessions, document);
		} catch (error) {
			console.error('Failed to handle document open:', error);
		}
	});

	const onDidChangeTextDocument = vscode.workspace.onDidChangeTextDocument((event) => {
		try {
			handleDocumentChange(documentSessions, event);
		} catch (error) {
			console.error('Failed to handle document change:', error);
		}
	});

	const onDidCloseTextDocument = vscode.workspace.onDidCloseTextDocument((document) => {
		const key = document.uri.toString();
		cancelPendingRescan(key);
		documentSessions.close(key);
	});

	const onDidChangeActiveTextEditor = vscode.window.onDidChangeActiveTextEditor((editor) => {
		handleActiveEditorChange(documentSessions, editor);
	});

	const onDidChangeVisibleRanges = vscode.window.onDidChangeTextEditorVisibleRanges((event) => {
		handleVisibleRangesChange(documentSessions, event);
	});

	// Watch for configuration file changes to refresh cache and rebuild sessions
	const configWatcher = vscode.workspace.createFileSystemWatcher('**/.vscode/pseudocode-highlighter/pseudocode-highlighter.json');
	const onConfigChanged = () => {
		console.log('Configuration file changed, refreshing cache and reinitializing highlighting');
		const updated = refreshConfigCache(getWorkspaceRoot());
		reinitializeHighlighting(updated);
		cancelAllPendingRescans();
		documentSessions.reconfigure(sessionOptions(updated));
		refreshVisibleEditors(documentSessions);
	};
	configWatcher.onDidChange(onConfigChanged);
	configWatcher.onDidCreate(onConfigChanged);

	context.subscriptions.push(openConfigCommand);
	context.subscriptions.push(initConfigCommand);
	context.subscriptions.push(rescanCommand);
	context.subscriptions.push(clearCommand);
	context.subscriptions.push(onDidOpenTextDocument);
	context.subscriptions.push(onDidChangeTextDocument);
	context.subscriptions.push(onDidCloseTextDocument);
	context.subscriptions.push(onDidChangeActiveTextEditor);
	context.subscriptions.push(onDidChangeVisibleRanges);
	context.subscriptions.push(configWatcher);

	refreshVisibleEditors(documentSessions);
}

// This method is called when your extension is deactivated
export function deactivate() {
	cancelAllPendingRescans();
	sessions?.dispose();
	sessions = undefined;
	disposeHighlighting();
}

function sessionOptions(config: ExtensionConfig): SessionOptions {
	return {
		patterns: createPatternLibrary(config.keywords),
		cacheSize: config.cacheSize
	};
}

/**
 * Open configuration file in editor
 */
async function openConfigFile(): Promise<void> {
	const workspaceRoot = getWorkspaceRoot();
	if (!workspaceRoot) {
		void vscode.window.showErrorMessage('No workspace folder is open');
		return;
	}

	// Create config file if it doesn't exist
	if (!initializeConfigFile(workspaceRoot)) {
		void vscode.window.showErrorMessage('Failed to create configuration file');
		return;
	}

	try {
		const document = await vscode.workspace.openTextDocument(getConfigFilePath(workspaceRoot));
		await vscode.window.showTextDocument(document);
	} catch (error) {
		console.error('Failed to open configuration file:', error);
		void vscode.window.showErrorMessage('Failed to open configuration file');
	}
}
