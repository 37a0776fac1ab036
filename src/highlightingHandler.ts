import * as vscode from 'vscode';
import { CATEGORIES, type Annotation, type Category } from './dataStructures';
import type { ExtensionConfig } from './configuration';

// One decoration type per highlight category
let decorationTypes: Map<Category, vscode.TextEditorDecorationType> | undefined;

/**
 * Initialize the decoration types from the highlighting configuration
 */
export function initializeHighlighting(config: ExtensionConfig): void {
	decorationTypes = new Map();

	for (const category of CATEGORIES) {
		const style = config.highlighting[category];
		decorationTypes.set(category, vscode.window.createTextEditorDecorationType({
			color: style.color,
			fontWeight: style.fontWeight,
			fontStyle: style.fontStyle
		}));
	}

	console.log('Initialized pseudocode highlighting with custom configuration');
}

/**
 * Apply highlighting annotations to an editor
 */
export function applyAnnotationsToEditor(
	editor: vscode.TextEditor,
	annotations: readonly Annotation[],
	config: ExtensionConfig
): void {
	if (!decorationTypes) {
		initializeHighlighting(config);
	}

	const document = editor.document;
	const rangesByCategory = new Map<Category, vscode.Range[]>(
		CATEGORIES.map((category): [Category, vscode.Range[]] => [category, []])
	);

	for (const annotation of annotations) {
		const range = new vscode.Range(document.positionAt(annotation.start), document.positionAt(annotation.end));
		rangesByCategory.get(annotation.category)?.push(range);
	}

	// Every category is set, so categories that lost all spans are cleared too
	for (const [category, ranges] of rangesByCategory) {
		const decorationType = decorationTypes?.get(category);
		if (decorationType) {
			editor.setDecorations(decorationType, ranges);
		}
	}

	console.log(`Applied ${annotations.length} pseudocode decorations to ${document.uri.fsPath}`);
}

/**
 * Clear all highlighting from an editor
 */
export function clearHighlighting(editor: vscode.TextEditor): void {
	decorationTypes?.forEach(decorationType => editor.setDecorations(decorationType, []));
}

/**
 * Reinitialize highlighting with updated configuration
 * Call this when configuration changes
 */
export function reinitializeHighlighting(config: ExtensionConfig): void {
	disposeHighlighting();
	initializeHighlighting(config);

	console.log('Reinitialized pseudocode highlighting with updated configuration');
}

/**
 * Dispose of highlighting resources
 */
export function disposeHighlighting(): void {
	decorationTypes?.forEach(decorationType => decorationType.dispose());
	decorationTypes = undefined;
}
