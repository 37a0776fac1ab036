import { intersects, type Annotation, type Span, type TextRange } from './dataStructures';

/**
 * Core annotation store for managing highlighting state
 *
 * One store belongs to one document session. Annotations of other owners may
 * share the store; reconcile only ever replaces this store's own annotations.
 */

export const ENGINE_OWNER = 'pseudocode-highlighter';

export class AnnotationStore {
	private annotations: readonly Annotation[] = [];

	constructor(public readonly owner: string = ENGINE_OWNER) {}

	/**
	 * Replace this owner's annotations that intersect `range` with `spans`
	 * The new list is built aside and swapped in as a whole.
	 */
	public reconcile(range: TextRange, spans: readonly Span[]): void {
		const kept = this.annotations.filter(annotation =>
			annotation.owner !== this.owner || !intersects(annotation, range)
		);

		const ownKeys = new Set(
			kept.filter(annotation => annotation.owner === this.owner).map(annotationKey)
		);

		const installed: Annotation[] = [];
		for (const span of spans) {
			const key = annotationKey(span);
			if (ownKeys.has(key)) {
				continue;
			}
			ownKeys.add(key);
			installed.push({ start: span.start, end: span.end, category: span.category, owner: this.owner });
		}

		this.annotations = sortAnnotations([...kept, ...installed]);
	}

	/**
	 * Install annotations that belong to other owners
	 */
	public add(annotations: readonly Annotation[]): void {
		this.annotations = sortAnnotations([...this.annotations, ...annotations]);
	}

	/**
	 * Current annotations, sorted by position; all owners unless one is given
	 */
	public getAnnotations(owner?: string): readonly Annotation[] {
		if (owner === undefined) {
			return this.annotations;
		}
		return this.annotations.filter(annotation => annotation.owner === owner);
	}

	/**
	 * Drop every annotation owned by this store
	 */
	public clear(): void {
		this.annotations = this.annotations.filter(annotation => annotation.owner !== this.owner);
	}
}

function annotationKey(span: Span): string {
	return `${span.start}:${span.end}:${span.category}`;
}

function sortAnnotations(annotations: Annotation[]): Annotation[] {
	return annotations.sort((a, b) =>
		a.start - b.start ||
		a.end - b.end ||
		a.category.localeCompare(b.category) ||
		a.owner.localeCompare(b.owner)
	);
}
