import type { Coordinator } from "./coordinator";
import type { Key } from "./keys";
import type { LayoutAccessor } from "./layout";

/**
 * Identity of an element: its step and its position within the step, assigned once at form
 * initialization. Ordered lexicographically.
 */
export interface ElementId {
	readonly step: number;
	readonly element: number;
}

export function elementId(step: number, element: number): ElementId {
	return { step, element };
}

export function sameElement(a: ElementId, b: ElementId): boolean {
	return a.step === b.step && a.element === b.element;
}

/** Stable string form, used as a map key. */
export function elementKey(id: ElementId): string {
	return `${id.step}:${id.element}`;
}

/**
 * An element in the form: static content or an input.
 */
export interface Element {
	/** Assign the element's id. Called once, before the first render. */
	setId(id: ElementId): void;

	/**
	 * Bring the element's segments and lines in line with its content. Focused inputs report their
	 * cursor through `coordinator.setCursor`.
	 */
	render(coordinator: Coordinator): void;

	/** Absorb the geometry of the frame just painted. */
	updateLayout(layout: LayoutAccessor): void;

	/** Whether this element accepts input and can take focus. */
	isInput(): boolean;

	/** Whether this element consumes Enter instead of letting the form advance. */
	capturesEnter(): boolean;

	/** Apply a key to the element's content. Returns whether the form should advance focus. */
	update(key: Key): boolean;
}

/**
 * Interface for elements that can receive focus and display a hardware cursor.
 */
export interface Focusable {
	/** Set by the form when focus changes. */
	focused: boolean;
}

/** Type guard to check if an element implements Focusable */
export function isFocusable(element: Element): element is Element & Focusable {
	return "focused" in element && typeof element.focused === "boolean";
}
