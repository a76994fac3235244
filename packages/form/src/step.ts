import type { Element } from "./element";

/**
 * One page of a form: an ordered list of elements shown together.
 */
export class Step {
	readonly elements: Element[];

	constructor(elements: readonly Element[] = []) {
		this.elements = [...elements];
	}

	addElement(element: Element): this {
		this.elements.push(element);
		return this;
	}
}
