import type { Coordinator } from "../coordinator";
import { type Action, type DependencyId, type DependencyState, type DependencyTarget, isVisible } from "../dependency";
import type { Element, ElementId } from "../element";
import { CoordinatorError } from "../errors";
import type { Style } from "../style";

/**
 * Static text. The first line of text is placed inline, beside the step's other elements; every
 * further line takes a block line of its own.
 */
export class Literal implements Element, DependencyTarget {
	#id: ElementId | undefined;
	#dependency: { id: DependencyId; action: Action } | undefined;
	#visible = true;
	#rendered = false;

	constructor(
		readonly text: string,
		readonly style?: Style,
	) {}

	/** Show or hide this literal according to an evaluation registered on the form. */
	setDependency(id: DependencyId, action: Action): this {
		this.#dependency = { id, action };
		return this;
	}

	get visible(): boolean {
		return this.#visible;
	}

	setId(id: ElementId): void {
		this.#id = id;
	}

	applyDependencies(state: DependencyState): void {
		if (!this.#dependency) return;
		this.#visible = isVisible(this.#dependency.action, state.get(this.#dependency.id));
	}

	render(coordinator: Coordinator): void {
		const id = this.#requireId();

		if (this.#visible && !this.#rendered) {
			this.text.split("\n").forEach((text, index) => {
				const segment = index === 0 ? coordinator.addSegment(id) : coordinator.addLine(id).addSegment();
				segment.setText(text).setStyle(this.style);
			});
			this.#rendered = true;
		} else if (!this.#visible && this.#rendered) {
			for (const segmentId of coordinator.segmentIds(id)) {
				coordinator.removeSegment(id, segmentId);
			}
			// Last line first; releasing the final one rejoins later siblings
			const lines = coordinator.blockLineIds(id);
			for (let i = lines.length - 1; i >= 0; i--) {
				coordinator.removeLine(id, lines[i]);
			}
			this.#rendered = false;
		}
	}

	updateLayout(): void {}

	isInput(): boolean {
		return false;
	}

	capturesEnter(): boolean {
		return false;
	}

	update(): boolean {
		return false;
	}

	#requireId(): ElementId {
		if (!this.#id) throw new CoordinatorError("Literal rendered before its id was assigned");
		return this.#id;
	}
}
