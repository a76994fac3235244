/**
 * The form driver: focus navigation across steps, dependency evaluation and frame rendering.
 */
import { logger, toError } from "@stepform/utils";
import { TerminalBuffer, type TerminalBufferOptions } from "./buffer";
import { Coordinator } from "./coordinator";
import {
	type DependencyId,
	DependencyState,
	type Evaluation,
	isDependencyTarget,
	isValueSource,
	type ValueSource,
} from "./dependency";
import { type Element, isFocusable } from "./element";
import { CoordinatorError } from "./errors";
import { IdSequence } from "./id";
import { isCtrl, isKey, type Key, parseKeys } from "./keys";
import { LayoutAccessor } from "./layout";
import { Step } from "./step";
import type { Terminal } from "./terminal";

/** Result of handling one key. */
export type FormOutcome = "continue" | "complete" | "cancel";

/** How an executed form ended. */
export type FormStatus = Exclude<FormOutcome, "continue">;

export interface FormResult {
	status: FormStatus;
	/** Values of the input elements, per step, in element order. */
	values: string[][];
}

export interface FormOptions {
	/** Allocator for dependency ids. */
	ids?: IdSequence;
}

export class Form {
	readonly steps: Step[];
	readonly dependencies: DependencyState;

	#coordinator: Coordinator | undefined;
	#activeStep = 0;
	#activeElement = 0;
	#maxStep = 0;

	constructor(steps: readonly Step[] = [], options: FormOptions = {}) {
		this.steps = [...steps];
		this.dependencies = new DependencyState(options.ids ?? new IdSequence());
	}

	get started(): boolean {
		return this.#coordinator !== undefined;
	}

	/** Position of the focused element. */
	get active(): { step: number; element: number } {
		return { step: this.#activeStep, element: this.#activeElement };
	}

	/** Append a step. Steps cannot be added once the form has started. */
	addStep(step: Step = new Step()): Step {
		if (this.started) throw new CoordinatorError("Steps cannot be added after the form has started");
		this.steps.push(step);
		return step;
	}

	/** Register an evaluation of `source`; elements reference its result by the returned id. */
	evaluate(source: ValueSource, evaluation: Evaluation): DependencyId {
		return this.dependencies.register(source, evaluation);
	}

	/** Values of every input element, per step. */
	values(): string[][] {
		return this.steps.map(step => step.elements.filter(isValueSource).map(element => element.value()));
	}

	/**
	 * Lay the form out in `buffer`, focus the first input and paint the first frame.
	 * Returns "complete" when the form has no inputs.
	 */
	start(buffer: TerminalBuffer): FormOutcome {
		if (this.#coordinator) throw new CoordinatorError("Form has already started");

		const coordinator = new Coordinator(buffer);
		coordinator.initializeElements(this.steps);
		this.#coordinator = coordinator;
		this.#applyDependencies();

		const first = this.#findInput();
		if (!first) {
			// Nothing to edit: show every step once
			this.#activeStep = Math.max(0, this.steps.length - 1);
			this.#render(true);
			return "complete";
		}

		this.#focus(first.step, first.element);
		this.#render(true);
		return "continue";
	}

	/**
	 * Apply one key and paint the resulting frame. Ctrl+C cancels; Enter advances unless the focused
	 * element captures it; Tab advances; Escape moves back and cancels at the first input.
	 */
	handleKey(key: Key): FormOutcome {
		if (!this.#coordinator) throw new CoordinatorError("Form has not started");

		const outcome = this.#dispatch(key);
		if (outcome !== "continue") return outcome;

		const changed = this.dependencies.refresh();
		if (changed) this.#applyDependencies();
		this.#render(changed);
		return "continue";
	}

	/** Repaint every reached step, e.g. after the terminal was resized. */
	redraw(): void {
		if (!this.#coordinator) throw new CoordinatorError("Form has not started");
		this.#render(true);
	}

	/**
	 * Run the form on a terminal until it completes or is cancelled. The terminal is stopped and
	 * the cursor left below the form whichever way it ends.
	 */
	execute(terminal: Terminal, options: TerminalBufferOptions = {}): Promise<FormResult> {
		const buffer = new TerminalBuffer(terminal, options);

		return new Promise<FormResult>((resolve, reject) => {
			let settled = false;

			const finish = (status: FormStatus): void => {
				if (settled) return;
				settled = true;
				buffer.advanceToEnd();
				terminal.stop();
				logger.info("form: finished", { status });
				resolve({ status, values: this.values() });
			};

			const fail = (err: unknown): void => {
				if (settled) return;
				settled = true;
				const error = toError(err);
				logger.error("form: execution failed", { error: error.message, name: error.name });
				try {
					buffer.advanceToEnd();
				} finally {
					terminal.stop();
				}
				reject(error);
			};

			const onInput = (data: string): void => {
				if (settled) return;
				try {
					for (const key of parseKeys(data)) {
						const outcome = this.handleKey(key);
						if (outcome !== "continue") {
							finish(outcome);
							return;
						}
					}
				} catch (err) {
					fail(err);
				}
			};

			const onResize = (): void => {
				if (settled) return;
				try {
					this.redraw();
				} catch (err) {
					fail(err);
				}
			};

			terminal.start(onInput, onResize);
			try {
				const outcome = this.start(buffer);
				if (outcome !== "continue") finish(outcome);
			} catch (err) {
				fail(err);
			}
		});
	}

	#dispatch(key: Key): FormOutcome {
		if (isCtrl(key, "c")) return "cancel";

		const active = this.#activeElementOrThrow();
		if (isKey(key, "enter")) {
			const advance = active.capturesEnter() ? active.update(key) : true;
			return advance && this.#moveFocus(1) ? "complete" : "continue";
		}
		if (isKey(key, "escape")) {
			return this.#moveFocus(-1) ? "cancel" : "continue";
		}
		// Tab always advances, also out of inputs that capture Enter
		if (isKey(key, "tab")) {
			return this.#moveFocus(1) ? "complete" : "continue";
		}
		if (active.update(key) && this.#moveFocus(1)) return "complete";
		return "continue";
	}

	/**
	 * Move focus to the next (or previous) input, crossing step boundaries. Returns true, leaving
	 * focus where it was, when there is no input in that direction.
	 */
	#moveFocus(direction: 1 | -1): boolean {
		let step = this.#activeStep;
		let element = this.#activeElement;

		for (;;) {
			if (direction === 1) {
				if (element + 1 >= this.steps[step].elements.length) {
					if (step + 1 >= this.steps.length) return true;
					step += 1;
					element = 0;
				} else {
					element += 1;
				}
			} else if (element === 0) {
				if (step === 0) return true;
				step -= 1;
				element = Math.max(0, this.steps[step].elements.length - 1);
			} else {
				element -= 1;
			}

			if (this.steps[step].elements[element]?.isInput()) {
				this.#focus(step, element);
				return false;
			}
		}
	}

	#focus(step: number, element: number): void {
		const previous = this.#activeElementOrUndefined();
		if (previous && isFocusable(previous)) previous.focused = false;

		this.#activeStep = step;
		this.#activeElement = element;

		const next = this.#activeElementOrUndefined();
		if (next && isFocusable(next)) next.focused = true;
	}

	#findInput(): { step: number; element: number } | undefined {
		for (let step = 0; step < this.steps.length; step++) {
			const element = this.steps[step].elements.findIndex(candidate => candidate.isInput());
			if (element !== -1) return { step, element };
		}
		return undefined;
	}

	#activeElementOrUndefined(): Element | undefined {
		return this.steps[this.#activeStep]?.elements[this.#activeElement];
	}

	#activeElementOrThrow(): Element {
		const element = this.#activeElementOrUndefined();
		if (!element) throw new CoordinatorError("Form has no focused element");
		return element;
	}

	#applyDependencies(): void {
		for (const step of this.steps) {
			for (const element of step.elements) {
				if (isDependencyTarget(element)) element.applyDependencies(this.dependencies);
			}
		}
	}

	/**
	 * Render a frame. A full frame covers every reached step; reaching a new step renders from the
	 * highest step reached before it; otherwise only the focused element changes.
	 */
	#render(full = false): void {
		const coordinator = this.#coordinator;
		if (!coordinator) throw new CoordinatorError("Form has not started");

		logger.time("form:render", () => {
			const elements = this.#elementsToRender(full);

			coordinator.hideCursor();
			for (const element of elements) {
				element.render(coordinator);
			}
			this.#maxStep = Math.max(this.#maxStep, this.#activeStep);

			const layout = new LayoutAccessor(coordinator.applyChanges());
			for (const element of elements) {
				element.updateLayout(layout);
			}
		});
	}

	#elementsToRender(full: boolean): Element[] {
		if (full) {
			const last = Math.max(this.#maxStep, this.#activeStep);
			return this.steps.slice(0, last + 1).flatMap(step => step.elements);
		}
		if (this.#activeStep > this.#maxStep) {
			return this.steps.slice(this.#maxStep, this.#activeStep + 1).flatMap(step => step.elements);
		}
		const active = this.#activeElementOrUndefined();
		return active ? [active] : [];
	}
}
