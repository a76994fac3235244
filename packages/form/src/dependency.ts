import { IdSequence } from "./id";

/** Identifies one registered evaluation. */
export type DependencyId = number;

/**
 * A test applied to the value of a source element.
 */
export type Evaluation =
	/** True when the source is empty. */
	| { kind: "is-empty" }
	/** True when the source's value equals `value`. */
	| { kind: "equal"; value: string }
	/** True when the source's value differs from `value`. */
	| { kind: "not-equal"; value: string };

/**
 * What a dependent element does with an evaluation's result.
 * - `hide`: hidden while the evaluation is true, shown otherwise.
 * - `show`: shown while the evaluation is true, hidden otherwise.
 */
export type Action = "hide" | "show";

/** Anything whose current value can be evaluated. */
export interface ValueSource {
	value(): string;
}

export function evaluate(evaluation: Evaluation, value: string): boolean {
	switch (evaluation.kind) {
		case "is-empty":
			return value.length === 0;
		case "equal":
			return value === evaluation.value;
		case "not-equal":
			return value !== evaluation.value;
	}
}

/** Whether an element with the given action is visible for an evaluation result. */
export function isVisible(action: Action, result: boolean): boolean {
	return action === "hide" ? !result : result;
}

interface Registration {
	source: ValueSource;
	evaluation: Evaluation;
}

/**
 * Evaluations registered on a form and their latest results.
 */
export class DependencyState {
	#registrations = new Map<DependencyId, Registration>();
	#results = new Map<DependencyId, boolean>();

	constructor(readonly ids: IdSequence = new IdSequence()) {}

	/** Register an evaluation of `source` and compute its first result. */
	register(source: ValueSource, evaluation: Evaluation): DependencyId {
		const id = this.ids.next();
		this.#registrations.set(id, { source, evaluation });
		this.#results.set(id, evaluate(evaluation, source.value()));
		return id;
	}

	/** Latest result of an evaluation; unknown ids evaluate false. */
	get(id: DependencyId): boolean {
		return this.#results.get(id) ?? false;
	}

	/**
	 * Re-run every evaluation. Returns whether any result changed.
	 */
	refresh(): boolean {
		let changed = false;
		for (const [id, { source, evaluation }] of this.#registrations) {
			const result = evaluate(evaluation, source.value());
			if (this.#results.get(id) !== result) {
				this.#results.set(id, result);
				changed = true;
			}
		}
		return changed;
	}
}

/** An element whose visibility depends on evaluations. */
export interface DependencyTarget {
	applyDependencies(state: DependencyState): void;
}

export function isDependencyTarget<T extends object>(value: T): value is T & DependencyTarget {
	return "applyDependencies" in value && typeof value.applyDependencies === "function";
}

export function isValueSource<T extends object>(value: T): value is T & ValueSource {
	return "value" in value && typeof value.value === "function";
}
