/**
 * Monotonically increasing id allocator.
 *
 * Owned by whoever mints the ids (a terminal buffer for its lines and segments, a form for its
 * dependencies) so that separate instances never share counters.
 */
export class IdSequence {
	#next: number;

	constructor(start = 0) {
		this.#next = start;
	}

	/** Returns the next id. */
	next(): number {
		return this.#next++;
	}
}
