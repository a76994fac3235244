/**
 * Error types raised by the terminal buffer and the coordinator.
 */

export type InterfaceErrorCode = "line-not-found" | "segment-not-found" | "index-out-of-range";

/**
 * A terminal buffer operation failed: a line or segment id is unknown to the buffer, or an
 * index falls outside the addressed sequence. Propagated from `render` and `applyChanges`.
 */
export class InterfaceError extends Error {
	constructor(
		readonly code: InterfaceErrorCode,
		message: string,
		readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = "InterfaceError";
	}
}

/**
 * A caller broke the coordinator's contract: it referenced an element it never registered, a
 * segment or line the element does not own, or a relative index outside the element's run.
 * These indicate a bug in the caller and are not recovered from.
 */
export class CoordinatorError extends Error {
	constructor(
		message: string,
		readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = "CoordinatorError";
	}
}
