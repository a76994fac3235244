import { InterfaceError } from "./errors";
import type { IdSequence } from "./id";
import type { Style } from "./style";

/** Opaque handle of a buffer line. */
export type LineId = number;

/** Opaque handle of a text segment. */
export type SegmentId = number;

/**
 * A run of text with a single style.
 */
export class Segment {
	#text = "";
	#style: Style | undefined;

	constructor(readonly id: SegmentId) {}

	get text(): string {
		return this.#text;
	}

	get style(): Style | undefined {
		return this.#style;
	}

	setText(text: string): this {
		this.#text = text;
		return this;
	}

	setStyle(style: Style | undefined): this {
		this.#style = style;
		return this;
	}
}

/**
 * One logical display line: an ordered sequence of segments. A line wider than the terminal
 * occupies several rows once painted.
 */
export class Line {
	#segments: Segment[] = [];

	constructor(
		readonly id: LineId,
		readonly ids: IdSequence,
	) {}

	/** Number of segments on this line. */
	get length(): number {
		return this.#segments.length;
	}

	/** Concatenated text of all segments. */
	get text(): string {
		return this.#segments.map(segment => segment.text).join("");
	}

	segmentIds(): SegmentId[] {
		return this.#segments.map(segment => segment.id);
	}

	segments(): readonly Segment[] {
		return this.#segments;
	}

	/** Append a new, empty segment. */
	addSegment(): Segment {
		return this.insertSegment(this.#segments.length);
	}

	/** Insert a new, empty segment so that it ends up at `index`. */
	insertSegment(index: number): Segment {
		if (!Number.isInteger(index) || index < 0 || index > this.#segments.length) {
			throw new InterfaceError("index-out-of-range", `Segment index ${index} out of range for line ${this.id}`, {
				line: this.id,
				index,
				length: this.#segments.length,
			});
		}
		const segment = new Segment(this.ids.next());
		this.#segments.splice(index, 0, segment);
		return segment;
	}

	removeSegment(segmentId: SegmentId): Segment {
		return this.removeSegmentAt(this.getSegmentIndex(segmentId));
	}

	removeSegmentAt(index: number): Segment {
		const segment = this.#segments[index];
		if (!segment) {
			throw new InterfaceError("index-out-of-range", `Segment index ${index} out of range for line ${this.id}`, {
				line: this.id,
				index,
				length: this.#segments.length,
			});
		}
		this.#segments.splice(index, 1);
		return segment;
	}

	getSegment(segmentId: SegmentId): Segment {
		return this.#segments[this.getSegmentIndex(segmentId)];
	}

	getSegments(segmentIds: readonly SegmentId[]): Segment[] {
		return segmentIds.map(id => this.getSegment(id));
	}

	getSegmentIndex(segmentId: SegmentId): number {
		const index = this.#segments.findIndex(segment => segment.id === segmentId);
		if (index === -1) {
			throw new InterfaceError("segment-not-found", `Segment ${segmentId} is not on line ${this.id}`, {
				line: this.id,
				segment: segmentId,
			});
		}
		return index;
	}

	/** Append an existing segment taken from another line. */
	appendSegment(segment: Segment): void {
		this.#segments.push(segment);
	}
}
