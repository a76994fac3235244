import type { LineId, SegmentId } from "./line";

/**
 * The portion of a segment painted on one terminal row.
 */
export interface PartLayout {
	/** Row index within the painted area. */
	row: number;
	/** Column of the part's first grapheme. */
	column: number;
	/** Column width of each grapheme in the part. */
	widths: number[];
}

export interface SegmentLayout {
	segmentId: SegmentId;
	/** One part per row the segment spans; an empty segment still reports one empty part. */
	parts: PartLayout[];
}

export interface LineLayout {
	lineId: LineId;
	/** Row index of the line's first row within the painted area. */
	row: number;
	/** Number of terminal rows the line occupies. */
	rows: number;
	segments: SegmentLayout[];
}

/**
 * Geometry of a frame as painted by `TerminalBuffer.applyChanges`.
 */
export interface InterfaceLayout {
	/** Terminal width the frame was laid out at. */
	width: number;
	lines: LineLayout[];
}

/**
 * Read access to a frame's layout, handed to elements after each paint.
 */
export class LayoutAccessor {
	#segments = new Map<SegmentId, SegmentLayout>();
	#lines = new Map<LineId, LineLayout>();

	constructor(readonly layout: InterfaceLayout) {
		for (const line of layout.lines) {
			this.#lines.set(line.lineId, line);
			for (const segment of line.segments) {
				this.#segments.set(segment.segmentId, segment);
			}
		}
	}

	get width(): number {
		return this.layout.width;
	}

	getSegment(segmentId: SegmentId): SegmentLayout | undefined {
		return this.#segments.get(segmentId);
	}

	getLine(lineId: LineId): LineLayout | undefined {
		return this.#lines.get(lineId);
	}
}
