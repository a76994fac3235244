/**
 * Allocation of buffer lines and segments to form elements.
 *
 * Each step starts with one inline line shared by all of its elements, each contributing a
 * contiguous run of segments. An element that needs rows of its own (block lines) first splits the
 * elements after it onto a fresh inline line; releasing its last block line joins them back.
 * Elements address their segments and lines relative to their own run; the coordinator turns
 * those requests into absolute buffer indices.
 *
 * Index resolution depends on the state of preceding elements, so within a frame elements must be
 * rendered in ascending id order.
 */
import { logger } from "@stepform/utils";
import type { RelativePosition, TerminalBuffer } from "./buffer";
import { type Element, type ElementId, elementId, elementKey, sameElement } from "./element";
import { CoordinatorError } from "./errors";
import type { InterfaceLayout } from "./layout";
import type { Line, LineId, Segment, SegmentId } from "./line";

interface ElementRecord {
	readonly id: ElementId;
	/** The line this element currently shares with its inline siblings. */
	inlineLine: LineId;
	/** This element's segments on `inlineLine`, left to right. */
	segments: SegmentId[];
	/** Lines owned by this element alone, directly after `inlineLine`. */
	blockLines: LineId[];
}

/** The elements of one step, in declaration order. */
export interface StepElements {
	readonly elements: readonly Element[];
}

function formatId(id: ElementId): string {
	return `(${id.step}, ${id.element})`;
}

export class Coordinator {
	#records = new Map<string, ElementRecord>();
	// Records in ascending id order
	#order: ElementRecord[] = [];
	// Inline line -> elements sharing it, in id order
	#inlineLines = new Map<LineId, ElementId[]>();
	#initialized = false;

	constructor(readonly buffer: TerminalBuffer) {}

	/**
	 * Assign ids to every element and give each step an inline line shared by its elements.
	 * Must run once, before any render. Steps without elements get no line.
	 */
	initializeElements(steps: readonly StepElements[]): void {
		if (this.#initialized) {
			throw new CoordinatorError("Elements are already initialized");
		}

		steps.forEach((step, stepIndex) => {
			if (step.elements.length === 0) return;

			const inlineLine = this.buffer.addLine().id;
			const members: ElementId[] = [];
			this.#inlineLines.set(inlineLine, members);

			step.elements.forEach((element, index) => {
				const id = elementId(stepIndex, index);
				element.setId(id);

				const record: ElementRecord = { id, inlineLine, segments: [], blockLines: [] };
				this.#records.set(elementKey(id), record);
				this.#order.push(record);
				members.push(id);
			});
		});

		this.#initialized = true;
	}

	/** Place the cursor relative to buffer content. */
	setCursor(position: RelativePosition): void {
		this.buffer.setCursor(position);
	}

	hideCursor(): void {
		this.buffer.hideCursor();
	}

	/** Paint staged changes and return the frame's layout. */
	applyChanges(): InterfaceLayout {
		return this.buffer.applyChanges();
	}

	// ---------------------------------------------------------------------------------------------
	// Segments
	// ---------------------------------------------------------------------------------------------

	/** The element's inline segments, left to right. */
	segments(id: ElementId): Segment[] {
		const record = this.#record(id);
		return this.buffer.getLine(record.inlineLine).getSegments(record.segments);
	}

	segmentIds(id: ElementId): readonly SegmentId[] {
		return [...this.#record(id).segments];
	}

	/** One of the element's inline segments. The returned segment is mutable. */
	getSegment(id: ElementId, segmentId: SegmentId): Segment {
		const record = this.#record(id);
		if (!record.segments.includes(segmentId)) {
			throw new CoordinatorError(`Element ${formatId(id)} does not own segment ${segmentId}`, { segment: segmentId });
		}
		return this.buffer.getLine(record.inlineLine).getSegment(segmentId);
	}

	/**
	 * The element's current inline line. It changes when a preceding sibling splits or joins, so
	 * it should not be held across frames.
	 */
	getInlineLineId(id: ElementId): LineId {
		return this.#record(id).inlineLine;
	}

	/** Append an inline segment to the element's run. */
	addSegment(id: ElementId): Segment {
		return this.insertSegment(id, this.#record(id).segments.length);
	}

	/** Insert an inline segment at `index` within the element's run. */
	insertSegment(id: ElementId, index: number): Segment {
		const record = this.#record(id);
		this.#checkIndex(id, "segment", index, record.segments.length + 1);

		const absolute = this.elementSegmentIndex(id) + index;
		const segment = this.buffer.getLine(record.inlineLine).insertSegment(absolute);
		record.segments.splice(index, 0, segment.id);
		return segment;
	}

	removeSegment(id: ElementId, segmentId: SegmentId): void {
		const record = this.#record(id);
		const index = record.segments.indexOf(segmentId);
		if (index === -1) {
			throw new CoordinatorError(`Element ${formatId(id)} does not own segment ${segmentId}`, { segment: segmentId });
		}

		this.buffer.getLine(record.inlineLine).removeSegment(segmentId);
		record.segments.splice(index, 1);
	}

	removeSegmentAt(id: ElementId, index: number): void {
		const record = this.#record(id);
		this.#checkIndex(id, "segment", index, record.segments.length);

		const absolute = this.elementSegmentIndex(id) + index;
		this.buffer.getLine(record.inlineLine).removeSegmentAt(absolute);
		record.segments.splice(index, 1);
	}

	// ---------------------------------------------------------------------------------------------
	// Block lines
	// ---------------------------------------------------------------------------------------------

	/** The element's block lines, top to bottom. */
	lines(id: ElementId): Line[] {
		return this.buffer.getLines(this.#record(id).blockLines);
	}

	blockLineIds(id: ElementId): readonly LineId[] {
		return [...this.#record(id).blockLines];
	}

	/** One of the element's block lines. */
	getLine(id: ElementId, lineId: LineId): Line {
		const record = this.#record(id);
		if (!record.blockLines.includes(lineId)) {
			throw new CoordinatorError(`Element ${formatId(id)} does not own line ${lineId}`, { line: lineId });
		}
		return this.buffer.getLine(lineId);
	}

	/** Append a block line to the element. */
	addLine(id: ElementId): Line {
		return this.insertLine(id, this.#record(id).blockLines.length);
	}

	/** Insert a block line at `index` among the element's block lines. */
	insertLine(id: ElementId, index: number): Line {
		const record = this.#record(id);
		this.#checkIndex(id, "line", index, record.blockLines.length + 1);

		// Block lines must never sit between this element's inline run and a later sibling's
		if (record.blockLines.length === 0) {
			this.trySplit(id);
		}

		const row =
			record.blockLines.length === 0
				? this.elementLineIndex(id)
				: this.buffer.getLineIndex(record.blockLines[0]) + index;
		const line = this.buffer.insertLine(row);
		record.blockLines.splice(index, 0, line.id);
		return line;
	}

	removeLine(id: ElementId, lineId: LineId): void {
		const record = this.#record(id);
		const index = record.blockLines.indexOf(lineId);
		if (index === -1) {
			throw new CoordinatorError(`Element ${formatId(id)} does not own line ${lineId}`, { line: lineId });
		}

		this.buffer.removeLine(lineId);
		record.blockLines.splice(index, 1);
		if (record.blockLines.length === 0) {
			this.tryJoin(id);
		}
	}

	removeLineAt(id: ElementId, index: number): void {
		const record = this.#record(id);
		this.#checkIndex(id, "line", index, record.blockLines.length);

		this.buffer.removeLineAt(this.buffer.getLineIndex(record.blockLines[0]) + index);
		record.blockLines.splice(index, 1);
		if (record.blockLines.length === 0) {
			this.tryJoin(id);
		}
	}

	// ---------------------------------------------------------------------------------------------
	// Split and join
	// ---------------------------------------------------------------------------------------------

	/**
	 * Move the siblings after `id` on its inline line onto a new line inserted after this element's
	 * section. Returns whether a split happened; with no later siblings this is a no-op.
	 */
	trySplit(id: ElementId): boolean {
		const record = this.#record(id);
		const members = this.#group(record.inlineLine);
		const position = members.findIndex(member => sameElement(member, id));
		const subsequent = members.slice(position + 1);
		if (subsequent.length === 0) return false;

		const splitIndex = this.elementSegmentIndex(id) + record.segments.length;
		const lineIndex = this.buffer.getLineIndex(record.inlineLine) + record.blockLines.length;
		const newLine = this.buffer.insertLine(lineIndex + 1).id;

		const moving = this.buffer.getLine(record.inlineLine).segmentIds().slice(splitIndex);
		for (const segmentId of moving) {
			this.buffer.moveSegment(segmentId, record.inlineLine, newLine);
		}

		members.splice(position + 1);
		this.#inlineLines.set(newLine, subsequent);
		for (const member of subsequent) {
			this.#record(member).inlineLine = newLine;
		}

		logger.debug("coordinator: inline split", {
			element: formatId(id),
			line: record.inlineLine,
			newLine,
			moved: subsequent.length,
		});
		return true;
	}

	/**
	 * Merge the inline line directly after this element's section back onto the element's inline
	 * line, when that line belongs to siblings from the same step. Returns whether a join happened;
	 * an element that still owns block lines never joins.
	 */
	tryJoin(id: ElementId): boolean {
		const record = this.#record(id);
		if (record.blockLines.length > 0) return false;

		const lineIds = this.buffer.lineIds();
		const index = lineIds.indexOf(record.inlineLine);
		if (index === -1 || index + 1 >= lineIds.length) return false;

		const nextLine = lineIds[index + 1];
		const following = this.#inlineLines.get(nextLine);
		if (!following || following.length === 0 || following[0].step !== id.step) return false;

		for (const segmentId of this.buffer.getLine(nextLine).segmentIds()) {
			this.buffer.moveSegment(segmentId, nextLine, record.inlineLine);
		}
		this.buffer.removeLine(nextLine);

		this.#inlineLines.delete(nextLine);
		for (const member of following) {
			this.#record(member).inlineLine = record.inlineLine;
		}
		this.#group(record.inlineLine).push(...following);

		logger.debug("coordinator: inline join", {
			element: formatId(id),
			line: record.inlineLine,
			removedLine: nextLine,
			moved: following.length,
		});
		return true;
	}

	// ---------------------------------------------------------------------------------------------
	// Index resolution
	// ---------------------------------------------------------------------------------------------

	/** Elements sharing an inline line, in id order. */
	inlineGroup(lineId: LineId): readonly ElementId[] {
		return [...this.#group(lineId)];
	}

	/** Absolute index on the inline line where this element's run starts. */
	elementSegmentIndex(id: ElementId): number {
		const record = this.#record(id);
		let count = 0;
		for (const member of this.#group(record.inlineLine)) {
			if (sameElement(member, id)) break;
			count += this.#record(member).segments.length;
		}
		return count;
	}

	/**
	 * Absolute row after this element's section: every inline line up to and including its own,
	 * plus every block line of elements up to and including it. Walks all preceding elements.
	 */
	elementLineIndex(id: ElementId): number {
		let lastLine: LineId | undefined;
		let count = 0;
		for (const record of this.#order) {
			count += record.blockLines.length;
			if (record.inlineLine !== lastLine) {
				count += 1;
			}
			lastLine = record.inlineLine;

			if (sameElement(record.id, id)) return count;
		}
		throw new CoordinatorError(`Unknown element ${formatId(id)}`);
	}

	#record(id: ElementId): ElementRecord {
		const record = this.#records.get(elementKey(id));
		if (!record) {
			throw new CoordinatorError(
				this.#initialized ? `Unknown element ${formatId(id)}` : `Element ${formatId(id)} used before initialization`,
			);
		}
		return record;
	}

	#group(lineId: LineId): ElementId[] {
		const members = this.#inlineLines.get(lineId);
		if (!members) {
			throw new CoordinatorError(`Line ${lineId} is not an inline line`, { line: lineId });
		}
		return members;
	}

	#checkIndex(id: ElementId, kind: "segment" | "line", index: number, bound: number): void {
		if (!Number.isInteger(index) || index < 0 || index >= bound) {
			throw new CoordinatorError(`Relative ${kind} index ${index} out of range for element ${formatId(id)}`, {
				index,
				bound,
			});
		}
	}
}
