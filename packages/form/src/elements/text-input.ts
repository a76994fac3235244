import type { Coordinator } from "../coordinator";
import type { ValueSource } from "../dependency";
import type { Element, ElementId, Focusable } from "../element";
import { CoordinatorError } from "../errors";
import type { Key } from "../keys";
import type { LayoutAccessor, SegmentLayout } from "../layout";
import type { LineId, SegmentId } from "../line";
import type { Style } from "../style";
import { type LineRows, TextModel } from "../text";

export interface TextInputOptions {
	/** Accept several lines; Enter then inserts a line break instead of advancing. */
	multiLine?: boolean;
	/** Initial value. */
	value?: string;
	style?: Style;
}

interface BlockRow {
	lineId: LineId;
	segmentId: SegmentId;
}

function rowsOf(layout: SegmentLayout): LineRows {
	return layout.parts.map(part => part.widths);
}

/**
 * Editable text. A single-line input is one inline segment; a multi-line input owns one block
 * line per line of text.
 */
export class TextInput implements Element, Focusable, ValueSource {
	focused = false;
	readonly multiLine: boolean;
	readonly style: Style | undefined;

	#id: ElementId | undefined;
	#model: TextModel;
	#segmentId: SegmentId | undefined;
	#rows: BlockRow[] = [];

	constructor(options: TextInputOptions = {}) {
		this.multiLine = options.multiLine ?? false;
		this.style = options.style;
		this.#model = new TextModel(this.multiLine, options.value ?? "");
	}

	get model(): TextModel {
		return this.#model;
	}

	value(): string {
		return this.#model.value();
	}

	setValue(value: string): void {
		this.#model.setValue(value);
	}

	setId(id: ElementId): void {
		this.#id = id;
	}

	render(coordinator: Coordinator): void {
		if (this.multiLine) {
			this.#renderMulti(coordinator);
		} else {
			this.#renderSingle(coordinator);
		}
	}

	#renderSingle(coordinator: Coordinator): void {
		const id = this.#requireId();
		if (this.#segmentId === undefined) {
			this.#segmentId = coordinator.addSegment(id).id;
		}
		coordinator.getSegment(id, this.#segmentId).setText(this.#model.value()).setStyle(this.style);

		if (this.focused) {
			coordinator.setCursor({
				line: coordinator.getInlineLineId(id),
				segment: this.#segmentId,
				offset: this.#model.cursor().column,
			});
		}
	}

	#renderMulti(coordinator: Coordinator): void {
		const id = this.#requireId();
		const lines = this.#model.lines();

		lines.forEach((text, index) => {
			let row = this.#rows[index];
			if (!row) {
				const line = coordinator.addLine(id);
				row = { lineId: line.id, segmentId: line.addSegment().id };
				this.#rows.push(row);
			}
			coordinator.getLine(id, row.lineId).getSegment(row.segmentId).setText(text).setStyle(this.style);
		});

		while (this.#rows.length > lines.length) {
			const row = this.#rows.pop();
			if (row) coordinator.removeLine(id, row.lineId);
		}

		if (this.focused) {
			const cursor = this.#model.cursor();
			const row = this.#rows[cursor.line];
			coordinator.setCursor({ line: row.lineId, segment: row.segmentId, offset: cursor.column });
		}
	}

	updateLayout(layout: LayoutAccessor): void {
		const segmentIds = this.multiLine
			? this.#rows.map(row => row.segmentId)
			: this.#segmentId === undefined
				? []
				: [this.#segmentId];

		const lineRows: LineRows[] = [];
		for (const segmentId of segmentIds) {
			const segment = layout.getSegment(segmentId);
			// Not painted this frame; keep the previous layout
			if (!segment) return;
			lineRows.push(rowsOf(segment));
		}
		if (lineRows.length > 0) this.#model.setLayout(lineRows);
	}

	isInput(): boolean {
		return true;
	}

	capturesEnter(): boolean {
		return this.multiLine;
	}

	update(key: Key): boolean {
		this.#model.update(key);
		return false;
	}

	#requireId(): ElementId {
		if (!this.#id) throw new CoordinatorError("Text input rendered before its id was assigned");
		return this.#id;
	}
}
