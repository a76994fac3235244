import { isKey, type Key } from "./keys";
import { graphemeLengthAfter, graphemeLengthBefore, graphemes } from "./utils";

export interface TextCursor {
	line: number;
	/** UTF-16 offset into the line, always on a grapheme boundary. */
	column: number;
}

/** Column widths of the graphemes painted on one terminal row. */
export type RowLayout = number[];

/** The rows one logical line was painted on. */
export type LineRows = RowLayout[];

interface VisualRow {
	line: number;
	/** Index of the row's first grapheme within the line. */
	start: number;
	widths: number[];
	last: boolean;
}

/**
 * Editable text with a cursor: the content model behind text inputs.
 *
 * Vertical movement follows painted rows when a layout from the last frame is known and still
 * matches the content, and logical lines otherwise.
 */
export class TextModel {
	#lines: string[] = [""];
	#cursor: TextCursor = { line: 0, column: 0 };
	#layout: LineRows[] | undefined;
	#goalX: number | undefined; // Visual column kept across consecutive up/down moves

	constructor(
		readonly multiLine: boolean,
		value = "",
	) {
		this.setValue(value);
	}

	value(): string {
		return this.#lines.join("\n");
	}

	/** Replace the content and move the cursor to its end. */
	setValue(value: string): void {
		const lines = value.split(/\r?\n/);
		this.#lines = this.multiLine ? lines : [lines.join("")];
		const line = this.#lines.length - 1;
		this.#cursor = { line, column: this.#lines[line].length };
		this.#goalX = undefined;
	}

	lines(): readonly string[] {
		return this.#lines;
	}

	cursor(): TextCursor {
		return { ...this.#cursor };
	}

	/** Record the rows each line was painted on. */
	setLayout(layout: LineRows[]): void {
		this.#layout = layout;
	}

	/**
	 * Apply a key. Returns whether the content or cursor changed.
	 */
	update(key: Key): boolean {
		if (key.type === "char") {
			this.insert(key.char);
			return true;
		}
		if (key.type !== "key") return false;

		const vertical = isKey(key, "up") || isKey(key, "down");
		if (!vertical) this.#goalX = undefined;

		switch (key.name) {
			case "enter":
				return this.newline();
			case "backspace":
				return this.backspace();
			case "delete":
				return this.deleteForward();
			case "left":
				return this.left();
			case "right":
				return this.right();
			case "up":
				return this.#moveVertical(-1);
			case "down":
				return this.#moveVertical(1);
			case "home":
				return this.#setColumn(0);
			case "end":
				return this.#setColumn(this.#lines[this.#cursor.line].length);
			default:
				return false;
		}
	}

	insert(text: string): void {
		const cleaned = this.multiLine ? text : text.replace(/\r?\n|\r/g, "");
		const parts = cleaned.split(/\r\n|\r|\n/);
		const { line, column } = this.#cursor;
		const current = this.#lines[line];
		const before = current.slice(0, column);
		const after = current.slice(column);

		if (parts.length === 1) {
			this.#lines[line] = before + cleaned + after;
			this.#cursor = { line, column: column + cleaned.length };
			return;
		}

		const last = parts[parts.length - 1];
		const inserted = [before + parts[0], ...parts.slice(1, -1), last + after];
		this.#lines.splice(line, 1, ...inserted);
		this.#cursor = { line: line + parts.length - 1, column: last.length };
	}

	newline(): boolean {
		if (!this.multiLine) return false;
		const { line, column } = this.#cursor;
		const current = this.#lines[line];
		this.#lines.splice(line, 1, current.slice(0, column), current.slice(column));
		this.#cursor = { line: line + 1, column: 0 };
		return true;
	}

	backspace(): boolean {
		const { line, column } = this.#cursor;
		const current = this.#lines[line];
		if (column > 0) {
			const length = graphemeLengthBefore(current, column);
			this.#lines[line] = current.slice(0, column - length) + current.slice(column);
			this.#cursor = { line, column: column - length };
			return true;
		}
		if (line === 0) return false;

		const previous = this.#lines[line - 1];
		this.#lines.splice(line - 1, 2, previous + current);
		this.#cursor = { line: line - 1, column: previous.length };
		return true;
	}

	deleteForward(): boolean {
		const { line, column } = this.#cursor;
		const current = this.#lines[line];
		if (column < current.length) {
			const length = graphemeLengthAfter(current, column);
			this.#lines[line] = current.slice(0, column) + current.slice(column + length);
			return true;
		}
		if (line === this.#lines.length - 1) return false;

		this.#lines.splice(line, 2, current + this.#lines[line + 1]);
		return true;
	}

	left(): boolean {
		const { line, column } = this.#cursor;
		if (column > 0) {
			this.#cursor = { line, column: column - graphemeLengthBefore(this.#lines[line], column) };
			return true;
		}
		if (line === 0) return false;
		this.#cursor = { line: line - 1, column: this.#lines[line - 1].length };
		return true;
	}

	right(): boolean {
		const { line, column } = this.#cursor;
		const current = this.#lines[line];
		if (column < current.length) {
			this.#cursor = { line, column: column + graphemeLengthAfter(current, column) };
			return true;
		}
		if (line === this.#lines.length - 1) return false;
		this.#cursor = { line: line + 1, column: 0 };
		return true;
	}

	#setColumn(column: number): boolean {
		if (this.#cursor.column === column) return false;
		this.#cursor = { line: this.#cursor.line, column };
		return true;
	}

	#moveVertical(direction: -1 | 1): boolean {
		if (!this.multiLine) return false;

		const rows = this.#visualRows();
		const lineGraphemes = graphemes(this.#lines[this.#cursor.line]);
		const index = lineGraphemes.filter(grapheme => grapheme.index < this.#cursor.column).length;

		let current = rows.findIndex(
			row => row.line === this.#cursor.line && index >= row.start && (index < row.start + row.widths.length || row.last),
		);
		if (current === -1) current = 0;
		const target = rows[current + direction];
		if (!target) return false;

		const currentRow = rows[current];
		let x = 0;
		for (let i = 0; i < index - currentRow.start; i++) x += currentRow.widths[i];
		const goalX = this.#goalX ?? x;

		// Last grapheme whose left edge is at or before the goal column
		const limit = target.last ? target.widths.length : Math.max(0, target.widths.length - 1);
		let offset = 0;
		let acc = 0;
		while (offset < limit && acc + target.widths[offset] <= goalX) {
			acc += target.widths[offset];
			offset += 1;
		}

		const targetGraphemes = graphemes(this.#lines[target.line]);
		const targetIndex = target.start + offset;
		const column =
			targetIndex < targetGraphemes.length ? targetGraphemes[targetIndex].index : this.#lines[target.line].length;
		this.#cursor = { line: target.line, column };
		this.#goalX = goalX;
		return true;
	}

	#visualRows(): VisualRow[] {
		const layout = this.#layout;
		const rows: VisualRow[] = [];
		const usable = layout !== undefined && layout.length === this.#lines.length;

		for (let line = 0; line < this.#lines.length; line++) {
			const widths = graphemes(this.#lines[line]).map(grapheme => grapheme.width);
			const painted = usable && layout ? layout[line] : undefined;
			const paintedCount = painted?.reduce((total, row) => total + row.length, 0);

			if (!painted || painted.length === 0 || paintedCount !== widths.length) {
				rows.push({ line, start: 0, widths, last: true });
				continue;
			}

			let start = 0;
			painted.forEach((row, i) => {
				rows.push({ line, start, widths: widths.slice(start, start + row.length), last: i === painted.length - 1 });
				start += row.length;
			});
		}
		return rows;
	}
}
