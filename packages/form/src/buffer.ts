/**
 * Line/segment display buffer with differential painting.
 *
 * The buffer owns an ordered list of lines, each an ordered list of styled segments. Nothing is
 * written to the terminal until `applyChanges()`, which lays every line out at the terminal width,
 * repaints only the rows that differ from the previous frame and reports where each segment landed.
 *
 * Painting is relative: the form occupies the rows below wherever the cursor was when the first
 * frame was written, and every later frame moves up and down within that area.
 */
import { $flag, logger } from "@stepform/utils";
import chalk, { type ChalkInstance } from "chalk";
import { InterfaceError } from "./errors";
import { IdSequence } from "./id";
import type { InterfaceLayout, LineLayout, PartLayout, SegmentLayout } from "./layout";
import { Line, type LineId, type SegmentId } from "./line";
import { applyStyle } from "./style";
import type { Terminal } from "./terminal";
import { graphemes } from "./utils";

/**
 * A cursor location expressed against buffer content rather than screen coordinates.
 * `offset` is a UTF-16 offset into the segment's text.
 */
export interface RelativePosition {
	line: LineId;
	segment: SegmentId;
	offset: number;
}

export interface ScreenPosition {
	row: number;
	column: number;
}

export interface TerminalBufferOptions {
	/** Chalk instance used to paint segment styles. Defaults to chalk's auto-detected level. */
	chalk?: ChalkInstance;
	/** Allocator for line and segment ids. */
	ids?: IdSequence;
	/** Show the hardware cursor at the position set through `setCursor`. */
	showHardwareCursor?: boolean;
	/** Log every repaint decision. */
	debugRedraw?: boolean;
}

interface Frame {
	rows: string[];
	layout: InterfaceLayout;
}

/** Text written for a grapheme: tabs expand, other control characters are dropped. */
function displayText(grapheme: string): string {
	if (grapheme === "\t") return "   ";
	const code = grapheme.charCodeAt(0);
	if (code < 0x20 || code === 0x7f) return "";
	return grapheme;
}

function sum(values: readonly number[]): number {
	let total = 0;
	for (const value of values) total += value;
	return total;
}

export class TerminalBuffer {
	#lines: Line[] = [];
	#ids: IdSequence;
	#chalk: ChalkInstance;
	#cursor: RelativePosition | null = null;
	#showHardwareCursor: boolean;
	#debugRedraw: boolean;

	#previousRows: string[] = [];
	#previousWidth = 0;
	#cursorRow = 0; // Row of the hardware cursor within the painted area
	#lastCursorKey = "";
	#paintCount = 0;

	constructor(
		readonly terminal: Terminal,
		options: TerminalBufferOptions = {},
	) {
		this.#ids = options.ids ?? new IdSequence();
		this.#chalk = options.chalk ?? chalk;
		this.#showHardwareCursor = options.showHardwareCursor ?? $flag("STEPFORM_HARDWARE_CURSOR", true);
		this.#debugRedraw = options.debugRedraw ?? $flag("STEPFORM_DEBUG_REDRAW", false);
	}

	/** Number of frames that wrote row content to the terminal. */
	get paints(): number {
		return this.#paintCount;
	}

	/** Rows written by the last frame, with styles applied. */
	get paintedRows(): readonly string[] {
		return this.#previousRows;
	}

	get lineCount(): number {
		return this.#lines.length;
	}

	lineIds(): LineId[] {
		return this.#lines.map(line => line.id);
	}

	/** Append a new, empty line. */
	addLine(): Line {
		return this.insertLine(this.#lines.length);
	}

	/** Insert a new, empty line so that it ends up at `index`. */
	insertLine(index: number): Line {
		if (!Number.isInteger(index) || index < 0 || index > this.#lines.length) {
			throw new InterfaceError("index-out-of-range", `Line index ${index} out of range`, {
				index,
				length: this.#lines.length,
			});
		}
		const line = new Line(this.#ids.next(), this.#ids);
		this.#lines.splice(index, 0, line);
		return line;
	}

	removeLine(lineId: LineId): void {
		this.#lines.splice(this.getLineIndex(lineId), 1);
	}

	removeLineAt(index: number): void {
		if (!Number.isInteger(index) || index < 0 || index >= this.#lines.length) {
			throw new InterfaceError("index-out-of-range", `Line index ${index} out of range`, {
				index,
				length: this.#lines.length,
			});
		}
		this.#lines.splice(index, 1);
	}

	getLine(lineId: LineId): Line {
		return this.#lines[this.getLineIndex(lineId)];
	}

	getLines(lineIds: readonly LineId[]): Line[] {
		return lineIds.map(id => this.getLine(id));
	}

	getLineIndex(lineId: LineId): number {
		const index = this.#lines.findIndex(line => line.id === lineId);
		if (index === -1) {
			throw new InterfaceError("line-not-found", `Line ${lineId} is not in the buffer`, { line: lineId });
		}
		return index;
	}

	/** Move a segment from one line to the end of another. */
	moveSegment(segmentId: SegmentId, fromLineId: LineId, toLineId: LineId): void {
		const source = this.getLine(fromLineId);
		const target = this.getLine(toLineId);
		target.appendSegment(source.removeSegment(segmentId));
	}

	setCursor(position: RelativePosition): void {
		this.#cursor = position;
	}

	hideCursor(): void {
		this.#cursor = null;
	}

	/**
	 * Paint pending changes and return the resulting layout.
	 */
	applyChanges(): InterfaceLayout {
		const width = Math.max(1, this.terminal.columns);
		const { rows, layout } = this.#layout(width);
		const cursor = this.#resolveCursor(layout, width);
		const previous = this.#previousRows;

		let buffer = "";
		const widthChanged = this.#previousWidth !== 0 && this.#previousWidth !== width;
		if (widthChanged) {
			// Previous rows were wrapped at another width; repaint the whole area
			this.#logRedraw(`width changed (${this.#previousWidth} -> ${width})`, previous.length, rows.length);
			buffer += `${this.#moveRows(-this.#cursorRow)}\r\x1b[J${rows.join("\r\n")}`;
			this.#cursorRow = Math.max(0, rows.length - 1);
		} else {
			let firstChanged = -1;
			const maxRows = Math.max(rows.length, previous.length);
			for (let i = 0; i < maxRows; i++) {
				if (rows[i] !== previous[i]) {
					firstChanged = i;
					break;
				}
			}

			if (firstChanged !== -1) {
				if (rows.length === 0) {
					this.#logRedraw("cleared", previous.length, 0);
					buffer += `${this.#moveRows(-this.#cursorRow)}\r\x1b[J`;
					this.#cursorRow = 0;
				} else if (previous.length === 0) {
					this.#logRedraw("first render", 0, rows.length);
					buffer += rows.join("\r\n");
					this.#cursorRow = rows.length - 1;
				} else {
					const start = Math.min(firstChanged, rows.length - 1);
					this.#logRedraw(`diff from row ${start}`, previous.length, rows.length);
					if (start < previous.length) {
						buffer += `${this.#moveRows(start - this.#cursorRow)}\r`;
					} else {
						buffer += `${this.#moveRows(previous.length - 1 - this.#cursorRow)}\r\n`;
					}
					for (let i = start; i < rows.length; i++) {
						if (i > start) buffer += "\r\n";
						buffer += `\x1b[2K${rows[i]}`;
					}
					this.#cursorRow = rows.length - 1;
					// Erase rows left over from a taller frame
					if (rows.length < previous.length) {
						buffer += "\r\n\x1b[J\x1b[1A";
					}
				}
			}
		}

		const shown = this.#showHardwareCursor ? cursor : null;
		let cursorKey = "hidden";
		let cursorSequence = "\x1b[?25l";
		if (shown) {
			const column = shown.column > 0 ? `\x1b[${shown.column}C` : "";
			cursorKey = `${shown.row}:${shown.column}`;
			cursorSequence = `${this.#moveRows(shown.row - this.#cursorRow)}\r${column}\x1b[?25h`;
			this.#cursorRow = shown.row;
		}

		if (buffer) {
			this.#paintCount += 1;
			this.terminal.write(`\x1b[?2026h\x1b[?25l${buffer}${cursorSequence}\x1b[?2026l`);
		} else if (cursorKey !== this.#lastCursorKey) {
			this.terminal.write(cursorSequence);
		}

		this.#lastCursorKey = cursorKey;
		this.#previousRows = rows;
		this.#previousWidth = width;
		return layout;
	}

	/**
	 * Move the hardware cursor to the row below the painted area and show it. The next frame is
	 * painted from there as a fresh area.
	 */
	advanceToEnd(): void {
		let buffer = "";
		if (this.#previousRows.length > 0) {
			buffer += `${this.#moveRows(this.#previousRows.length - 1 - this.#cursorRow)}\r\n`;
		}
		buffer += "\x1b[?25h";
		this.terminal.write(buffer);
		this.#previousRows = [];
		this.#previousWidth = 0;
		this.#cursorRow = 0;
		this.#lastCursorKey = "";
	}

	#moveRows(delta: number): string {
		if (delta < 0) return `\x1b[${-delta}A`;
		if (delta > 0) return `\x1b[${delta}B`;
		return "";
	}

	#layout(width: number): Frame {
		const rows: string[] = [];
		const lines: LineLayout[] = [];

		for (const line of this.#lines) {
			const firstRow = rows.length;
			let row = firstRow;
			let column = 0;
			let rowText = "";
			const segments: SegmentLayout[] = [];

			for (const segment of line.segments()) {
				const parts: PartLayout[] = [];
				let part: PartLayout = { row, column, widths: [] };
				let partText = "";

				for (const grapheme of graphemes(segment.text)) {
					// Wrap before a grapheme that would cross the right edge; wide characters never split
					if (grapheme.width > 0 && column > 0 && column + grapheme.width > width) {
						rowText += applyStyle(this.#chalk, partText, segment.style);
						if (part.widths.length > 0) parts.push(part);
						rows.push(rowText);
						row += 1;
						column = 0;
						rowText = "";
						partText = "";
						part = { row, column, widths: [] };
					}
					part.widths.push(grapheme.width);
					partText += displayText(grapheme.text);
					column += grapheme.width;
				}

				rowText += applyStyle(this.#chalk, partText, segment.style);
				parts.push(part);
				segments.push({ segmentId: segment.id, parts });
			}

			rows.push(rowText);
			lines.push({ lineId: line.id, row: firstRow, rows: rows.length - firstRow, segments });
		}

		return { rows, layout: { width, lines } };
	}

	#resolveCursor(layout: InterfaceLayout, width: number): ScreenPosition | null {
		const position = this.#cursor;
		if (!position) return null;

		const segment = this.getLine(position.line).getSegment(position.segment);
		const segmentLayout = layout.lines
			.find(line => line.lineId === position.line)
			?.segments.find(candidate => candidate.segmentId === position.segment);
		if (!segmentLayout) return null;

		let remaining = graphemes(segment.text).filter(grapheme => grapheme.index < position.offset).length;
		for (const part of segmentLayout.parts) {
			if (remaining < part.widths.length) {
				return { row: part.row, column: part.column + sum(part.widths.slice(0, remaining)) };
			}
			remaining -= part.widths.length;
		}

		const last = segmentLayout.parts[segmentLayout.parts.length - 1];
		// A cursor past a full row stays on the last column, as the terminal itself would show it
		const column = Math.min(last.column + sum(last.widths), width - 1);
		return { row: last.row, column };
	}

	#logRedraw(reason: string, previousRows: number, rows: number): void {
		if (!this.#debugRedraw) return;
		logger.debug(`buffer paint: ${reason}`, { previousRows, rows, width: this.terminal.columns });
	}
}
