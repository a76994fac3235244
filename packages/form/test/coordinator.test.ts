import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";
import { TerminalBuffer } from "../src/buffer";
import { Coordinator } from "../src/coordinator";
import { type Element, type ElementId, elementId } from "../src/element";
import { CoordinatorError } from "../src/errors";
import type { SegmentId } from "../src/line";
import { VirtualTerminal } from "./virtual-terminal";

class StubElement implements Element {
	id: ElementId | undefined;

	setId(id: ElementId): void {
		this.id = id;
	}

	render(_coordinator: Coordinator): void {}

	updateLayout(): void {}

	isInput(): boolean {
		return false;
	}

	capturesEnter(): boolean {
		return false;
	}

	update(): boolean {
		return false;
	}
}

/**
 * Walks through three layouts: one inline segment; a second segment inserted in front of it;
 * the second segment swapped for a block line.
 */
class DynamicElement extends StubElement {
	state = 0;
	#base: SegmentId | undefined;
	#prefix: SegmentId | undefined;
	#line: number | undefined;

	override render(coordinator: Coordinator): void {
		const id = this.id;
		if (!id) throw new Error("id not assigned");

		if (this.#base === undefined) {
			this.#base = coordinator.addSegment(id).setText("D0S0").id;
		}

		if (this.state === 1) {
			if (this.#prefix === undefined) {
				this.#prefix = coordinator.insertSegment(id, 0).setText("D0S1").id;
			}
			if (this.#line !== undefined) {
				coordinator.removeLine(id, this.#line);
				this.#line = undefined;
			}
		} else if (this.state === 2) {
			if (this.#prefix !== undefined) {
				coordinator.removeSegment(id, this.#prefix);
				this.#prefix = undefined;
			}
			if (this.#line === undefined) {
				const line = coordinator.addLine(id);
				line.addSegment().setText("D0S2");
				this.#line = line.id;
			}
		}
	}
}

function setup(stepSizes: number[], columns = 40) {
	const terminal = new VirtualTerminal(columns, 10);
	const buffer = new TerminalBuffer(terminal, { chalk: new Chalk({ level: 0 }) });
	const coordinator = new Coordinator(buffer);
	coordinator.initializeElements(
		stepSizes.map(size => ({ elements: Array.from({ length: size }, () => new StubElement()) })),
	);
	return { terminal, buffer, coordinator };
}

function lineTexts(buffer: TerminalBuffer): string[] {
	return buffer.getLines(buffer.lineIds()).map(line => line.text);
}

const A = elementId(0, 0);
const B = elementId(0, 1);
const C = elementId(0, 2);

describe("Coordinator", () => {
	describe("initialization", () => {
		it("assigns ids and shares one inline line per step", () => {
			const buffer = new TerminalBuffer(new VirtualTerminal(40, 10));
			const coordinator = new Coordinator(buffer);
			const first = new StubElement();
			const second = new StubElement();
			const third = new StubElement();
			coordinator.initializeElements([{ elements: [first, second] }, { elements: [third] }]);

			expect(first.id).toEqual({ step: 0, element: 0 });
			expect(second.id).toEqual({ step: 0, element: 1 });
			expect(third.id).toEqual({ step: 1, element: 0 });
			expect(buffer.lineCount).toBe(2);
			expect(coordinator.getInlineLineId(A)).toBe(coordinator.getInlineLineId(B));
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(A))).toEqual([A, B]);
		});

		it("gives steps without elements no line", () => {
			const { buffer, coordinator } = setup([0, 1]);
			expect(buffer.lineCount).toBe(1);
			expect(coordinator.elementLineIndex(elementId(1, 0))).toBe(1);
		});

		it("rejects a second initialization", () => {
			const { coordinator } = setup([1]);
			expect(() => coordinator.initializeElements([])).toThrow(CoordinatorError);
		});

		it("rejects elements used before initialization", () => {
			const coordinator = new Coordinator(new TerminalBuffer(new VirtualTerminal(40, 10)));
			expect(() => coordinator.addSegment(A)).toThrow("Element (0, 0) used before initialization");
		});
	});

	describe("segments", () => {
		it("places each element's run after its preceding siblings", () => {
			const { buffer, coordinator } = setup([3]);
			coordinator.addSegment(A).setText("a0");
			coordinator.addSegment(A).setText("a1");
			coordinator.addSegment(B).setText("b0");
			coordinator.addSegment(C).setText("c0");
			coordinator.addSegment(C).setText("c1");

			expect(coordinator.elementSegmentIndex(A)).toBe(0);
			expect(coordinator.elementSegmentIndex(B)).toBe(2);
			expect(coordinator.elementSegmentIndex(C)).toBe(3);
			expect(lineTexts(buffer)).toEqual(["a0a1b0c0c1"]);
		});

		it("inserts and removes at positions relative to the element's run", () => {
			const { buffer, coordinator } = setup([3]);
			coordinator.addSegment(A).setText("a0");
			coordinator.addSegment(A).setText("a1");
			const b0 = coordinator.addSegment(B).setText("b0");
			coordinator.addSegment(C).setText("c0");

			const inserted = coordinator.insertSegment(B, 0).setText("b-");
			expect(coordinator.segmentIds(B)).toEqual([inserted.id, b0.id]);
			expect(coordinator.elementSegmentIndex(C)).toBe(4);
			expect(lineTexts(buffer)).toEqual(["a0a1b-b0c0"]);

			coordinator.removeSegmentAt(B, 1);
			expect(coordinator.segmentIds(B)).toEqual([inserted.id]);
			expect(lineTexts(buffer)).toEqual(["a0a1b-c0"]);

			coordinator.removeSegment(A, coordinator.segmentIds(A)[0]);
			expect(lineTexts(buffer)).toEqual(["a1b-c0"]);
			expect(coordinator.elementSegmentIndex(B)).toBe(1);
		});

		it("returns the element's own segments in order", () => {
			const { coordinator } = setup([2]);
			coordinator.addSegment(A).setText("x");
			coordinator.addSegment(B).setText("y");
			coordinator.insertSegment(B, 0).setText("w");

			expect(coordinator.segments(B).map(segment => segment.text)).toEqual(["w", "y"]);
		});

		it("rejects segments owned by another element", () => {
			const { coordinator } = setup([2]);
			const theirs = coordinator.addSegment(B);
			expect(() => coordinator.getSegment(A, theirs.id)).toThrow(CoordinatorError);
			expect(() => coordinator.removeSegment(A, theirs.id)).toThrow(CoordinatorError);
		});

		it("rejects relative indices outside the run", () => {
			const { coordinator } = setup([1]);
			coordinator.addSegment(A);
			expect(() => coordinator.insertSegment(A, 2)).toThrow(CoordinatorError);
			expect(() => coordinator.removeSegmentAt(A, 1)).toThrow(CoordinatorError);
			expect(() => coordinator.insertSegment(A, -1)).toThrow(CoordinatorError);
		});

		it("rejects unknown elements", () => {
			const { coordinator } = setup([1]);
			expect(() => coordinator.addSegment(elementId(3, 0))).toThrow("Unknown element (3, 0)");
		});
	});

	describe("split and join", () => {
		function threeElements() {
			const context = setup([3]);
			const { coordinator } = context;
			coordinator.addSegment(A).setText("a0");
			coordinator.addSegment(A).setText("a1");
			coordinator.addSegment(B).setText("b0");
			coordinator.addSegment(C).setText("c0");
			coordinator.addSegment(C).setText("c1");
			return context;
		}

		it("moves the following siblings and their segments to a new line", () => {
			const { buffer, coordinator } = threeElements();
			const original = coordinator.getInlineLineId(A);

			expect(coordinator.trySplit(B)).toBe(true);

			const [first, second] = buffer.lineIds();
			expect(first).toBe(original);
			expect(coordinator.inlineGroup(first)).toEqual([A, B]);
			expect(coordinator.inlineGroup(second)).toEqual([C]);
			expect(coordinator.getInlineLineId(C)).toBe(second);
			expect(coordinator.segments(C).map(segment => segment.text)).toEqual(["c0", "c1"]);
			expect(coordinator.elementSegmentIndex(C)).toBe(0);
			expect(lineTexts(buffer)).toEqual(["a0a1b0", "c0c1"]);
		});

		it("restores the original grouping when joined straight after a split", () => {
			const { buffer, coordinator } = threeElements();
			const before = coordinator.segmentIds(C);

			coordinator.trySplit(A);
			expect(coordinator.inlineGroup(buffer.lineIds()[1])).toEqual([B, C]);
			expect(coordinator.tryJoin(A)).toBe(true);

			expect(buffer.lineCount).toBe(1);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(A))).toEqual([A, B, C]);
			expect(coordinator.segmentIds(C)).toEqual(before);
			expect(lineTexts(buffer)).toEqual(["a0a1b0c0c1"]);
		});

		it("restores the grouping after a split on a middle element", () => {
			const { buffer, coordinator } = threeElements();
			const before = [A, B, C].map(id => coordinator.segmentIds(id));

			expect(coordinator.trySplit(B)).toBe(true);
			expect(lineTexts(buffer)).toEqual(["a0a1b0", "c0c1"]);
			expect(coordinator.tryJoin(B)).toBe(true);

			expect(buffer.lineCount).toBe(1);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(C))).toEqual([A, B, C]);
			expect([A, B, C].map(id => coordinator.segmentIds(id))).toEqual(before);
			expect(lineTexts(buffer)).toEqual(["a0a1b0c0c1"]);
		});

		it("restores a group of two", () => {
			const { buffer, coordinator } = setup([2]);
			coordinator.addSegment(A).setText("a0");
			coordinator.addSegment(B).setText("b0");
			coordinator.addSegment(B).setText("b1");
			const before = [A, B].map(id => coordinator.segmentIds(id));

			expect(coordinator.trySplit(A)).toBe(true);
			expect(lineTexts(buffer)).toEqual(["a0", "b0b1"]);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(A))).toEqual([A]);
			expect(coordinator.tryJoin(A)).toBe(true);

			expect(buffer.lineCount).toBe(1);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(B))).toEqual([A, B]);
			expect([A, B].map(id => coordinator.segmentIds(id))).toEqual(before);
			expect(lineTexts(buffer)).toEqual(["a0b0b1"]);
		});

		it("does nothing without siblings to move or a line to merge", () => {
			const { buffer, coordinator } = threeElements();

			expect(coordinator.trySplit(C)).toBe(false);
			expect(coordinator.tryJoin(C)).toBe(false);
			expect(coordinator.tryJoin(A)).toBe(false);
			expect(buffer.lineCount).toBe(1);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(A))).toEqual([A, B, C]);
		});

		it("never joins lines of different steps", () => {
			const { buffer, coordinator } = setup([2, 1]);
			const line = coordinator.addLine(B);
			expect(buffer.lineCount).toBe(3);

			coordinator.removeLine(B, line.id);
			expect(buffer.lineCount).toBe(2);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(elementId(1, 0)))).toEqual([elementId(1, 0)]);
		});
	});

	describe("block lines", () => {
		it("places block lines contiguously after the element's inline line", () => {
			const { buffer, coordinator } = setup([2]);
			coordinator.addSegment(A).setText("a");
			coordinator.addSegment(B).setText("b");

			const first = coordinator.addLine(A);
			const second = coordinator.addLine(A);

			expect(coordinator.blockLineIds(A)).toEqual([first.id, second.id]);
			expect(buffer.getLineIndex(first.id)).toBe(1);
			expect(buffer.getLineIndex(second.id)).toBe(2);
			expect(buffer.lineIds()).toEqual([
				coordinator.getInlineLineId(A),
				first.id,
				second.id,
				coordinator.getInlineLineId(B),
			]);
			expect(coordinator.elementLineIndex(A)).toBe(3);
			expect(coordinator.elementLineIndex(B)).toBe(4);
		});

		it("inserts block lines at relative positions", () => {
			const { buffer, coordinator } = setup([1]);
			const first = coordinator.addLine(A);
			const second = coordinator.addLine(A);
			const middle = coordinator.insertLine(A, 1);

			expect(coordinator.blockLineIds(A)).toEqual([first.id, middle.id, second.id]);
			expect(buffer.lineIds().slice(1)).toEqual([first.id, middle.id, second.id]);
			expect(coordinator.lines(A).map(line => line.id)).toEqual([first.id, middle.id, second.id]);
		});

		it("joins the split siblings back when the last block line goes", () => {
			const { buffer, coordinator } = setup([2]);
			coordinator.addSegment(A).setText("a");
			coordinator.addSegment(B).setText("b");
			coordinator.addLine(A).addSegment().setText("block 1");
			coordinator.addLine(A).addSegment().setText("block 2");
			expect(lineTexts(buffer)).toEqual(["a", "block 1", "block 2", "b"]);

			coordinator.removeLineAt(A, 0);
			expect(lineTexts(buffer)).toEqual(["a", "block 2", "b"]);

			coordinator.removeLineAt(A, 0);
			expect(lineTexts(buffer)).toEqual(["ab"]);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(A))).toEqual([A, B]);
		});

		it("rejects lines owned by another element", () => {
			const { coordinator } = setup([2]);
			const line = coordinator.addLine(B);
			expect(() => coordinator.getLine(A, line.id)).toThrow(CoordinatorError);
			expect(() => coordinator.removeLine(A, line.id)).toThrow(CoordinatorError);
			expect(() => coordinator.removeLineAt(A, 0)).toThrow(CoordinatorError);
		});
	});

	describe("dynamic element", () => {
		it("splits on acquiring a block line and joins on releasing it", async () => {
			const terminal = new VirtualTerminal(40, 10);
			const buffer = new TerminalBuffer(terminal, { chalk: new Chalk({ level: 0 }) });
			const coordinator = new Coordinator(buffer);
			const dynamic = new DynamicElement();
			const first = new StubElement();
			const second = new StubElement();
			coordinator.initializeElements([{ elements: [dynamic, first, second] }]);

			const frame = (): void => {
				dynamic.render(coordinator);
				if (dynamic.state === 0) {
					coordinator.addSegment(elementId(0, 1)).setText("E0S1");
					coordinator.addSegment(elementId(0, 2)).setText("E1S1");
				}
				coordinator.applyChanges();
			};

			frame();
			await terminal.flush();
			expect(terminal.getViewport().slice(0, 3)).toEqual(["D0S0E0S1E1S1", "", ""]);

			dynamic.state = 1;
			frame();
			expect(lineTexts(buffer)).toEqual(["D0S1D0S0E0S1E1S1"]);

			dynamic.state = 2;
			frame();
			await terminal.flush();
			expect(lineTexts(buffer)).toEqual(["D0S0", "D0S2", "E0S1E1S1"]);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(elementId(0, 1)))).toEqual([
				elementId(0, 1),
				elementId(0, 2),
			]);
			expect(terminal.getViewport().slice(0, 3)).toEqual(["D0S0", "D0S2", "E0S1E1S1"]);

			dynamic.state = 1;
			frame();
			await terminal.flush();
			expect(lineTexts(buffer)).toEqual(["D0S1D0S0E0S1E1S1"]);
			expect(coordinator.inlineGroup(coordinator.getInlineLineId(elementId(0, 0)))).toEqual([
				elementId(0, 0),
				elementId(0, 1),
				elementId(0, 2),
			]);
			expect(terminal.getViewport().slice(0, 3)).toEqual(["D0S1D0S0E0S1E1S1", "", ""]);
		});
	});
});
