import { describe, expect, it } from "vitest";
import { char, ctrl, key } from "../src/keys";
import { TextModel } from "../src/text";

describe("TextModel", () => {
	describe("single line", () => {
		it("inserts at the cursor", () => {
			const text = new TextModel(false);
			text.update(char("h"));
			text.insert("ello");
			expect(text.value()).toBe("hello");
			expect(text.cursor()).toEqual({ line: 0, column: 5 });

			text.update(key("left"));
			text.update(key("left"));
			text.update(char("X"));
			expect(text.value()).toBe("helXlo");
			expect(text.cursor()).toEqual({ line: 0, column: 4 });
		});

		it("moves to either end with Home and End", () => {
			const text = new TextModel(false, "abc");
			expect(text.update(key("home"))).toBe(true);
			expect(text.cursor().column).toBe(0);
			expect(text.update(key("home"))).toBe(false);
			expect(text.update(key("end"))).toBe(true);
			expect(text.cursor().column).toBe(3);
		});

		it("ignores Enter and strips newlines from inserted text", () => {
			const text = new TextModel(false, "ab");
			expect(text.update(key("enter"))).toBe(false);
			text.insert("\ncd\r\n");
			expect(text.value()).toBe("abcd");
			expect(text.lines()).toEqual(["abcd"]);
		});

		it("flattens a multi-line value", () => {
			const text = new TextModel(false);
			text.setValue("x\ny");
			expect(text.value()).toBe("xy");
		});

		it("deletes whole graphemes", () => {
			const text = new TextModel(false, "e\u0301x");
			expect(text.cursor().column).toBe(3);

			text.update(key("left"));
			expect(text.cursor().column).toBe(2);
			text.update(key("left"));
			expect(text.cursor().column).toBe(0);
			expect(text.update(key("backspace"))).toBe(false);

			text.update(key("delete"));
			expect(text.value()).toBe("x");

			const emoji = new TextModel(false, "a👍");
			emoji.update(key("backspace"));
			expect(emoji.value()).toBe("a");
			expect(emoji.cursor().column).toBe(1);
		});

		it("reports keys it does not handle as unchanged", () => {
			const text = new TextModel(false, "abc");
			expect(text.update(key("tab"))).toBe(false);
			expect(text.update(ctrl("a"))).toBe(false);
			expect(text.update(key("up"))).toBe(false);
			expect(text.update(key("right"))).toBe(false);
		});
	});

	describe("multi line", () => {
		it("splits and joins lines", () => {
			const text = new TextModel(true, "one\ntwo");
			expect(text.cursor()).toEqual({ line: 1, column: 3 });

			text.update(key("enter"));
			expect(text.lines()).toEqual(["one", "two", ""]);
			expect(text.cursor()).toEqual({ line: 2, column: 0 });

			text.update(key("backspace"));
			expect(text.lines()).toEqual(["one", "two"]);
			expect(text.cursor()).toEqual({ line: 1, column: 3 });

			text.update(key("home"));
			text.update(key("backspace"));
			expect(text.lines()).toEqual(["onetwo"]);
			expect(text.cursor()).toEqual({ line: 0, column: 3 });
		});

		it("joins the next line with Delete at the end of a line", () => {
			const text = new TextModel(true, "ab\ncd");
			text.update(key("up"));
			expect(text.cursor()).toEqual({ line: 0, column: 2 });

			text.update(key("delete"));
			expect(text.value()).toBe("abcd");
			expect(text.cursor()).toEqual({ line: 0, column: 2 });
		});

		it("crosses line ends with Left and Right", () => {
			const text = new TextModel(true, "ab\ncd");
			text.update(key("home"));
			text.update(key("left"));
			expect(text.cursor()).toEqual({ line: 0, column: 2 });
			text.update(key("right"));
			expect(text.cursor()).toEqual({ line: 1, column: 0 });
		});

		it("inserts pasted lines", () => {
			const text = new TextModel(true, "start end");
			text.update(key("home"));
			for (let i = 0; i < 6; i++) text.update(key("right"));
			text.insert("one\ntwo\n");
			expect(text.lines()).toEqual(["start one", "two", "end"]);
			expect(text.cursor()).toEqual({ line: 2, column: 0 });
		});

		it("keeps the visual column across consecutive vertical moves", () => {
			const text = new TextModel(true, "abcdef\nab\nabcdef");

			text.update(key("up"));
			expect(text.cursor()).toEqual({ line: 1, column: 2 });
			text.update(key("up"));
			expect(text.cursor()).toEqual({ line: 0, column: 6 });
			expect(text.update(key("up"))).toBe(false);
		});

		it("moves between wrapped rows of one line when a layout is known", () => {
			const text = new TextModel(true, "abcdefgh");
			expect(text.update(key("up"))).toBe(false);

			text.setLayout([
				[
					[1, 1, 1, 1, 1],
					[1, 1, 1],
				],
			]);
			expect(text.update(key("up"))).toBe(true);
			expect(text.cursor()).toEqual({ line: 0, column: 3 });

			text.update(key("down"));
			expect(text.cursor()).toEqual({ line: 0, column: 8 });
		});

		it("falls back to logical lines when the layout no longer matches", () => {
			const text = new TextModel(true, "abcdefgh");
			text.setLayout([[[1, 1, 1, 1]]]);
			expect(text.update(key("up"))).toBe(false);
		});
	});
});
