/**
 * Decoding of raw terminal input into key events.
 */
import { getSegmenter } from "./utils";

export type KeyName =
	| "enter"
	| "escape"
	| "backspace"
	| "delete"
	| "tab"
	| "up"
	| "down"
	| "left"
	| "right"
	| "home"
	| "end";

export type Key =
	/** A named, non-printable key. */
	| { type: "key"; name: KeyName }
	/** Printable text: a single grapheme, or a longer run from a paste. */
	| { type: "char"; char: string }
	/** A control chord such as Ctrl+C, carried as the lower-case letter. */
	| { type: "ctrl"; char: string };

export function key(name: KeyName): Key {
	return { type: "key", name };
}

export function char(text: string): Key {
	return { type: "char", char: text };
}

export function ctrl(letter: string): Key {
	return { type: "ctrl", char: letter.toLowerCase() };
}

/** Whether `k` is the named key `name`. */
export function isKey(k: Key, name: KeyName): boolean {
	return k.type === "key" && k.name === name;
}

/** Whether `k` is Ctrl plus the given letter. */
export function isCtrl(k: Key, letter: string): boolean {
	return k.type === "ctrl" && k.char === letter.toLowerCase();
}

// Final bytes of CSI/SS3 cursor sequences (\x1b[A, \x1bOA, \x1b[1;5A ...)
const CURSOR_FINALS: Record<string, KeyName> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
};

// Numeric parameters of CSI ~ sequences (\x1b[3~ ...)
const TILDE_CODES: Record<string, KeyName> = {
	"1": "home",
	"3": "delete",
	"4": "end",
	"7": "home",
	"8": "end",
};

const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

/**
 * Split a chunk of terminal input into keys. Unknown escape sequences are dropped; a paste
 * wrapped in bracketed paste markers becomes one `char` key, its line breaks normalized to `\n`.
 */
export function parseKeys(data: string): Key[] {
	const keys: Key[] = [];
	let i = 0;
	let text = "";

	const flushText = (): void => {
		if (!text) return;
		for (const { segment } of getSegmenter().segment(text)) keys.push(char(segment));
		text = "";
	};

	while (i < data.length) {
		const code = data.charCodeAt(i);

		if (data.startsWith(BRACKETED_PASTE_START, i)) {
			flushText();
			const start = i + BRACKETED_PASTE_START.length;
			const end = data.indexOf(BRACKETED_PASTE_END, start);
			const content = end === -1 ? data.slice(start) : data.slice(start, end);
			const pasted = content.replace(/\r\n?/g, "\n");
			if (pasted) keys.push(char(pasted));
			i = end === -1 ? data.length : end + BRACKETED_PASTE_END.length;
			continue;
		}

		if (code === 0x1b) {
			flushText();
			const next = data[i + 1];
			if (next === "[") {
				// CSI: parameters up to a final byte in 0x40-0x7e
				let j = i + 2;
				while (j < data.length && !(data.charCodeAt(j) >= 0x40 && data.charCodeAt(j) <= 0x7e)) j++;
				if (j >= data.length) {
					i = data.length;
					continue;
				}
				const params = data.slice(i + 2, j);
				const final = data[j];
				if (final === "~") {
					const name = TILDE_CODES[params.split(";")[0]];
					if (name) keys.push(key(name));
				} else if (final === "Z") {
					// Shift+Tab is treated as Tab
					keys.push(key("tab"));
				} else {
					const name = CURSOR_FINALS[final];
					if (name) keys.push(key(name));
				}
				i = j + 1;
				continue;
			}
			if (next === "O" && i + 2 < data.length) {
				const name = CURSOR_FINALS[data[i + 2]];
				if (name) keys.push(key(name));
				i += 3;
				continue;
			}
			keys.push(key("escape"));
			i += 1;
			continue;
		}

		if (code === 0x0d || code === 0x0a) {
			flushText();
			keys.push(key("enter"));
			// \r\n counts once
			i += code === 0x0d && data.charCodeAt(i + 1) === 0x0a ? 2 : 1;
			continue;
		}

		if (code === 0x7f || code === 0x08) {
			flushText();
			keys.push(key("backspace"));
			i += 1;
			continue;
		}

		if (code === 0x09) {
			flushText();
			keys.push(key("tab"));
			i += 1;
			continue;
		}

		if (code >= 0x01 && code <= 0x1a) {
			flushText();
			keys.push(ctrl(String.fromCharCode(code + 0x60)));
			i += 1;
			continue;
		}

		if (code < 0x20) {
			// Remaining C0 controls carry no key meaning
			flushText();
			i += 1;
			continue;
		}

		text += data[i];
		i += 1;
	}

	flushText();
	return keys;
}
