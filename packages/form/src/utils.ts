import stringWidth from "string-width";

/*
 * Replace tabs with 3 spaces for consistent rendering.
 */
export function replaceTabs(text: string): string {
	return text.replaceAll("\t", "   ");
}

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Get the shared grapheme segmenter instance.
 */
export function getSegmenter(): Intl.Segmenter {
	return segmenter;
}

/**
 * Calculate the visible width of a string in terminal columns.
 */
export function visibleWidth(str: string): number {
	if (!str) return 0;

	// Fast path: pure ASCII printable
	let isPureAscii = true;
	let tabLength = 0;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code === 9) {
			tabLength += 1;
		} else if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
		}
	}
	if (isPureAscii) {
		// Each tab renders as three spaces
		return str.length + tabLength * 2;
	}
	return stringWidth(replaceTabs(str));
}

/** A grapheme cluster with its position in the source string and its column width. */
export interface Grapheme {
	text: string;
	/** UTF-16 offset of the grapheme in the source string. */
	index: number;
	width: number;
}

/**
 * Split text into grapheme clusters with their column widths.
 */
export function graphemes(text: string): Grapheme[] {
	const result: Grapheme[] = [];
	for (const { segment, index } of segmenter.segment(text)) {
		result.push({ text: segment, index, width: visibleWidth(segment) });
	}
	return result;
}

/**
 * Length in UTF-16 units of the grapheme ending at `offset`, or 0 at the start of the text.
 */
export function graphemeLengthBefore(text: string, offset: number): number {
	if (offset <= 0) return 0;
	const before = [...segmenter.segment(text.slice(0, offset))];
	const last = before[before.length - 1];
	return last ? last.segment.length : 1;
}

/**
 * Length in UTF-16 units of the grapheme starting at `offset`, or 0 at the end of the text.
 */
export function graphemeLengthAfter(text: string, offset: number): number {
	if (offset >= text.length) return 0;
	const first = segmenter.segment(text.slice(offset))[Symbol.iterator]().next();
	return first.done ? 1 : first.value.segment.length;
}
