import type { BackgroundColorName, ChalkInstance, ForegroundColorName } from "chalk";

/**
 * Visual attributes of a segment.
 */
export interface Style {
	color?: ForegroundColorName;
	background?: BackgroundColorName;
	bold?: boolean;
	dim?: boolean;
	italic?: boolean;
	underline?: boolean;
}

export function isPlainStyle(style: Style | undefined): boolean {
	if (!style) return true;
	return !style.color && !style.background && !style.bold && !style.dim && !style.italic && !style.underline;
}

/**
 * Wrap text in the escape sequences for a style.
 */
export function applyStyle(chalk: ChalkInstance, text: string, style: Style | undefined): string {
	if (!text || !style || isPlainStyle(style)) return text;

	let painter = chalk;
	if (style.color) painter = painter[style.color];
	if (style.background) painter = painter[style.background];
	if (style.bold) painter = painter.bold;
	if (style.dim) painter = painter.dim;
	if (style.italic) painter = painter.italic;
	if (style.underline) painter = painter.underline;
	return painter(text);
}
