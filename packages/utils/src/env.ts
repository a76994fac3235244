import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { getConfigRootDir } from "./dirs";

/**
 * Parses a .env file synchronously and extracts key-value string pairs.
 * Ignores lines that are empty or start with '#'. Trims whitespace.
 * Allows values to be quoted with single or double quotes.
 */
export function parseEnvFile(filePath: string): Record<string, string> {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch {
		// Missing or unreadable file contributes nothing
		return {};
	}
	return parseEnv(content);
}

/** Parses .env formatted text. */
export function parseEnv(content: string): Record<string, string> {
	const result: Record<string, string> = {};
	for (const line of content.split("\n")) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) continue;

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) continue;

		const key = trimmed.slice(0, eqIndex).trim();
		let value = trimmed.slice(eqIndex + 1).trim();

		if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
			value = value.slice(1, -1);
		}

		result[key] = value;
	}
	return result;
}

// Project .env first, then the config root's, then the user's home; variables already set win.
const projectEnv = parseEnvFile(path.join(process.cwd(), ".env"));
const configEnv = parseEnvFile(path.join(getConfigRootDir(), ".env"));
const homeEnv = parseEnvFile(path.join(os.homedir(), ".env"));

for (const file of [projectEnv, configEnv, homeEnv]) {
	for (const [key, value] of Object.entries(file)) {
		if (!process.env[key]) {
			process.env[key] = value;
		}
	}
}

/**
 * The process environment with .env files applied.
 *
 * Import this (import { $env } from "@stepform/utils") before reading variables so
 * the .env overrides are guaranteed to be loaded.
 */
export const $env: NodeJS.ProcessEnv = process.env;

/** Reads a boolean flag: "1"/"true" enable, "0"/"false" disable, anything else falls back. */
export function $flag(key: string, fallback: boolean): boolean {
	const value = $env[key]?.trim().toLowerCase();
	if (value === "1" || value === "true") return true;
	if (value === "0" || value === "false") return false;
	return fallback;
}
