/**
 * Centralized path helpers for stepform directories.
 *
 * Uses STEPFORM_CONFIG_DIR (default ".stepform") for the config root.
 */

import * as os from "node:os";
import * as path from "node:path";

/** App name (e.g. "stepform") */
export const APP_NAME: string = "stepform";

/** Config directory name (e.g. ".stepform") */
export const CONFIG_DIR_NAME: string = ".stepform";

/** Get the config root directory (~/.stepform). */
export function getConfigRootDir(): string {
	return path.join(os.homedir(), process.env.STEPFORM_CONFIG_DIR || CONFIG_DIR_NAME);
}

/** Get the logs directory (~/.stepform/logs). */
export function getLogsDir(): string {
	return path.join(getConfigRootDir(), "logs");
}
