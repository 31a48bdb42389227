/**
 * Debug logging utilities for the requirements analyzer
 *
 * Appends timestamped lines to a debug log file and mirrors them to the
 * console. Configured via environment variables:
 *   RA_DEBUG_LOG_PATH     file path (default ./debug-analyzer.log)
 *   RA_DEBUG_LOG_FILE     "true" enables the file sink (default off)
 *   RA_DEBUG_LOG_CONSOLE  "false" silences the console mirror
 *
 * @module debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

interface DebugLogSettings {
  filePath: string;
  fileEnabled: boolean;
  consoleEnabled: boolean;
}

function readSettings(): DebugLogSettings {
  return {
    filePath: path.resolve(process.env.RA_DEBUG_LOG_PATH || "./debug-analyzer.log"),
    fileEnabled: (process.env.RA_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true",
    consoleEnabled: (process.env.RA_DEBUG_LOG_CONSOLE ?? "true").toLowerCase() !== "false",
  };
}

let settings = readSettings();
let fileErrorReported = false;

/** Re-read env settings (tests change env between cases). */
export function reloadDebugLogSettings(): void {
  settings = readSettings();
  fileErrorReported = false;
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

export function formatDebugLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  if (settings.fileEnabled) {
    fs.promises.appendFile(settings.filePath, logLine + "\n").catch((err: unknown) => {
      if (!fileErrorReported) {
        fileErrorReported = true;
        console.warn(`[Debug] Cannot write ${settings.filePath}:`, err);
      }
    });
  }

  if (settings.consoleEnabled) {
    console.log(logLine);
  }
}
