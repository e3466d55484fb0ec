/**
 * Debug Logging
 *
 * Appends timestamped lines to a debug log file. Disabled unless
 * explicitly enabled (the host passes --debug or calls setDebugEnabled).
 */

import { appendFileSync } from 'fs';

// Debug log file path
export const DEBUG_LOG_PATH = process.env.INKWELL_DEBUG_LOG ?? './debug.log';

let debugEnabled = false;

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function debugLog(...args: unknown[]): void {
  if (!debugEnabled) return;
  const timestamp = new Date().toISOString();
  const message = `[${timestamp}] ${args.map((a) => (typeof a === 'object' ? JSON.stringify(a) : String(a))).join(' ')}\n`;
  try {
    appendFileSync(DEBUG_LOG_PATH, message);
  } catch {
    // Ignore write errors
  }
}
