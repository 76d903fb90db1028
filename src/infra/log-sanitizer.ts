/**
 * Log sanitization utilities.
 *
 * Terminal traffic is full of control bytes; printing it verbatim would
 * drive the operator's own terminal. Everything logged by the engine goes
 * through sanitizeForLog first.
 */

import { homedir } from 'os';

const homeDir = homedir();

/**
 * Truncate a string for safe logging.
 * Returns the first `maxLen` characters followed by "..." if truncated.
 */
export function truncateContent(text: string, maxLen = 80): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '...';
}

/**
 * Replace the user's home directory path with `~` in a string.
 */
export function sanitizePath(text: string): string {
  if (!homeDir) return text;
  return text.replaceAll(homeDir, '~');
}

/**
 * Render C0/C1 controls and DEL visibly: ESC becomes `\e`, other controls
 * become `\xNN`.
 */
export function escapeControls(text: string): string {
  let out = '';
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code === 0x1b) {
      out += '\\e';
    } else if (code < 0x20 || code === 0x7f || (code >= 0x80 && code < 0xa0)) {
      out += `\\x${code.toString(16).padStart(2, '0')}`;
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Apply all sanitization to a log message string:
 * - Replace home directory with ~
 * - Make control characters visible
 * - Truncate to `maxLen`
 */
export function sanitizeForLog(message: string, maxLen = 200): string {
  return truncateContent(escapeControls(sanitizePath(message)), maxLen);
}
