/**
 * Input sanitization for outbound message text and query parameters.
 */

/** LINE rejects text messages longer than this */
export const MAX_MESSAGE_LENGTH = 5000;

// C0 control characters except tab and newline, plus DEL
const CONTROL_CHAR_RE = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

/**
 * Strip control characters, normalize line endings and trim.
 * Returns the cleaned string.
 */
export function sanitizeMessage(input: string | undefined | null): string {
  if (!input) return '';
  return input.replace(/\r\n?/g, '\n').replace(CONTROL_CHAR_RE, '').trim();
}

/**
 * Validate an ISO date string. Returns true if valid, false otherwise.
 */
export function isValidDateString(input: string): boolean {
  const d = new Date(input);
  return !isNaN(d.getTime());
}
