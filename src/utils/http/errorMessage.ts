/**
 * Error message sanitization at the public boundary
 *
 * Callers outside the process get generic messages only: no parse errors,
 * no file paths, no credential-like words.
 */

import {
  GENERIC_ERROR_MESSAGE,
  MAX_PUBLIC_MESSAGE_LENGTH,
  SENSITIVE_MESSAGE_MARKERS,
} from "@/constants/errorMessage";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&#34;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * HTML-escape a message, replacing it with a generic one if it looks sensitive
 * or exceeds the length limit.
 */
export function sanitizeErrorMessage(message: string): string {
  const escaped = escapeHtml(message);
  const lower = escaped.toLowerCase();

  if (SENSITIVE_MESSAGE_MARKERS.some((marker) => lower.includes(marker))) {
    return GENERIC_ERROR_MESSAGE;
  }
  if (escaped.length > MAX_PUBLIC_MESSAGE_LENGTH) {
    return GENERIC_ERROR_MESSAGE;
  }
  return escaped;
}
