/**
 * Public error message constants
 *
 * Messages exposed to external callers must never carry parse errors or file paths.
 */

/** Returned for any failed selection */
export const PUBLIC_SELECTION_ERROR = "unable to provide a result";

/** Replacement for messages that fail sanitization */
export const GENERIC_ERROR_MESSAGE = "an error occurred";

/** Messages longer than this are replaced */
export const MAX_PUBLIC_MESSAGE_LENGTH = 200;

/** Lowercase markers that flag a message as leaking internals */
export const SENSITIVE_MESSAGE_MARKERS: readonly string[] = [
  "/home/",
  "/usr/",
  "/var/",
  "password",
  "token",
  "secret",
  "api key",
  "api_key",
  "apikey",
  "private key",
  "access key",
];
