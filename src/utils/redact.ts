// Markers logged in place of user-entered or model-generated text
export const MESSAGE_HIDDEN = "[MESSAGE_HIDDEN]";
export const RESPONSE_HIDDEN = "[RESPONSE_HIDDEN]";

/**
 * Shorten an external user id for log lines, e.g. "1234..."
 */
export function maskId(id: string): string {
  return id.length > 4 ? `${id.substring(0, 4)}...` : id;
}

/**
 * Error message safe to log: first line only, no payloads.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message.split("\n")[0]}`;
  }
  return String(error);
}
