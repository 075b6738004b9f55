/**
 * Error types and a readable formatter for anything thrown while building a grid.
 */

const MAX_MESSAGE_LENGTH = 200;
const FALLBACK_MESSAGE = "Something went wrong";

/**
 * Thrown for configuration the engine cannot honour: malformed environment
 * values, an unsupported color variety, or rows that do not form a grid.
 */
export class GridConfigError extends Error {
  constructor(
    message: string,
    readonly setting?: string
  ) {
    super(setting ? `${setting}: ${message}` : message);
    this.name = "GridConfigError";
  }
}

/**
 * Formats any thrown value into a single readable line.
 */
export function formatError(error: unknown): string {
  let message = "";
  if (error instanceof Error) {
    message = error.message;
  } else if (typeof error === "string") {
    message = error;
  } else if (error && typeof error === "object" && "message" in error) {
    if (typeof error.message === "string") {
      message = error.message;
    }
  }

  message = message.trim();
  if (!message) {
    return FALLBACK_MESSAGE;
  }

  if (message.length > MAX_MESSAGE_LENGTH) {
    return `${message.slice(0, MAX_MESSAGE_LENGTH)}...`;
  }

  return message;
}

/**
 * Checks if an error came from grid configuration rather than a bug.
 */
export function isConfigError(error: unknown): error is GridConfigError {
  return error instanceof GridConfigError;
}
