/**
 * Error types raised by completion sessions and their collaborators.
 */

/**
 * Thrown when a caller passes an invalid argument: an empty or non-string
 * prompt, a parameter name starting with "_", or an unusable wrap width.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Thrown when credentials or transport settings are missing or invalid.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The inference service reported that it could not complete the text.
 *
 * @example
 * ```typescript
 * try {
 *   await completer.complete();
 * } catch (error) {
 *   if (error instanceof CompletionError) {
 *     console.error(error.messages);
 *   }
 * }
 * ```
 */
export class CompletionError extends Error {
  /** Error messages exactly as the service returned them. */
  public readonly messages: readonly unknown[];

  constructor(messages: readonly unknown[]) {
    super(
      messages.length > 0
        ? `Completion failed: ${messages.map((message) => String(message)).join("; ")}`
        : "Completion failed",
    );
    this.name = "CompletionError";
    this.messages = messages;
  }
}

/**
 * The service replied with a payload that is neither a completion nor an
 * error report. This points at a bug in the client or a changed API, so it
 * is never treated as an ordinary failure.
 */
export class UnexpectedResponseError extends Error {
  /** The raw payload, for inspection. */
  public readonly response: unknown;

  constructor(response: unknown) {
    super(`Unexpected response from inference service: ${describePayload(response)}`);
    this.name = "UnexpectedResponseError";
    this.response = response;
  }
}

const MAX_PAYLOAD_PREVIEW = 200;

function describePayload(payload: unknown): string {
  let rendered: string;
  try {
    rendered = JSON.stringify(payload) ?? String(payload);
  } catch {
    rendered = String(payload);
  }
  return rendered.length > MAX_PAYLOAD_PREVIEW
    ? `${rendered.slice(0, MAX_PAYLOAD_PREVIEW)}...`
    : rendered;
}

/**
 * Renders an error from this library as a single line for terminal output.
 */
export function formatCompletionError(error: unknown): string {
  if (error instanceof CompletionError) {
    return error.messages.length > 0
      ? `The inference service reported an error: ${error.messages.map((message) => String(message)).join("; ")}`
      : "The inference service reported an error without details";
  }
  if (error instanceof UnexpectedResponseError) {
    return `${error.message} (this is probably a bug)`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
