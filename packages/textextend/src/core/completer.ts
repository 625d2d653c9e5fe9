import type { ILogObj, Logger } from "tslog";
import { createLogger, LOGGER_NAMES } from "../logging/logger.js";
import type { InferenceTransport } from "../transport/types.js";
import { CompletionError, UnexpectedResponseError, UsageError } from "./errors.js";
import { normalizeParagraphs, prettifyParagraphs } from "./paragraphs.js";
import {
  assertParameterName,
  defaultParameters,
  type ParameterBundle,
  type ParameterInput,
  type ResolvedParameters,
  resolveParameters,
  toParameterValue,
} from "./parameters.js";
import { interpretResponse } from "./response.js";

/**
 * Anything text can be written to, such as `process.stdout`.
 */
export interface TextOutput {
  write(chunk: string): unknown;
}

export interface CompleterOptions {
  /** Shared handle to the inference service. */
  transport: InferenceTransport;
  /** Initial text. Hard wrapping is removed before it is stored. */
  prompt: string;
  /**
   * Generation parameters, replacing or adding to the defaults
   * (`do_sample`, `max_new_tokens`, `seed`, `temperature`).
   * A {@link Supplier} is resolved again for every request.
   */
  parameters?: Record<string, ParameterInput>;
  /** Line width for {@link Completer.displayText}; a positive integer. */
  width?: number;
  logger?: Logger<ILogObj>;
}

/**
 * Extends a piece of text with a text-generation model, one request at a time.
 *
 * The buffer starts as the normalized prompt. Each successful
 * {@link complete} call replaces it with the model's output, which for
 * text-generation models is the prompt plus its continuation. A failed call
 * leaves the buffer as it was.
 *
 * Calls must not overlap: await one `complete()` before starting the next.
 *
 * @example
 * ```typescript
 * const transport = createTransportFromEnv();
 * const completer = new Completer({
 *   transport,
 *   prompt: "The lighthouse keeper had not seen a ship in years.",
 *   parameters: { max_new_tokens: 100 },
 * });
 *
 * await completer.runAndDisplay();
 * ```
 */
export class Completer {
  private readonly transport: InferenceTransport;
  private readonly parameters: ParameterBundle;
  private readonly width: number | undefined;
  private readonly logger: Logger<ILogObj>;
  private buffer: string;

  constructor(options: CompleterOptions) {
    const overrides = Object.entries(options.parameters ?? {});
    for (const [name] of overrides) {
      assertParameterName(name);
    }
    if (options.width !== undefined) {
      validateWidth(options.width);
    }

    this.buffer = validatePrompt(options.prompt);
    this.transport = options.transport;
    this.width = options.width;
    this.logger = options.logger ?? createLogger({ name: LOGGER_NAMES.completer });

    this.parameters = defaultParameters();
    for (const [name, value] of overrides) {
      this.parameters.set(name, toParameterValue(value));
    }
  }

  /** The prompt plus any accepted completions. */
  get text(): string {
    return this.buffer;
  }

  /** Names of all parameters sent with each request, sorted. */
  get parameterNames(): string[] {
    return [...this.parameters.keys()].sort();
  }

  /**
   * Resolves the parameters for one request. Deferred values are computed
   * now; fixed values are passed through.
   */
  buildRequestParameters(): ResolvedParameters {
    return resolveParameters(this.parameters);
  }

  /**
   * Asks the model to extend the text and stores its output.
   *
   * @throws CompletionError if the service reports a failure
   * @throws UnexpectedResponseError if the reply has an unknown shape
   */
  async complete(): Promise<void> {
    const params = this.buildRequestParameters();
    this.logger.debug("Requesting completion", {
      inputLength: this.buffer.length,
      parameters: Object.keys(params),
    });

    const response = await this.transport({ inputs: this.buffer, params });
    const outcome = interpretResponse(response);

    switch (outcome.type) {
      case "success":
        // Stored as returned, without re-normalizing
        this.buffer = outcome.text;
        this.logger.debug("Completion accepted", { outputLength: outcome.text.length });
        return;
      case "service-error":
        this.logger.warn("Inference service reported an error", { messages: outcome.messages });
        throw new CompletionError(outcome.messages);
      case "malformed":
        this.logger.error("Unrecognized response from inference service", {
          response: outcome.response,
        });
        throw new UnexpectedResponseError(outcome.response);
    }
  }

  /** The text hard-wrapped, with blank lines between paragraphs. */
  displayText(): string {
    return prettifyParagraphs(this.buffer, { width: this.width });
  }

  /**
   * Completes the text, then writes the display form to `output`.
   */
  async runAndDisplay(output: TextOutput = process.stdout): Promise<void> {
    await this.complete();
    output.write(`${this.displayText()}\n`);
  }

  toString(): string {
    return this.displayText();
  }
}

function validateWidth(width: number): void {
  if (!Number.isInteger(width) || width < 1) {
    throw new UsageError(`width must be a positive integer, got ${width}`);
  }
}

function validatePrompt(prompt: unknown): string {
  if (typeof prompt !== "string") {
    throw new UsageError("prompt must be a string");
  }
  const normalized = normalizeParagraphs(prompt);
  if (normalized === "") {
    throw new UsageError("prompt must be nonempty");
  }
  return normalized;
}
