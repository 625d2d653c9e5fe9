/**
 * Hugging Face Inference API transport
 *
 * Posts text-generation requests to the serverless Inference API (or a
 * dedicated endpoint exposing the same route) and hands back the decoded
 * JSON body untouched, error bodies included.
 *
 * Environment variables (see {@link createTransportFromEnv}):
 * - HF_TOKEN (primary) or HUGGING_FACE_API_KEY (fallback)
 * - HF_ENDPOINT_URL (optional) - full URL of a dedicated endpoint
 */

import type { ILogObj, Logger } from "tslog";
import { ConfigurationError, UnexpectedResponseError } from "../core/errors.js";
import { createLogger, LOGGER_NAMES } from "../logging/logger.js";
import { type LoadApiTokenOptions, loadApiToken } from "./credentials.js";
import type { InferenceRequest, InferenceTransport } from "./types.js";
import { isNonEmpty, readEnvVar } from "./utils.js";

export const DEFAULT_MODEL = "bigscience/bloom";
export const DEFAULT_BASE_URL = "https://api-inference.huggingface.co/models";
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface InferenceTransportOptions {
  /** Bearer token for the Inference API. */
  token: string;
  /**
   * Model repository id.
   * @default "bigscience/bloom"
   */
  model?: string;
  /**
   * URL the model id is appended to.
   * @default "https://api-inference.huggingface.co/models"
   */
  baseUrl?: string;
  /**
   * Abort the request after this many milliseconds.
   * @default 60000
   */
  timeoutMs?: number;
  /**
   * Full URL of a dedicated endpoint. When set, `model` and `baseUrl` are ignored.
   */
  endpointUrl?: string;
  /** Replaces the global fetch, mainly for tests. */
  fetch?: typeof fetch;
  logger?: Logger<ILogObj>;
}

function buildModelUrl(baseUrl = DEFAULT_BASE_URL, model = DEFAULT_MODEL): string {
  return `${baseUrl.replace(/\/+$/, "")}/${model}`;
}

/**
 * Creates a transport bound to one model and token.
 *
 * @example
 * ```typescript
 * const transport = createInferenceTransport({ token: "test-token" });
 * const reply = await transport({ inputs: "Hello", params: { max_new_tokens: 20 } });
 * ```
 */
export function createInferenceTransport(options: InferenceTransportOptions): InferenceTransport {
  const token = options.token.trim();
  if (token === "") {
    throw new ConfigurationError("Inference API token is empty");
  }

  const url = options.endpointUrl ?? buildModelUrl(options.baseUrl, options.model);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;
  const logger = options.logger ?? createLogger({ name: LOGGER_NAMES.transport });

  return async ({ inputs, params }: InferenceRequest): Promise<unknown> => {
    logger.debug("Sending text-generation request", { url, inputLength: inputs.length });

    const response = await fetchImpl(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        inputs,
        parameters: params,
        options: { wait_for_model: false },
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    const body = await response.text();
    logger.debug("Received response", { status: response.status, bodyLength: body.length });

    // Error statuses still carry a JSON body the caller needs to classify
    try {
      const payload: unknown = JSON.parse(body);
      return payload;
    } catch {
      throw new UnexpectedResponseError(body);
    }
  };
}

export interface TransportFromEnvOptions extends LoadApiTokenOptions {
  model?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger<ILogObj>;
}

/**
 * Loads the token (see {@link loadApiToken}) and creates a transport.
 * Honors HF_ENDPOINT_URL for dedicated deployments.
 *
 * Create one transport per process and pass it to every completer.
 */
export function createTransportFromEnv(options: TransportFromEnvOptions = {}): InferenceTransport {
  const token = loadApiToken(options);
  const env = options.env ?? process.env;
  const endpointUrl = readEnvVar("HF_ENDPOINT_URL", env);

  return createInferenceTransport({
    token,
    model: options.model,
    endpointUrl: isNonEmpty(endpointUrl) ? endpointUrl.trim() : undefined,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
    logger: options.logger,
  });
}
