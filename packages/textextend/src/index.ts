// Completion session
export type { CompleterOptions, TextOutput } from "./core/completer.js";
export { Completer } from "./core/completer.js";
// Errors
export {
  CompletionError,
  ConfigurationError,
  formatCompletionError,
  UnexpectedResponseError,
  UsageError,
} from "./core/errors.js";
// Paragraph formatting
export type { PrettifyOptions } from "./core/paragraphs.js";
export {
  DEFAULT_WRAP_WIDTH,
  normalizeParagraphs,
  prettifyParagraphs,
  wrapParagraph,
} from "./core/paragraphs.js";
// Parameters
export type {
  ParameterBundle,
  ParameterInput,
  ParameterLiteral,
  ParameterValue,
  ResolvedParameters,
} from "./core/parameters.js";
export {
  defaultParameters,
  deferred,
  literal,
  parameterLiteralSchema,
  RESERVED_PARAMETER_PREFIX,
  randomSeed,
  resolveParameters,
  SEED_LIMIT,
} from "./core/parameters.js";
export type { CompletionOutcome } from "./core/response.js";
export { interpretResponse } from "./core/response.js";
export { isSupplier, Supplier } from "./core/supplier.js";
// Logging
export type { LoggerOptions, LogLevelName } from "./logging/logger.js";
export {
  closeLogFile,
  createLogger,
  LOG_LEVEL_NAMES,
  LOGGER_NAMES,
  parseLogLevel,
  stripAnsi,
} from "./logging/logger.js";
// Test doubles
export type { MockReply } from "./testing/mock-transport.js";
export { appendingModel, MockTransport } from "./testing/mock-transport.js";
export type { LoadApiTokenOptions } from "./transport/credentials.js";
// Transport
export { DEFAULT_TOKEN_FILE, loadApiToken, TOKEN_ENV_VARS } from "./transport/credentials.js";
export type {
  InferenceTransportOptions,
  TransportFromEnvOptions,
} from "./transport/inference-api.js";
export {
  createInferenceTransport,
  createTransportFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
} from "./transport/inference-api.js";
export type { InferenceRequest, InferenceTransport } from "./transport/types.js";
// tslog types, re-exported so callers can pass their own logger
export type { ILogObj, Logger } from "tslog";
