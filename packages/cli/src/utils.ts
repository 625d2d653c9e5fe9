import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import type { ParameterLiteral } from "textextend";
import { formatCompletionError, parameterLiteralSchema, UsageError } from "textextend";
import type { CLIEnvironment, TTYAwareStream } from "./environment.js";

/**
 * Options for creating a numeric value parser.
 */
export interface NumericParserOptions {
  label: string;
  integer?: boolean;
  min?: number;
  max?: number;
}

/**
 * Creates a parser function for numeric command-line options with validation.
 * Validates that values are numbers, optionally integers, and within min/max bounds.
 *
 * @throws InvalidArgumentError if validation fails
 */
export function createNumericParser({
  label,
  integer = false,
  min,
  max,
}: NumericParserOptions): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (value.trim() === "" || Number.isNaN(parsed)) {
      throw new InvalidArgumentError(`${label} must be a number.`);
    }

    if (integer && !Number.isInteger(parsed)) {
      throw new InvalidArgumentError(`${label} must be an integer.`);
    }

    if (min !== undefined && parsed < min) {
      throw new InvalidArgumentError(`${label} must be greater than or equal to ${min}.`);
    }

    if (max !== undefined && parsed > max) {
      throw new InvalidArgumentError(`${label} must be less than or equal to ${max}.`);
    }

    return parsed;
  };
}

/** A `--param name=value` pair. */
export interface ParamAssignment {
  name: string;
  value: ParameterLiteral;
}

/**
 * Parses `name=value`. The value is decoded as JSON when it is a valid
 * parameter literal (`40`, `true`, `["\n"]`); otherwise it is kept as a string.
 *
 * @throws InvalidArgumentError when there is no `=` or the name is empty
 */
export function parseParamAssignment(input: string): ParamAssignment {
  const separator = input.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected name=value, got "${input}".`);
  }

  const name = input.slice(0, separator).trim();
  if (name === "") {
    throw new InvalidArgumentError(`Expected name=value, got "${input}".`);
  }

  return { name, value: parseParamValue(input.slice(separator + 1)) };
}

function parseParamValue(raw: string): ParameterLiteral {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return raw;
  }
  const result = parameterLiteralSchema.safeParse(decoded);
  return result.success ? result.data : raw;
}

/**
 * Commander accumulator for repeatable `--param` options.
 */
export function collectParam(input: string, previous: ParamAssignment[] = []): ParamAssignment[] {
  return [...previous, parseParamAssignment(input)];
}

/**
 * Checks if a stream is a TTY (terminal) for interactive input.
 */
export function isInteractive(stream: TTYAwareStream): boolean {
  return Boolean(stream.isTTY);
}

/**
 * Reads all data from a readable stream into a string.
 */
export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    if (typeof chunk === "string") {
      chunks.push(chunk);
    } else {
      chunks.push(chunk.toString("utf8"));
    }
  }
  return chunks.join("");
}

/**
 * Resolves the prompt from the command argument or, when it is absent,
 * from piped stdin. Whitespace-only prompts are rejected.
 *
 * @throws UsageError when no prompt is available
 */
export async function resolvePrompt(
  promptArg: string | undefined,
  env: CLIEnvironment,
): Promise<string> {
  if (promptArg?.trim()) {
    return promptArg;
  }

  if (isInteractive(env.stdin)) {
    throw new UsageError("Prompt is required. Provide an argument or pipe content via stdin.");
  }

  const pipedInput = await readStream(env.stdin);
  if (!pipedInput.trim()) {
    throw new UsageError("Received empty stdin payload. Provide a prompt to continue.");
  }

  return pipedInput;
}

/**
 * Executes a CLI action with error handling.
 * Catches errors, writes to stderr, and sets exit code 1 on failure.
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    env.stderr.write(`${chalk.red.bold("Error:")} ${formatCompletionError(error)}\n`);
    env.setExitCode(1);
  }
}
