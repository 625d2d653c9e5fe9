import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import { ConfigurationError, parameterLiteralSchema } from "textextend";
import { z } from "zod";
import { LOG_LEVELS } from "./constants.js";
import { resolveHomePath } from "./paths.js";

const globalConfigSchema = z
  .object({
    "log-level": z.enum(LOG_LEVELS).optional(),
  })
  .strict();

const completeConfigSchema = z
  .object({
    model: z.string().min(1).optional(),
    "token-file": z.string().min(1).transform(resolveHomePath).optional(),
    temperature: z.number().min(0).max(2).optional(),
    "max-new-tokens": z.number().int().min(1).optional(),
    seed: z.number().int().nonnegative().optional(),
    width: z.number().int().positive().optional(),
    rounds: z.number().int().positive().optional(),
    // Extra generation parameters sent with every request
    parameters: z.record(parameterLiteralSchema).optional(),
  })
  .strict();

const cliConfigSchema = z
  .object({
    global: globalConfigSchema.optional(),
    complete: completeConfigSchema.optional(),
  })
  .strict();

/**
 * Global CLI options that apply to all commands.
 */
export type GlobalConfig = z.infer<typeof globalConfigSchema>;

/**
 * Configuration for the complete command.
 */
export type CompleteConfig = z.infer<typeof completeConfigSchema>;

/**
 * Root configuration structure matching ~/.textextend/cli.toml.
 */
export type CLIConfig = z.infer<typeof cliConfigSchema>;

/**
 * Path of the user's config file. TEXTEXTEND_CONFIG overrides the default.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TEXTEXTEND_CONFIG?.trim();
  if (override) {
    return resolveHomePath(override);
  }
  return join(homedir(), ".textextend", "cli.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends ConfigurationError {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

/**
 * Validates parsed TOML against the config schema.
 *
 * @throws ConfigError naming the first offending key
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  const result = cliConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const location = issue.path.length > 0 ? issue.path.join(".") : "config";
  throw new ConfigError(`${location}: ${issue.message}`, configPath);
}

/**
 * Loads and validates the config file. A missing file yields an empty config.
 *
 * @throws ConfigError on unreadable files, TOML syntax errors or invalid values
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}
