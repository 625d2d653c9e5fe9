import { Command, InvalidArgumentError } from "commander";
import { registerCompleteCommand } from "./complete-command.js";
import { type CLIConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  CLI_VERSION,
  LOG_LEVELS,
  type LogLevelName,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";

/**
 * Parses and validates the log level option value.
 */
function parseLogLevelOption(value: string): LogLevelName {
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: LogLevelName;
}

/**
 * Creates and configures the CLI program.
 *
 * @param config - Optional CLI configuration loaded from config file
 */
export function createProgram(env: CLIEnvironment, config?: CLIConfig): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(CLI_VERSION)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerCompleteCommand(program, env, config?.complete);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  // Config errors fail fast, before any command runs
  const config = opts.config !== undefined ? opts.config : loadConfig();
  const envOverrides = opts.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // First pass: parse global options only (skip if help requested)
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);

  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  // Priority: CLI flags > config file > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: globalOpts.logLevel ?? config.global?.["log-level"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
