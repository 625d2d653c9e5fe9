import type { Command } from "commander";
import type { ParameterLiteral } from "textextend";
import { Completer, LOGGER_NAMES } from "textextend";
import type { CompleteConfig } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { addCompleteOptions, type CLICompleteOptions } from "./option-helpers.js";
import { executeAction, resolvePrompt } from "./utils.js";

/**
 * Merges generation parameters, lowest precedence first: the config's
 * `[complete.parameters]` table, its dedicated keys, `--param` options,
 * then the dedicated flags.
 */
export function buildGenerationParameters(
  options: CLICompleteOptions,
  config?: CompleteConfig,
): Record<string, ParameterLiteral> {
  const parameters: Record<string, ParameterLiteral> = { ...config?.parameters };

  const dedicated = (source: {
    temperature?: number;
    maxNewTokens?: number;
    seed?: number;
  }): void => {
    if (source.temperature !== undefined) parameters.temperature = source.temperature;
    if (source.maxNewTokens !== undefined) parameters.max_new_tokens = source.maxNewTokens;
    if (source.seed !== undefined) parameters.seed = source.seed;
  };

  dedicated({
    temperature: config?.temperature,
    maxNewTokens: config?.["max-new-tokens"],
    seed: config?.seed,
  });

  for (const { name, value } of options.param) {
    parameters[name] = value;
  }

  dedicated(options);
  return parameters;
}

/**
 * Executes the complete command.
 * Extends the prompt `options.rounds` times, printing the wrapped text after each round.
 *
 * @param promptArg - Prompt from the command line (optional if using stdin)
 */
export async function executeComplete(
  promptArg: string | undefined,
  options: CLICompleteOptions,
  env: CLIEnvironment,
  config?: CompleteConfig,
): Promise<void> {
  const prompt = await resolvePrompt(promptArg, env);
  const logger = env.createLogger(LOGGER_NAMES.completer);

  const transport = env.createTransport({
    model: options.model,
    tokenFile: options.tokenFile,
    logger: env.createLogger(LOGGER_NAMES.transport),
  });

  const completer = new Completer({
    transport,
    prompt,
    parameters: buildGenerationParameters(options, config),
    width: options.width,
    logger,
  });

  for (let round = 1; round <= options.rounds; round++) {
    logger.info(`Round ${round}/${options.rounds}`, { model: options.model });
    await completer.runAndDisplay(env.stdout);
  }
}

/**
 * Registers the complete command with the CLI program.
 *
 * @param config - Optional configuration defaults from config file
 */
export function registerCompleteCommand(
  program: Command,
  env: CLIEnvironment,
  config?: CompleteConfig,
): void {
  const cmd = program
    .command(COMMANDS.complete)
    .description("Extend a text with the model and print it, wrapped.")
    .argument("[prompt]", "Text to extend. If omitted, stdin is used when piped.");

  addCompleteOptions(cmd, config);

  cmd.action((prompt: string | undefined, options: CLICompleteOptions) =>
    executeAction(() => executeComplete(prompt, options, env, config), env),
  );
}
