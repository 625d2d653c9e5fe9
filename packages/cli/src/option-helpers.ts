import type { Command } from "commander";
import { DEFAULT_MODEL, DEFAULT_TOKEN_FILE } from "textextend";
import type { CompleteConfig } from "./config.js";
import { OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import { collectParam, createNumericParser, type ParamAssignment } from "./utils.js";

/**
 * CLI options for the complete command (camelCase, matching Commander output).
 */
export interface CLICompleteOptions {
  model: string;
  tokenFile: string;
  temperature?: number;
  maxNewTokens?: number;
  seed?: number;
  param: ParamAssignment[];
  rounds: number;
  width?: number;
}

/**
 * Adds complete command options to a Commander command.
 *
 * Generation parameters (`--temperature`, `--max-new-tokens`, `--seed`) take
 * no Commander defaults; the command merges them with the config itself so
 * that `--param` can sit between the file and the dedicated flags.
 *
 * @param defaults - Optional defaults from config file
 */
export function addCompleteOptions(cmd: Command, defaults?: CompleteConfig): Command {
  return cmd
    .option(OPTION_FLAGS.model, OPTION_DESCRIPTIONS.model, defaults?.model ?? DEFAULT_MODEL)
    .option(
      OPTION_FLAGS.tokenFile,
      OPTION_DESCRIPTIONS.tokenFile,
      defaults?.["token-file"] ?? DEFAULT_TOKEN_FILE,
    )
    .option(
      OPTION_FLAGS.temperature,
      OPTION_DESCRIPTIONS.temperature,
      createNumericParser({ label: "Temperature", min: 0, max: 2 }),
    )
    .option(
      OPTION_FLAGS.maxNewTokens,
      OPTION_DESCRIPTIONS.maxNewTokens,
      createNumericParser({ label: "Max new tokens", integer: true, min: 1 }),
    )
    .option(
      OPTION_FLAGS.seed,
      OPTION_DESCRIPTIONS.seed,
      createNumericParser({
        label: "Seed",
        integer: true,
        min: 0,
        max: Number.MAX_SAFE_INTEGER,
      }),
    )
    .option(OPTION_FLAGS.param, OPTION_DESCRIPTIONS.param, collectParam, [])
    .option(
      OPTION_FLAGS.rounds,
      OPTION_DESCRIPTIONS.rounds,
      createNumericParser({ label: "Rounds", integer: true, min: 1 }),
      defaults?.rounds ?? 1,
    )
    .option(
      OPTION_FLAGS.width,
      OPTION_DESCRIPTIONS.width,
      createNumericParser({ label: "Width", integer: true, min: 1 }),
      defaults?.width,
    );
}
