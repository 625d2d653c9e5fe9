import { LOG_LEVEL_NAMES } from "textextend";

/** CLI program name */
export const CLI_NAME = "textextend";

/** CLI version shown by --version */
export const CLI_VERSION = "0.1.0";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION = "Extend text with a Hugging Face text-generation model.";

/** Available CLI commands */
export const COMMANDS = {
  complete: "complete",
} as const;

/** Valid log level names */
export const LOG_LEVELS = LOG_LEVEL_NAMES;
export type { LogLevelName } from "textextend";

/** Command-line option flags */
export const OPTION_FLAGS = {
  model: "-m, --model <repo-id>",
  tokenFile: "--token-file <path>",
  temperature: "-t, --temperature <value>",
  maxNewTokens: "--max-new-tokens <count>",
  seed: "--seed <value>",
  param: "-p, --param <name=value>",
  rounds: "-r, --rounds <count>",
  width: "-w, --width <columns>",
  logLevel: "--log-level <level>",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  model: "Model repository id on the Hugging Face Hub.",
  tokenFile: "File holding the Inference API token (used when HF_TOKEN is unset).",
  temperature: "Sampling temperature between 0 and 2.",
  maxNewTokens: "Maximum number of tokens to generate per round.",
  seed: "Fixed sampling seed. Without it every request gets a random seed.",
  param:
    "Extra generation parameter. The value is parsed as JSON when possible. Repeat for several.",
  rounds: "Number of times to extend the text, printing it after each round.",
  width: "Column width for wrapping the printed text.",
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
} as const;
