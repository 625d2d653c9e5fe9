import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigurationError } from "../core/errors.js";
import { isNonEmpty, readEnvVar } from "./utils.js";

/** Token file looked up in the working directory when no other is named. */
export const DEFAULT_TOKEN_FILE = ".hf_token";

/** Environment variables checked for a token, in order. */
export const TOKEN_ENV_VARS = ["HF_TOKEN", "HUGGING_FACE_API_KEY"] as const;

export interface LoadApiTokenOptions {
  /**
   * Path of a file whose only line is the token.
   * @default ".hf_token"
   */
  tokenFile?: string;
  /** Environment to read token variables from (defaults to process.env). */
  env?: NodeJS.ProcessEnv;
}

/**
 * Finds the Inference API token.
 *
 * Order: HF_TOKEN, HUGGING_FACE_API_KEY, then the token file.
 * Surrounding whitespace is trimmed.
 *
 * @throws ConfigurationError if no non-empty token is found
 */
export function loadApiToken(options: LoadApiTokenOptions = {}): string {
  const env = options.env ?? process.env;

  for (const name of TOKEN_ENV_VARS) {
    const value = readEnvVar(name, env);
    if (isNonEmpty(value)) {
      return value.trim();
    }
  }

  const tokenFile = resolve(options.tokenFile ?? DEFAULT_TOKEN_FILE);
  if (existsSync(tokenFile)) {
    const token = readFileSync(tokenFile, "utf-8").trim();
    if (token !== "") {
      return token;
    }
    throw new ConfigurationError(`Token file ${tokenFile} is empty`);
  }

  throw new ConfigurationError(
    `No Inference API token found. Set ${TOKEN_ENV_VARS.join(" or ")}, or write the token to ${tokenFile}`,
  );
}
