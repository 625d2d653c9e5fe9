import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Resolves a leading `~` or `~/` against the current user's home directory,
 * for token and config paths read from TOML or the environment.
 * Another user's home (`~bob/...`) is left for the shell to resolve.
 *
 * @example
 * resolveHomePath("~/.cache/huggingface/token")  // join(homedir(), ".cache/huggingface/token")
 */
export function resolveHomePath(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}
