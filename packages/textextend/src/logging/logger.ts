import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

/** tslog level names, indexed by level id. */
export const LOG_LEVEL_NAMES = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/** Names of the loggers the library creates when none is injected. */
export const LOGGER_NAMES = {
  root: "textextend",
  completer: "textextend:completer",
  transport: "textextend:transport",
} as const;

const WARN_LEVEL = 4;

/**
 * Reads a level given by name (`"debug"`) or id (`"2"`).
 * Returns undefined for anything else.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const byName = LOG_LEVEL_NAMES.findIndex((name) => name === normalized);
  if (byName >= 0) {
    return byName;
  }

  const id = Number(normalized);
  return Number.isInteger(id) && id >= 0 && id < LOG_LEVEL_NAMES.length ? id : undefined;
}

export interface LoggerOptions {
  /** Defaults to {@link LOGGER_NAMES.root}. */
  name?: string;
  /** Overrides TEXTEXTEND_LOG_LEVEL; warn when both are absent. */
  minLevel?: number;
  /** Ignored while TEXTEXTEND_LOG_FILE is set. */
  type?: "pretty" | "json" | "hidden";
}

const ANSI_SGR = /\x1b\[[0-9;]*m/g;

/**
 * Removes terminal color codes.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_SGR, "");
}

/**
 * Plain-text destination for TEXTEXTEND_LOG_FILE. One per process, shared by
 * every logger; a write error disables it.
 */
class LogFile {
  private readonly stream: WriteStream;
  private failed = false;

  constructor(
    readonly path: string,
    truncate: boolean,
  ) {
    mkdirSync(dirname(path), { recursive: true });
    this.stream = createWriteStream(path, { flags: truncate ? "w" : "a" });
    this.stream.on("error", (error) => {
      this.failed = true;
      console.error(`[textextend] Cannot write ${path}, file logging disabled: ${error.message}`);
    });
  }

  write(meta: string, args: unknown[]): void {
    if (this.failed) return;
    const rendered = args.map((arg) =>
      typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
    );
    this.stream.write(`${stripAnsi(meta)}${rendered.join(" ")}\n`);
  }

  close(): void {
    this.stream.end();
  }
}

let logFile: LogFile | undefined;

function openLogFile(path: string): LogFile | undefined {
  if (logFile?.path === path) {
    return logFile;
  }

  logFile?.close();
  logFile = undefined;
  const reset = process.env.TEXTEXTEND_LOG_RESET?.trim().toLowerCase();
  const truncate = reset === "1" || reset === "true";
  try {
    logFile = new LogFile(path, truncate);
  } catch (error) {
    console.error(`[textextend] Cannot open ${path}, file logging disabled:`, error);
  }
  return logFile;
}

/**
 * Ends the shared log file, if one is open.
 */
export function closeLogFile(): void {
  logFile?.close();
  logFile = undefined;
}

/**
 * Creates a tslog logger. Level and file output follow TEXTEXTEND_LOG_LEVEL,
 * TEXTEXTEND_LOG_FILE and TEXTEXTEND_LOG_RESET unless options say otherwise.
 *
 * @example
 * ```typescript
 * const completer = new Completer({
 *   transport,
 *   prompt: "Dear diary,",
 *   logger: createLogger({ name: LOGGER_NAMES.completer, minLevel: 2 }),
 * });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const path = process.env.TEXTEXTEND_LOG_FILE?.trim();
  const file = path ? openLogFile(path) : undefined;
  const type = options.type ?? "pretty";

  return new Logger<ILogObj>({
    name: options.name ?? LOGGER_NAMES.root,
    minLevel: options.minLevel ?? parseLogLevel(process.env.TEXTEXTEND_LOG_LEVEL) ?? WARN_LEVEL,
    type: file ? "pretty" : type,
    hideLogPositionForProduction: file !== undefined || type !== "pretty",
    prettyLogTemplate:
      "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t",
    overwrite: file
      ? { transportFormatted: (meta: string, args: unknown[]) => file.write(meta, args) }
      : undefined,
  });
}
