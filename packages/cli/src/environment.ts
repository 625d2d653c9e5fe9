import type { ILogObj, InferenceTransport, Logger, TransportFromEnvOptions } from "textextend";
import { createLogger, createTransportFromEnv, parseLogLevel } from "textextend";

/**
 * Stream type that may have TTY detection capability.
 */
export type TTYAwareStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdin: TTYAwareStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  createTransport: (options: TransportFromEnvOptions) => InferenceTransport;
  setExitCode: (code: number) => void;
  createLogger: (name: string) => Logger<ILogObj>;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > environment variables > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  // --log-level takes priority over TEXTEXTEND_LOG_LEVEL
  const minLevel = parseLogLevel(config?.logLevel);
  return (name: string) => createLogger({ name, minLevel });
}

/**
 * Creates the default CLI environment using Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    createTransport: (options) => createTransportFromEnv(options),
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    createLogger: createLoggerFactory(loggerConfig),
  };
}
