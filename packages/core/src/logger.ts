/**
 * Debug logging.
 *
 * Lines are prefixed `[fuzzgraph:<scope>]`. Debug lines are written only
 * while `config.get("debug")` is true; the flag is read per call so tests and
 * applications can toggle it at run time.
 */

import { config } from "./config.js";

export type LogWriter = (line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
}

const defaultWriter: LogWriter = (line) => console.error(line);

let writer: LogWriter = defaultWriter;

/**
 * Redirect all fuzzgraph log output. Pass nothing to restore stderr.
 */
export function setLogWriter(next?: LogWriter): void {
  writer = next ?? defaultWriter;
}

export function createLogger(scope: string): Logger {
  const prefix = `[fuzzgraph:${scope}]`;
  return {
    scope,
    debug(message) {
      if (config.getBoolean("debug", false)) writer(`${prefix} ${message}`);
    },
  };
}
