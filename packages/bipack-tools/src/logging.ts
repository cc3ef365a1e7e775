// Debug logging for decode failures.
//
// Output is gated by namespace patterns the way npm's debug package does it:
// DEBUG="bipack:*" enables everything here, "-bipack:source" turns the source
// log back off, and "*" enables all namespaces.

import { Source, type BipackError, type SourceOptions } from "@bipack/core";
import { hexDumpAround } from "./dump.ts";

export type LogFn = (message: string, data: Record<string, unknown>) => void;

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "bipack:source".
   */
  namespace?: string;

  /**
   * Pattern list to match against. Defaults to process.env.DEBUG, read when
   * each failure is logged.
   */
  debug?: string;

  /**
   * Bytes of context shown around the failing offset. Defaults to 32.
   */
  dumpWindow?: number;

  /**
   * Where log lines go. Defaults to console.log.
   */
  log?: LogFn;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * A Source that logs every failed read when its namespace is enabled.
 *
 * Each failure is logged as a message plus a structured object:
 * { type: "decode-error", operation, code, offset, position, detail, bytes }
 * where `bytes` is a hex window with the failing byte bracketed.
 *
 * @example
 * ```typescript
 * // DEBUG=bipack:* node app.js
 * const source = new LoggingSource(bytes);
 * source.getStr(); // logs "✗ getStr @0: invalid_encoding" before throwing
 * ```
 */
export class LoggingSource extends Source {
  private readonly data: Uint8Array;
  private readonly namespace: string;
  private readonly debug: string | undefined;
  private readonly dumpWindow: number;
  private readonly log: LogFn;

  constructor(data: Uint8Array, options: SourceOptions & LoggingOptions = {}) {
    super(data, options);
    this.data = data;
    this.namespace = options.namespace ?? "bipack:source";
    this.debug = options.debug;
    this.dumpWindow = options.dumpWindow ?? 32;
    this.log = options.log ?? ((message, fields) => console.log(message, fields));
  }

  protected onError(operation: string, error: BipackError): void {
    if (!isEnabled(this.namespace, this.debug ?? process.env.DEBUG)) return;

    this.log(`✗ ${operation} @${error.offset}: ${error.code}`, {
      type: "decode-error",
      operation,
      code: error.code,
      offset: error.offset,
      position: this.position,
      detail: error.detail,
      bytes: hexDumpAround(this.data, error.offset, this.dumpWindow),
    });
  }
}
