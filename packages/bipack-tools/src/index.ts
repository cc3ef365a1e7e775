// Diagnostics around @bipack/core: hex dumps, a string builder that feeds a
// Sink, and a Source that logs its failures.

export { toDump, hexDumpAround } from "./dump.ts";
export { StringBuilder } from "./string_builder.ts";
export { LoggingSource, isEnabled, type LoggingOptions, type LogFn } from "./logging.ts";
