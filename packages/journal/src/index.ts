export { Journal, errorMessage } from "./journal.js";
export type { JournalOptions, JournalListener } from "./journal.js";
export { redactPayload, redactRecord } from "./redact.js";
export { ConsoleLogger, silentLogger } from "./logger.js";
export type { ConsoleLoggerOptions, LogLevel } from "./logger.js";
