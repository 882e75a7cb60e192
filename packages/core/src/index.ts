/**
 * Core module exports for @grammarkit/core
 *
 * This package provides:
 * - Configuration loading (files, environment, programmatic)
 * - Scoped logging
 * - Source diagnostics rendering
 * - Runtime safety primitives (invariant, unreachable)
 */

// Configuration System
export {
  config,
  defineConfig,
  type GrammarkitConfig,
  type GrammarConfigRecord,
  type ParserConfig,
} from "./config.js";

// Logging
export { createLogger, setLogSink, type Logger, type LogLevel, type LogSink } from "./logger.js";

// Diagnostics
export {
  COLORS,
  color,
  colorsEnabled,
  renderSourceLocation,
  type ColorName,
  type Severity,
  type SourceLocationOptions,
} from "./diagnostics.js";

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";
