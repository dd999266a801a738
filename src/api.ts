export { validateBuffer, validateFile, validateStream } from './core/engine.js';
export {
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  defineEngineConfig,
  resolveEngineConfig,
} from './core/engine-config.js';
export type { EngineConfig, EngineConfigInput, ResolveConfigOptions } from './core/engine-config.js';
export { FatalParseError } from './core/input-decoder.js';
export { renderCsv, renderHuman, renderJson, renderReport } from './core/reporter.js';
export type { ReportFormat } from './core/reporter.js';
export { toBadge, toSummaryRow } from './core/summary.js';
export type { Badge, BadgeValue, SummaryRow } from './core/summary.js';
export type { FileType, Finding, Severity, SeverityCounts, ValidationResult } from './types/validation.js';
