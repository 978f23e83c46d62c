/**
 * scantab — Library entry point
 *
 * パイプラインの各段と型を外部のレンダラー・CLI 向けに公開する。
 */

export { parseOpenvasXml } from './parser/openvas-parser.js';
export { FindingNormalizer } from './engine/normalizer.js';
export { classifyRisk } from './engine/risk.js';
export { group } from './engine/grouping.js';
export { aggregate, compareGroups } from './engine/aggregator.js';
export {
  buildReport,
  VULNERABILITY_COLUMNS,
  HOST_COLUMNS,
  DETAIL_COLUMNS,
  SUMMARY_COLUMNS,
  FAMILY_COLUMNS,
} from './engine/report-builder.js';
export { generateReport, generateReportFromContent } from './engine/pipeline.js';
export { parseReportOptions } from './config.js';

export {
  ScantabError,
  MalformedInputError,
  MissingIdentifierError,
  InvariantViolationError,
  ConfigValidationError,
} from './types/errors.js';
export { RISK_LEVELS, THREAT_LEVELS } from './types/entities.js';
export type * from './types/entities.js';
export type * from './types/parser.js';
export type * from './types/engine.js';
export {
  DEFAULT_RISK_THRESHOLDS,
  ReportOptionsSchema,
  GROUPING_MODES,
  REPORT_TABLE_KINDS,
} from './types/report.js';
export type * from './types/report.js';
