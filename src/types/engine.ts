/**
 * scantab — Engine layer type definitions
 *
 * パイプラインの入出力型。MCP からも直接の呼び出しからも再利用する。
 */

import type { ReportTable, ReportTotals } from './report.js';

// ============================================================
// Report generation
// ============================================================

/** パース対象の 1 ドキュメント */
export interface ReportSource {
  /** エラー・ログに使う名前（ファイルパスなど） */
  source: string;
  content: string;
}

/** 識別子がなくスキップしたレコード */
export interface SkippedRecord {
  source: string;
  index: number;
  recordId?: string;
  field: 'id' | 'nvt.oid';
}

/** generateReport() の戻り値 */
export interface ReportResult {
  tables: ReportTable[];
  totals: ReportTotals;
  /** riskLevels フィルタで除外した Finding の数 */
  filteredCount: number;
  skipped: SkippedRecord[];
  vulnerabilityCount: number;
  hostCount: number;
}
