/**
 * scantab — Report model types
 *
 * Grouping / Aggregation / ReportTable の型と、
 * レポートオプションの Zod スキーマ。
 */

import { z } from 'zod';
import { RISK_LEVELS } from './entities.js';
import type { Finding, Host, Port, RiskLevel, Vulnerability } from './entities.js';

// ============================================================
// RiskLevel しきい値
// ============================================================

/**
 * 各 RiskLevel の下限（この値以上でそのレベル）。
 * Low の下限は固定で「0 より大きい」。
 */
export interface RiskThresholds {
  medium: number;
  high: number;
  critical: number;
}

export const DEFAULT_RISK_THRESHOLDS: Readonly<RiskThresholds> = {
  medium: 4.0,
  high: 7.0,
  critical: 9.0,
};

export const RiskThresholdsSchema = z
  .object({
    medium: z.number().gt(0).lte(10),
    high: z.number().gt(0).lte(10),
    critical: z.number().gt(0).lte(10),
  })
  .refine((t) => t.medium < t.high && t.high < t.critical, {
    message: 'thresholds must satisfy medium < high < critical',
  });

// ============================================================
// レポートオプション
// ============================================================

export const ReportOptionsSchema = z.object({
  includeByVulnerability: z.boolean().default(true),
  includeByHost: z.boolean().default(true),
  includeSummary: z.boolean().default(true),
  /** Finding 1 件 1 行の明細テーブル */
  includeDetails: z.boolean().default(true),
  thresholds: RiskThresholdsSchema.default({ ...DEFAULT_RISK_THRESHOLDS }),
  /** この RiskLevel の Finding だけをレポートに含める */
  riskLevels: z.array(z.enum(RISK_LEVELS)).default([...RISK_LEVELS]),
  /** 識別子のないレコードをスキップするか、生成全体を中断するか */
  onMissingIdentifier: z.enum(['skip', 'abort']).default('skip'),
});
export type ReportOptions = z.infer<typeof ReportOptionsSchema>;
export type ReportOptionsInput = z.input<typeof ReportOptionsSchema>;

/** buildReport() が参照するテーブル選択フラグ */
export type TableSelection = Pick<
  ReportOptions,
  'includeByVulnerability' | 'includeByHost' | 'includeSummary' | 'includeDetails'
>;

// ============================================================
// Group
// ============================================================

export const GROUPING_MODES = ['ByVulnerability', 'ByHost'] as const;
export type GroupingMode = (typeof GROUPING_MODES)[number];

export interface VulnerabilityGroup {
  readonly mode: 'ByVulnerability';
  /** Vulnerability の oid */
  readonly key: string;
  readonly vulnerability: Vulnerability;
  readonly findings: readonly Finding[];
}

export interface HostGroup {
  readonly mode: 'ByHost';
  /** Host.key */
  readonly key: string;
  readonly host: Host;
  readonly findings: readonly Finding[];
}

export type Group = VulnerabilityGroup | HostGroup;

// ============================================================
// Aggregation
// ============================================================

export type RiskCounts = Record<RiskLevel, number>;

export interface GroupStats {
  findingCount: number;
  /** severity を持つ Finding がない場合は undefined */
  maxSeverity?: number;
  riskCounts: RiskCounts;
  highestRisk: RiskLevel;
}

export interface AggregatedVulnerabilityGroup {
  readonly mode: 'ByVulnerability';
  readonly group: VulnerabilityGroup;
  readonly stats: GroupStats;
  /** 影響を受けるホスト（重複なし、出現順） */
  readonly hosts: readonly Host[];
}

export interface AggregatedHostGroup {
  readonly mode: 'ByHost';
  readonly group: HostGroup;
  readonly stats: GroupStats;
  readonly ports: readonly Port[];
  readonly vulnerabilities: readonly Vulnerability[];
}

export type AggregatedGroup = AggregatedVulnerabilityGroup | AggregatedHostGroup;

/** family ごとの Vulnerability 数。family のない Vulnerability は null にまとめる。 */
export interface FamilyCount {
  family: string | null;
  vulnerabilityCount: number;
}

/** レポート全体の集計 */
export interface ReportTotals {
  findingCount: number;
  riskCounts: RiskCounts;
  /** 全体のホスト数（重複なし） */
  hostCount: number;
  /** 各 RiskLevel の Finding を 1 件以上持つホスト数 */
  hostCountsByRisk: RiskCounts;
  /** 件数の降順、同数なら family の昇順（null は最後） */
  familyCounts: FamilyCount[];
}

export interface Aggregation<G extends AggregatedGroup = AggregatedGroup> {
  readonly groups: readonly G[];
  readonly totals: ReportTotals;
}

/** buildReport() の入力 */
export interface AggregationSet {
  byVulnerability?: Aggregation<AggregatedVulnerabilityGroup>;
  byHost?: Aggregation<AggregatedHostGroup>;
}

// ============================================================
// ReportTable
// ============================================================

export const REPORT_TABLE_KINDS = [
  'byVulnerability',
  'byHost',
  'details',
  'summary',
  'byFamily',
] as const;
export type ReportTableKind = (typeof REPORT_TABLE_KINDS)[number];

export type CellValue = string | number | null;

export interface ReportColumn {
  key: string;
  label: string;
}

export type ReportRow = Readonly<Record<string, CellValue>>;

/** 出力形式に依存しない行コレクション */
export interface ReportTable {
  readonly kind: ReportTableKind;
  readonly title: string;
  readonly columns: readonly ReportColumn[];
  readonly rows: readonly ReportRow[];
}

/**
 * 外部レンダラー（スプレッドシート・文書・区切りテキスト）が実装する境界。
 * コアはこのインターフェースを呼ばない。
 */
export interface ReportRenderer<T> {
  readonly format: string;
  render(table: ReportTable): T;
}
