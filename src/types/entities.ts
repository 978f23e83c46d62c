/**
 * scantab - Canonical entity type definitions
 *
 * Normalizer が生成する正規化済みモデル。
 * Vulnerability / Host は 1 回のレポート生成の中でインターンされ、
 * 同じ識別子を持つ Finding 間で同一インスタンスが共有される。
 *
 * Conventions:
 *   absent value   -> optional property (?)
 *   timestamps     -> string (as reported, ISO 8601)
 *   scores         -> number in [0, 10]
 */

// ============================================================
// 列挙
// ============================================================

export const RISK_LEVELS = ['None', 'Low', 'Medium', 'High', 'Critical'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const THREAT_LEVELS = ['None', 'Log', 'Low', 'Medium', 'High', 'Critical'] as const;
export type ThreatLevel = (typeof THREAT_LEVELS)[number];

// ============================================================
// Vulnerability (NVT)
// ============================================================

export interface SeverityEntry {
  type?: string;
  origin?: string;
  date?: string;
  score?: number;
  value?: string;
}

export interface Reference {
  type: string;
  id: string;
}

/** A detectable issue identified by its scanner-assigned oid. */
export interface Vulnerability {
  readonly oid: string;
  readonly name: string;
  readonly type?: string;
  readonly family?: string;
  readonly cvssBase?: number;
  readonly severities: readonly SeverityEntry[];
  readonly solutionType?: string;
  readonly solution?: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly references: readonly Reference[];
  readonly cves: readonly string[];
}

// ============================================================
// Host
// ============================================================

export interface Port {
  /** `general/tcp` のようにポート番号がない場合は 0 */
  number: number;
  protocol: string;
  /** エクスポートに記載された元の表記（例: `443/tcp`） */
  label: string;
}

/** A scanned host identified by (assetId, hostname). */
export interface Host {
  /** インターン用の識別キー */
  readonly key: string;
  readonly address?: string;
  readonly assetId?: string;
  readonly hostname: string;
  /** 観測されたポート（重複なし、出現順） */
  readonly ports: readonly Port[];
}

// ============================================================
// Finding
// ============================================================

export interface DetectionDetail {
  name: string;
  value: string;
}

/** One reported occurrence of a Vulnerability on a Host. */
export interface Finding {
  readonly id: string;
  readonly name?: string;
  readonly owner?: string;
  readonly vulnerability: Vulnerability;
  readonly host: Host;
  readonly port?: Port;
  readonly threat: ThreatLevel;
  readonly severity?: number;
  readonly riskLevel: RiskLevel;
  readonly qodValue?: number;
  readonly qodType?: string;
  readonly detectionDetails: readonly DetectionDetail[];
  readonly createdAt?: string;
  readonly modifiedAt?: string;
  readonly description?: string;
  readonly comment?: string;
  readonly scanNvtVersion?: string;
  readonly originalThreat?: string;
  readonly originalSeverity?: number;
}
