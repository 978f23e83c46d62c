/**
 * scantab — RiskLevel classification
 *
 * severity スコアから RiskLevel を決定する。しきい値は注入可能。
 *
 *   absent / score <= 0          -> None
 *   0 < score < medium           -> Low
 *   medium <= score < high       -> Medium
 *   high <= score < critical     -> High
 *   critical <= score            -> Critical
 */

import { RISK_LEVELS, THREAT_LEVELS } from '../types/entities.js';
import type { RiskLevel, ThreatLevel } from '../types/entities.js';
import { DEFAULT_RISK_THRESHOLDS } from '../types/report.js';
import type { RiskCounts, RiskThresholds } from '../types/report.js';

export const MIN_SCORE = 0.0;
export const MAX_SCORE = 10.0;

/** スコアから RiskLevel を求める */
export function classifyRisk(
  score: number | undefined,
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
): RiskLevel {
  if (score === undefined || Number.isNaN(score) || score <= MIN_SCORE) return 'None';
  if (score >= thresholds.critical) return 'Critical';
  if (score >= thresholds.high) return 'High';
  if (score >= thresholds.medium) return 'Medium';
  return 'Low';
}

/** RiskLevel の順位（None = 0 ... Critical = 4） */
export function riskRank(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

/** 2 つの RiskLevel のうち高い方 */
export function maxRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return riskRank(a) >= riskRank(b) ? a : b;
}

/** 全レベル 0 の RiskCounts */
export function emptyRiskCounts(): RiskCounts {
  return { None: 0, Low: 0, Medium: 0, High: 0, Critical: 0 };
}

/**
 * `<threat>` の文字列を列挙値に変換する（大文字小文字は区別しない）。
 * 列挙外の値（Alarm, Debug, False Positive など）は undefined。
 */
export function toThreatLevel(value: string | undefined): ThreatLevel | undefined {
  if (value === undefined) return undefined;
  const lowered = value.trim().toLowerCase();
  return THREAT_LEVELS.find((level) => level.toLowerCase() === lowered);
}

/** スコアを [0, 10] に収める */
export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}
