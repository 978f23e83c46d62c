/**
 * scantab — Aggregator
 *
 * Group ごとの統計とレポート全体の集計を計算し、Group を決定的な順序に並べる。
 *
 * 並び順:
 *   1. 最大 severity の降順（severity なしは最後）
 *   2. Finding 数の降順
 *   3. 名前（Vulnerability 名 / hostname）の昇順
 *   4. グループキーの昇順
 */

import type { Finding, Host, Port, RiskLevel, Vulnerability } from '../types/entities.js';
import { RISK_LEVELS } from '../types/entities.js';
import type {
  AggregatedGroup,
  AggregatedHostGroup,
  AggregatedVulnerabilityGroup,
  Aggregation,
  FamilyCount,
  Group,
  GroupStats,
  HostGroup,
  ReportTotals,
  VulnerabilityGroup,
} from '../types/report.js';
import { InvariantViolationError } from '../types/errors.js';
import { emptyRiskCounts, maxRisk } from './risk.js';

// ============================================================
// 統計
// ============================================================

function computeStats(findings: readonly Finding[]): GroupStats {
  const riskCounts = emptyRiskCounts();
  let maxSeverity: number | undefined;
  let highestRisk: RiskLevel = 'None';

  for (const finding of findings) {
    riskCounts[finding.riskLevel]++;
    highestRisk = maxRisk(highestRisk, finding.riskLevel);
    if (finding.severity !== undefined && (maxSeverity === undefined || finding.severity > maxSeverity)) {
      maxSeverity = finding.severity;
    }
  }

  return { findingCount: findings.length, maxSeverity, riskCounts, highestRisk };
}

/** キー関数で重複を除いた配列（出現順） */
function distinctBy<T>(items: Iterable<T>, keyOf: (item: T) => string): T[] {
  const seen = new Map<string, T>();
  for (const item of items) {
    const key = keyOf(item);
    if (!seen.has(key)) seen.set(key, item);
  }
  return [...seen.values()];
}

function aggregateVulnerabilityGroup(group: VulnerabilityGroup): AggregatedVulnerabilityGroup {
  return {
    mode: 'ByVulnerability',
    group,
    stats: computeStats(group.findings),
    hosts: distinctBy<Host>(
      group.findings.map((f) => f.host),
      (h) => h.key,
    ),
  };
}

function aggregateHostGroup(group: HostGroup): AggregatedHostGroup {
  const ports = group.findings
    .map((f) => f.port)
    .filter((p): p is Port => p !== undefined);

  return {
    mode: 'ByHost',
    group,
    stats: computeStats(group.findings),
    ports: distinctBy<Port>(ports, (p) => p.label),
    vulnerabilities: distinctBy<Vulnerability>(
      group.findings.map((f) => f.vulnerability),
      (v) => v.oid,
    ),
  };
}

/** Vulnerability（oid で重複排除）を family ごとに数える */
function countFamilies(vulnerabilities: Iterable<Vulnerability>): FamilyCount[] {
  const counts = new Map<string | null, number>();
  for (const vuln of distinctBy(vulnerabilities, (v) => v.oid)) {
    const family = vuln.family ?? null;
    counts.set(family, (counts.get(family) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([family, vulnerabilityCount]): FamilyCount => ({ family, vulnerabilityCount }))
    .sort((a, b) => {
      if (a.vulnerabilityCount !== b.vulnerabilityCount) {
        return b.vulnerabilityCount - a.vulnerabilityCount;
      }
      if (a.family === b.family) return 0;
      if (a.family === null) return 1;
      if (b.family === null) return -1;
      return compareText(a.family, b.family);
    });
}

function computeTotals(groups: readonly Group[]): ReportTotals {
  const riskCounts = emptyRiskCounts();
  const hostsByRisk = new Map<RiskLevel, Set<string>>(
    RISK_LEVELS.map((level): [RiskLevel, Set<string>] => [level, new Set()]),
  );
  const hosts = new Set<string>();
  let findingCount = 0;

  for (const group of groups) {
    for (const finding of group.findings) {
      findingCount++;
      riskCounts[finding.riskLevel]++;
      hosts.add(finding.host.key);
      hostsByRisk.get(finding.riskLevel)?.add(finding.host.key);
    }
  }

  const hostCountsByRisk = emptyRiskCounts();
  for (const level of RISK_LEVELS) {
    hostCountsByRisk[level] = hostsByRisk.get(level)?.size ?? 0;
  }

  const familyCounts = countFamilies(groups.flatMap((g) => g.findings.map((f) => f.vulnerability)));

  return { findingCount, riskCounts, hostCount: hosts.size, hostCountsByRisk, familyCounts };
}

// ============================================================
// 並び順
// ============================================================

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortName(aggregated: AggregatedGroup): string {
  return aggregated.mode === 'ByVulnerability'
    ? aggregated.group.vulnerability.name
    : aggregated.group.host.hostname;
}

/** Group の比較関数。入力順に依存しない全順序を与える。 */
export function compareGroups(a: AggregatedGroup, b: AggregatedGroup): number {
  const severityA = a.stats.maxSeverity ?? -1;
  const severityB = b.stats.maxSeverity ?? -1;
  if (severityA !== severityB) return severityB - severityA;

  if (a.stats.findingCount !== b.stats.findingCount) {
    return b.stats.findingCount - a.stats.findingCount;
  }

  const byName = compareText(sortName(a), sortName(b));
  if (byName !== 0) return byName;

  return compareText(a.group.key, b.group.key);
}

// ============================================================
// aggregate
// ============================================================

/**
 * Group の統計・全体集計を計算し、決定的な順序に並べて返す。
 * 入力配列は変更しない。
 *
 * @throws InvariantViolationError 異なるモードの Group が混在している場合
 */
export function aggregate(
  groups: readonly VulnerabilityGroup[],
): Aggregation<AggregatedVulnerabilityGroup>;
export function aggregate(groups: readonly HostGroup[]): Aggregation<AggregatedHostGroup>;
export function aggregate(groups: readonly Group[]): Aggregation;
export function aggregate(groups: readonly Group[]): Aggregation {
  const mode = groups[0]?.mode;
  const mixed = groups.find((g) => g.mode !== mode);
  if (mixed !== undefined) {
    throw new InvariantViolationError(
      `cannot aggregate ${mixed.mode} group "${mixed.key}" together with ${String(mode)} groups`,
    );
  }

  const aggregated = groups.map((g): AggregatedGroup =>
    g.mode === 'ByVulnerability' ? aggregateVulnerabilityGroup(g) : aggregateHostGroup(g),
  );
  aggregated.sort(compareGroups);

  return {
    groups: aggregated,
    totals: computeTotals(groups),
  };
}
