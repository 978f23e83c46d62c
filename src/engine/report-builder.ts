/**
 * scantab — Report Model Builder
 *
 * 集計済み Group から出力形式に依存しない ReportTable を組み立てる。
 * レンダリングは行わない。
 */

import { RISK_LEVELS } from '../types/entities.js';
import type { Finding } from '../types/entities.js';
import type {
  AggregatedHostGroup,
  AggregatedVulnerabilityGroup,
  Aggregation,
  AggregationSet,
  ReportColumn,
  ReportRow,
  ReportTable,
  TableSelection,
} from '../types/report.js';
import { InvariantViolationError } from '../types/errors.js';

// ============================================================
// 列定義
// ============================================================

export const VULNERABILITY_COLUMNS: readonly ReportColumn[] = [
  { key: 'name', label: 'Vulnerability' },
  { key: 'family', label: 'Family' },
  { key: 'riskLevel', label: 'Risk level' },
  { key: 'cvss', label: 'CVSS' },
  { key: 'hostCount', label: 'Affected hosts' },
  { key: 'solution', label: 'Solution' },
  { key: 'oid', label: 'OID' },
  { key: 'cves', label: 'CVEs' },
];

export const HOST_COLUMNS: readonly ReportColumn[] = [
  { key: 'hostname', label: 'Hostname' },
  { key: 'assetId', label: 'Asset ID' },
  { key: 'vulnerabilityCount', label: 'Vulnerabilities' },
  { key: 'highestRisk', label: 'Highest risk level' },
  { key: 'openPorts', label: 'Open ports' },
  { key: 'address', label: 'Address' },
  { key: 'findingCount', label: 'Findings' },
];

export const SUMMARY_COLUMNS: readonly ReportColumn[] = [
  { key: 'level', label: 'Level' },
  { key: 'count', label: 'Count' },
  { key: 'hostCount', label: 'Hosts' },
];

/** Finding 1 件 1 行。説明系の列は NVT の tags から取る。 */
export const DETAIL_COLUMNS: readonly ReportColumn[] = [
  { key: 'hostname', label: 'Hostname' },
  { key: 'address', label: 'IP' },
  { key: 'port', label: 'Port' },
  { key: 'protocol', label: 'Protocol' },
  { key: 'vulnerability', label: 'Vulnerability' },
  { key: 'cvss', label: 'CVSS' },
  { key: 'severity', label: 'Severity' },
  { key: 'threat', label: 'Threat' },
  { key: 'family', label: 'Family' },
  { key: 'description', label: 'Description' },
  { key: 'detection', label: 'Detection' },
  { key: 'insight', label: 'Insight' },
  { key: 'impact', label: 'Impact' },
  { key: 'affected', label: 'Affected' },
  { key: 'solution', label: 'Solution' },
  { key: 'solutionType', label: 'Solution type' },
  { key: 'oid', label: 'Vulnerability ID' },
  { key: 'cves', label: 'CVEs' },
  { key: 'references', label: 'References' },
];

export const FAMILY_COLUMNS: readonly ReportColumn[] = [
  { key: 'family', label: 'Family' },
  { key: 'vulnerabilityCount', label: 'Vulnerabilities' },
];

/** 区切り文字で連結する。空なら null。 */
function joinOrNull(values: readonly string[]): string | null {
  return values.length > 0 ? values.join(', ') : null;
}

// ============================================================
// 各テーブル
// ============================================================

function vulnerabilityRow(aggregated: AggregatedVulnerabilityGroup): ReportRow {
  const vuln = aggregated.group.vulnerability;
  return {
    name: vuln.name,
    family: vuln.family ?? null,
    riskLevel: aggregated.stats.highestRisk,
    cvss: vuln.cvssBase ?? null,
    hostCount: aggregated.hosts.length,
    solution: vuln.solution ?? null,
    oid: vuln.oid,
    cves: joinOrNull(vuln.cves),
  };
}

function hostRow(aggregated: AggregatedHostGroup): ReportRow {
  const host = aggregated.group.host;
  // general/tcp などポート番号のない表記は除く
  const openPorts = aggregated.ports.filter((p) => p.number > 0).map((p) => p.label);
  return {
    hostname: host.hostname,
    assetId: host.assetId ?? null,
    vulnerabilityCount: aggregated.vulnerabilities.length,
    highestRisk: aggregated.stats.highestRisk,
    openPorts: joinOrNull(openPorts),
    address: host.address ?? null,
    findingCount: aggregated.stats.findingCount,
  };
}

/** 値のない tag（`insight=` など）は null */
function tagOrNull(tags: Readonly<Record<string, string>>, name: string): string | null {
  const value = tags[name];
  return value !== undefined && value !== '' ? value : null;
}

function detailRow(finding: Finding): ReportRow {
  const { vulnerability: vuln, host, port } = finding;
  return {
    hostname: host.hostname,
    address: host.address ?? null,
    port: port?.number ?? null,
    protocol: port !== undefined && port.protocol !== '' ? port.protocol : null,
    vulnerability: vuln.name,
    cvss: vuln.cvssBase ?? null,
    severity: finding.severity ?? null,
    threat: finding.threat,
    family: vuln.family ?? null,
    description: tagOrNull(vuln.tags, 'summary'),
    detection: tagOrNull(vuln.tags, 'vuldetect'),
    insight: tagOrNull(vuln.tags, 'insight'),
    impact: tagOrNull(vuln.tags, 'impact'),
    affected: tagOrNull(vuln.tags, 'affected'),
    solution: vuln.solution ?? null,
    solutionType: vuln.solutionType ?? null,
    oid: vuln.oid,
    cves: joinOrNull(vuln.cves),
    references: joinOrNull(
      vuln.references.filter((r) => r.type.toLowerCase() !== 'cve').map((r) => r.id),
    ),
  };
}

/** 集計済み Group の順、Group 内は Finding の出現順 */
function detailRows(aggregation: Aggregation<AggregatedVulnerabilityGroup>): ReportRow[] {
  return aggregation.groups.flatMap((g) => g.group.findings.map(detailRow));
}

function familyRows(aggregation: Aggregation<AggregatedVulnerabilityGroup>): ReportRow[] {
  return aggregation.totals.familyCounts.map((f) => ({
    family: f.family,
    vulnerabilityCount: f.vulnerabilityCount,
  }));
}

/** RiskLevel ごとに 1 行（Critical から None の順）と合計行 */
function summaryRows(aggregation: Aggregation<AggregatedVulnerabilityGroup>): ReportRow[] {
  const { totals } = aggregation;
  const rows: ReportRow[] = [...RISK_LEVELS].reverse().map((level) => ({
    level,
    count: totals.riskCounts[level],
    hostCount: totals.hostCountsByRisk[level],
  }));
  rows.push({ level: 'Total', count: totals.findingCount, hostCount: totals.hostCount });
  return rows;
}

function requireAggregation<T>(aggregation: T | undefined, table: string, mode: string): T {
  if (aggregation === undefined) {
    throw new InvariantViolationError(`${table} table requested without a ${mode} aggregation`);
  }
  return aggregation;
}

// ============================================================
// buildReport
// ============================================================

/**
 * 選択されたテーブルを by vulnerability → by host → details → summary → by family
 * の順で返す。by family は summary に付随し、includeSummary で出力される。
 * details・summary・by family は ByVulnerability の集計から作る。
 *
 * @throws InvariantViolationError 選択されたテーブルに必要な集計がない場合
 */
export function buildReport(aggregations: AggregationSet, selection: TableSelection): ReportTable[] {
  const tables: ReportTable[] = [];

  if (selection.includeByVulnerability) {
    const byVuln = requireAggregation(aggregations.byVulnerability, 'by vulnerability', 'ByVulnerability');
    tables.push({
      kind: 'byVulnerability',
      title: 'Vulnerabilities',
      columns: VULNERABILITY_COLUMNS,
      rows: byVuln.groups.map(vulnerabilityRow),
    });
  }

  if (selection.includeByHost) {
    const byHost = requireAggregation(aggregations.byHost, 'by host', 'ByHost');
    tables.push({
      kind: 'byHost',
      title: 'Hosts',
      columns: HOST_COLUMNS,
      rows: byHost.groups.map(hostRow),
    });
  }

  if (selection.includeDetails) {
    const byVuln = requireAggregation(aggregations.byVulnerability, 'details', 'ByVulnerability');
    tables.push({
      kind: 'details',
      title: 'Findings',
      columns: DETAIL_COLUMNS,
      rows: detailRows(byVuln),
    });
  }

  if (selection.includeSummary) {
    const byVuln = requireAggregation(aggregations.byVulnerability, 'summary', 'ByVulnerability');
    tables.push({
      kind: 'summary',
      title: 'Summary',
      columns: SUMMARY_COLUMNS,
      rows: summaryRows(byVuln),
    });
    tables.push({
      kind: 'byFamily',
      title: 'Vulnerabilities by family',
      columns: FAMILY_COLUMNS,
      rows: familyRows(byVuln),
    });
  }

  return tables;
}
