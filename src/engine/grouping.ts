/**
 * scantab — Grouping Engine
 *
 * Finding の列を Vulnerability（oid）または Host（Host.key）で分割する。
 * Group は最初に出現した順に並び、Group 内の Finding も出現順を保つ。
 * Finding の重複排除は行わない。
 */

import type { Finding } from '../types/entities.js';
import type { Group, GroupingMode, HostGroup, VulnerabilityGroup } from '../types/report.js';
import { InvariantViolationError } from '../types/errors.js';

/**
 * Finding を指定モードでグループ化する。
 *
 * @throws InvariantViolationError Vulnerability / Host が解決されていない Finding がある場合
 */
export function group(findings: Iterable<Finding>, mode: 'ByVulnerability'): VulnerabilityGroup[];
export function group(findings: Iterable<Finding>, mode: 'ByHost'): HostGroup[];
export function group(findings: Iterable<Finding>, mode: GroupingMode): Group[];
export function group(findings: Iterable<Finding>, mode: GroupingMode): Group[] {
  switch (mode) {
    case 'ByVulnerability':
      return groupByVulnerability(findings);
    case 'ByHost':
      return groupByHost(findings);
    default: {
      const _exhaustive: never = mode;
      throw new InvariantViolationError(`unknown grouping mode: ${String(_exhaustive)}`);
    }
  }
}

function groupByVulnerability(findings: Iterable<Finding>): VulnerabilityGroup[] {
  const byOid = new Map<string, { vulnerability: Finding['vulnerability']; findings: Finding[] }>();

  for (const finding of findings) {
    // 型上は必須だが、Normalizer の不具合を握りつぶさないよう実行時にも検査する
    const vulnerability: Finding['vulnerability'] | undefined = finding.vulnerability;
    if (vulnerability === undefined || vulnerability === null) {
      throw new InvariantViolationError(`finding ${finding.id} has no resolved vulnerability`);
    }

    const entry = byOid.get(vulnerability.oid);
    if (entry) {
      entry.findings.push(finding);
    } else {
      byOid.set(vulnerability.oid, { vulnerability, findings: [finding] });
    }
  }

  return [...byOid.entries()].map(([key, entry]): VulnerabilityGroup => ({
    mode: 'ByVulnerability',
    key,
    vulnerability: entry.vulnerability,
    findings: entry.findings,
  }));
}

function groupByHost(findings: Iterable<Finding>): HostGroup[] {
  const byKey = new Map<string, { host: Finding['host']; findings: Finding[] }>();

  for (const finding of findings) {
    const host: Finding['host'] | undefined = finding.host;
    if (host === undefined || host === null) {
      throw new InvariantViolationError(`finding ${finding.id} has no resolved host`);
    }

    const entry = byKey.get(host.key);
    if (entry) {
      entry.findings.push(finding);
    } else {
      byKey.set(host.key, { host, findings: [finding] });
    }
  }

  return [...byKey.entries()].map(([key, entry]): HostGroup => ({
    mode: 'ByHost',
    key,
    host: entry.host,
    findings: entry.findings,
  }));
}
