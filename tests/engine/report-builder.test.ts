import { describe, it, expect } from 'vitest';
import {
  buildReport,
  DETAIL_COLUMNS,
  FAMILY_COLUMNS,
  HOST_COLUMNS,
  SUMMARY_COLUMNS,
  VULNERABILITY_COLUMNS,
} from '../../src/engine/report-builder.js';
import { FindingNormalizer } from '../../src/engine/normalizer.js';
import { aggregate } from '../../src/engine/aggregator.js';
import { group } from '../../src/engine/grouping.js';
import { InvariantViolationError } from '../../src/types/errors.js';
import type { AggregationSet, ReportRenderer, ReportTable } from '../../src/types/report.js';
import { buildFindings, rawNvt, rawRecord, silentLogger } from '../helpers/fixtures.js';

const A = '10.0.0.1';
const B = '10.0.0.2';

const findings = buildFindings([
  { id: 'f1', oid: 'V1', vulnName: 'Alpha', host: A, port: '22/tcp', severity: '9.5' },
  { id: 'f2', oid: 'V1', vulnName: 'Alpha', host: B, port: '22/tcp', severity: '9.5' },
  { id: 'f3', oid: 'V2', vulnName: 'Beta', host: A, port: '80/tcp', severity: '5.0' },
  { id: 'f4', oid: 'V2', vulnName: 'Beta', host: A, port: '443/tcp', severity: '5.0' },
  { id: 'f5', oid: 'V3', vulnName: 'Gamma', host: B, port: 'general/tcp' },
  { id: 'f6', oid: 'V4', vulnName: 'Delta', host: B, port: '8080/tcp', severity: '5.0' },
]);

const aggregations: AggregationSet = {
  byVulnerability: aggregate(group(findings, 'ByVulnerability')),
  byHost: aggregate(group(findings, 'ByHost')),
};

const ALL = {
  includeByVulnerability: true,
  includeByHost: true,
  includeSummary: true,
  includeDetails: true,
};
const NONE = {
  includeByVulnerability: false,
  includeByHost: false,
  includeSummary: false,
  includeDetails: false,
};

function tableOf(tables: ReportTable[], kind: ReportTable['kind']): ReportTable {
  const table = tables.find((t) => t.kind === kind);
  if (!table) throw new Error(`table ${kind} not found`);
  return table;
}

describe('buildReport', () => {
  it('テーブルは by vulnerability → by host → details → summary → by family の順', () => {
    const tables = buildReport(aggregations, ALL);
    expect(tables.map((t) => t.kind)).toEqual([
      'byVulnerability',
      'byHost',
      'details',
      'summary',
      'byFamily',
    ]);
    expect(tables.map((t) => t.title)).toEqual([
      'Vulnerabilities',
      'Hosts',
      'Findings',
      'Summary',
      'Vulnerabilities by family',
    ]);
  });

  it('選択されたテーブルだけを返す', () => {
    const tables = buildReport(aggregations, { ...ALL, includeByVulnerability: false });
    expect(tables.map((t) => t.kind)).toEqual(['byHost', 'details', 'summary', 'byFamily']);
    expect(buildReport(aggregations, { ...NONE, includeDetails: true }).map((t) => t.kind)).toEqual([
      'details',
    ]);
    expect(buildReport(aggregations, NONE)).toEqual([]);
  });

  describe('by vulnerability テーブル', () => {
    const table = tableOf(buildReport(aggregations, ALL), 'byVulnerability');

    it('列定義', () => {
      expect(table.columns).toBe(VULNERABILITY_COLUMNS);
      expect(table.columns.map((c) => c.key)).toEqual([
        'name',
        'family',
        'riskLevel',
        'cvss',
        'hostCount',
        'solution',
        'oid',
        'cves',
      ]);
    });

    it('集計順に 1 Group 1 行、欠けた値は null', () => {
      expect(table.rows.map((r) => r['oid'])).toEqual(['V1', 'V2', 'V4', 'V3']);
      expect(table.rows[0]).toEqual({
        name: 'Alpha',
        family: null,
        riskLevel: 'Critical',
        cvss: null,
        hostCount: 2,
        solution: null,
        oid: 'V1',
        cves: null,
      });
      expect(table.rows[3]['riskLevel']).toBe('None');
    });
  });

  describe('by host テーブル', () => {
    const table = tableOf(buildReport(aggregations, ALL), 'byHost');

    it('列定義', () => {
      expect(table.columns).toBe(HOST_COLUMNS);
    });

    it('ホストごとの行（番号のないポートは除く）', () => {
      expect(table.rows).toEqual([
        {
          hostname: A,
          assetId: null,
          vulnerabilityCount: 2,
          highestRisk: 'Critical',
          openPorts: '22/tcp, 80/tcp, 443/tcp',
          address: A,
          findingCount: 3,
        },
        {
          hostname: B,
          assetId: null,
          vulnerabilityCount: 3,
          highestRisk: 'Critical',
          openPorts: '22/tcp, 8080/tcp',
          address: B,
          findingCount: 3,
        },
      ]);
    });
  });

  describe('summary テーブル', () => {
    it('Critical から None の順に件数とホスト数、最後に合計行', () => {
      const table = tableOf(buildReport(aggregations, ALL), 'summary');
      expect(table.columns).toBe(SUMMARY_COLUMNS);
      expect(table.rows).toEqual([
        { level: 'Critical', count: 2, hostCount: 2 },
        { level: 'High', count: 0, hostCount: 0 },
        { level: 'Medium', count: 3, hostCount: 2 },
        { level: 'Low', count: 0, hostCount: 0 },
        { level: 'None', count: 1, hostCount: 1 },
        { level: 'Total', count: 6, hostCount: 2 },
      ]);
    });
  });

  describe('details テーブル', () => {
    const table = tableOf(buildReport(aggregations, ALL), 'details');

    it('列定義', () => {
      expect(table.columns).toBe(DETAIL_COLUMNS);
      expect(table.columns.map((c) => c.key)).toEqual([
        'hostname',
        'address',
        'port',
        'protocol',
        'vulnerability',
        'cvss',
        'severity',
        'threat',
        'family',
        'description',
        'detection',
        'insight',
        'impact',
        'affected',
        'solution',
        'solutionType',
        'oid',
        'cves',
        'references',
      ]);
    });

    it('Finding 1 件 1 行、集計済み Group の順 → Group 内の出現順', () => {
      expect(table.rows.map((r) => r['oid'])).toEqual(['V1', 'V1', 'V2', 'V2', 'V4', 'V3']);
      expect(table.rows.map((r) => [r['hostname'], r['port']])).toEqual([
        [A, 22],
        [B, 22],
        [A, 80],
        [A, 443],
        [B, 8080],
        [B, 0],
      ]);
    });

    it('severity のない Finding は severity null・threat None', () => {
      expect(table.rows[5]).toMatchObject({ severity: null, threat: 'None', protocol: 'tcp' });
    });

    it('説明系の列を NVT の tags から取る', () => {
      const normalizer = new FindingNormalizer(undefined, silentLogger);
      const finding = normalizer.normalize(
        rawRecord({
          id: 'd1',
          host: { address: '10.0.0.9', hostname: 'web01' },
          port: '443/tcp',
          nvt: rawNvt({
            oid: 'V-web',
            name: 'Outdated web server',
            family: 'Web application abuses',
            cvssBase: '7.5',
            tags: 'summary=Server is outdated|insight=Old parser|impact=Data leak|affected=Server 1.0|vuldetect=Banner check|solution_type=VendorFix',
            solution: 'Upgrade to 2.0.',
            solutionType: 'VendorFix',
            refs: [
              { type: 'cve', id: 'CVE-2024-0101' },
              { type: 'url', id: 'https://example.test/advisory' },
              { type: 'cve', id: 'CVE-2024-0102' },
              { type: 'cert-bund', id: 'CB-K24/0001' },
            ],
          }),
        }),
      );
      const byVulnerability = aggregate(group([finding], 'ByVulnerability'));
      const details = tableOf(
        buildReport({ byVulnerability }, { ...NONE, includeDetails: true }),
        'details',
      );

      expect(details.rows).toEqual([
        {
          hostname: 'web01',
          address: '10.0.0.9',
          port: 443,
          protocol: 'tcp',
          vulnerability: 'Outdated web server',
          cvss: 7.5,
          severity: 7.5,
          threat: 'High',
          family: 'Web application abuses',
          description: 'Server is outdated',
          detection: 'Banner check',
          insight: 'Old parser',
          impact: 'Data leak',
          affected: 'Server 1.0',
          solution: 'Upgrade to 2.0.',
          solutionType: 'VendorFix',
          oid: 'V-web',
          cves: 'CVE-2024-0101, CVE-2024-0102',
          references: 'https://example.test/advisory, CB-K24/0001',
        },
      ]);
    });

    it('ポートのない Finding は port・protocol が null', () => {
      const normalizer = new FindingNormalizer(undefined, silentLogger);
      const finding = normalizer.normalize(rawRecord({ id: 'p1', nvt: rawNvt({ tags: 'insight=' }) }));
      const byVulnerability = aggregate(group([finding], 'ByVulnerability'));
      const [row] = tableOf(
        buildReport({ byVulnerability }, { ...NONE, includeDetails: true }),
        'details',
      ).rows;
      expect(row).toMatchObject({ port: null, protocol: null, insight: null, description: null });
    });
  });

  describe('by family テーブル', () => {
    it('summary と一緒に出力され、family ごとの Vulnerability 数を並べる', () => {
      const withFamilies = buildFindings([
        { id: 'g1', oid: 'V1', family: 'Web', host: A, severity: '9.0' },
        { id: 'g2', oid: 'V2', family: 'Web', host: B, severity: '5.0' },
        { id: 'g3', oid: 'V3', host: A, severity: '2.0' },
      ]);
      const byVulnerability = aggregate(group(withFamilies, 'ByVulnerability'));
      const tables = buildReport({ byVulnerability }, { ...NONE, includeSummary: true });

      expect(tables.map((t) => t.kind)).toEqual(['summary', 'byFamily']);
      const table = tableOf(tables, 'byFamily');
      expect(table.columns).toBe(FAMILY_COLUMNS);
      expect(table.rows).toEqual([
        { family: 'Web', vulnerabilityCount: 2 },
        { family: null, vulnerabilityCount: 1 },
      ]);
    });
  });

  describe('必要な集計がない場合', () => {
    it('by host が選択されているのに ByHost の集計がなければ InvariantViolationError', () => {
      expect(() =>
        buildReport({ byVulnerability: aggregations.byVulnerability }, ALL),
      ).toThrow(InvariantViolationError);
    });

    it('summary は ByVulnerability の集計を要求する', () => {
      expect(() =>
        buildReport({ byHost: aggregations.byHost }, { ...NONE, includeByHost: true, includeSummary: true }),
      ).toThrow('Invariant violated: summary table requested without a ByVulnerability aggregation');
    });

    it('details は ByVulnerability の集計を要求する', () => {
      expect(() => buildReport({ byHost: aggregations.byHost }, { ...NONE, includeDetails: true })).toThrow(
        'Invariant violated: details table requested without a ByVulnerability aggregation',
      );
    });
  });

  describe('ReportRenderer', () => {
    it('外部レンダラーは列と行だけで表を描ける', () => {
      const tsv: ReportRenderer<string> = {
        format: 'tsv',
        render(table) {
          const header = table.columns.map((c) => c.label).join('\t');
          const lines = table.rows.map((row) =>
            table.columns.map((c) => String(row[c.key] ?? '')).join('\t'),
          );
          return [header, ...lines].join('\n');
        },
      };

      const summary = tableOf(buildReport(aggregations, ALL), 'summary');
      expect(tsv.render(summary).split('\n')).toEqual([
        'Level\tCount\tHosts',
        'Critical\t2\t2',
        'High\t0\t0',
        'Medium\t3\t2',
        'Low\t0\t0',
        'None\t1\t1',
        'Total\t6\t2',
      ]);
    });
  });
});
