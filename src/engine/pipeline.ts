/**
 * scantab — Report pipeline
 *
 * Parser → Normalizer → Grouping → Aggregator → Report Model Builder を
 * 1 回のレポート生成として実行する。
 * generateReportFromContent() はコアロジック（ファイルシステム非依存・テスト可能）。
 * generateReport() はファイル読み込みの薄いラッパー。
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import type { Finding } from '../types/entities.js';
import type { ReportSource, ReportResult, SkippedRecord } from '../types/engine.js';
import type { ReportOptions, ReportOptionsInput } from '../types/report.js';
import { MissingIdentifierError } from '../types/errors.js';
import { parseOpenvasXml } from '../parser/openvas-parser.js';
import { FindingNormalizer } from './normalizer.js';
import { group } from './grouping.js';
import { aggregate } from './aggregator.js';
import { buildReport } from './report-builder.js';
import { parseReportOptions } from '../config.js';
import { createModuleLogger } from '../logger.js';

/**
 * レポート XML の文字列を直接受け取り、ReportTable を生成する。
 *
 * インターン表はこの呼び出しの中だけで使われ、呼び出し間で共有されない。
 * いずれかの段階で失敗した場合、テーブルは 1 つも返さない。
 *
 * @param sources ドキュメントの列（順に処理し、1 つのレポートにまとめる）
 * @param options 検証済みのレポートオプション
 * @param log     ロガー（省略時はモジュールロガー）
 */
export function generateReportFromContent(
  sources: readonly ReportSource[],
  options: ReportOptions,
  log: Logger = createModuleLogger('pipeline'),
): ReportResult {
  const normalizer = new FindingNormalizer(options.thresholds, log);
  const findings: Finding[] = [];
  const skipped: SkippedRecord[] = [];

  // 1. パース + 正規化
  for (const { source, content } of sources) {
    for (const raw of parseOpenvasXml(content, source)) {
      try {
        findings.push(normalizer.normalize(raw));
      } catch (err) {
        if (!(err instanceof MissingIdentifierError) || options.onMissingIdentifier === 'abort') {
          throw err;
        }
        log.warn(
          { source, index: err.recordIndex, recordId: err.recordId, field: err.field },
          'Skipping result without identifier',
        );
        skipped.push({ source, index: err.recordIndex, recordId: err.recordId, field: err.field });
      }
    }
  }

  // 2. RiskLevel フィルタ
  const allowed = new Set(options.riskLevels);
  const included = findings.filter((f) => allowed.has(f.riskLevel));

  // 3. グループ化 + 集計（summary と全体集計は常に ByVulnerability から）
  const byVulnerability = aggregate(group(included, 'ByVulnerability'));
  const byHost = options.includeByHost ? aggregate(group(included, 'ByHost')) : undefined;

  // 4. テーブル組み立て
  const tables = buildReport({ byVulnerability, byHost }, options);

  log.info(
    {
      documents: sources.length,
      findings: included.length,
      filtered: findings.length - included.length,
      skipped: skipped.length,
      tables: tables.map((t) => t.kind),
    },
    'Report generated',
  );

  return {
    tables,
    totals: byVulnerability.totals,
    filteredCount: findings.length - included.length,
    skipped,
    vulnerabilityCount: normalizer.vulnerabilityCount,
    hostCount: normalizer.hostCount,
  };
}

/**
 * ファイルパスからレポート XML を読み込み、ReportTable を生成する。
 * generateReportFromContent() の薄いラッパー。
 *
 * @param paths   レポート XML のパス（複数可、1 つのレポートにまとめる）
 * @param options 未検証のオプション（既定値で補完する）
 * @throws ConfigValidationError オプションが不正な場合
 */
export function generateReport(
  paths: readonly string[],
  options: ReportOptionsInput = {},
): ReportResult {
  const parsedOptions = parseReportOptions(options);
  const sources = paths.map((p): ReportSource => {
    const resolved = path.resolve(p);
    return { source: resolved, content: fs.readFileSync(resolved, 'utf-8') };
  });
  return generateReportFromContent(sources, parsedOptions);
}
