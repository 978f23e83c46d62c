/**
 * scantab — Finding Normalizer
 *
 * RawRecord（パーサーの中間表現）を受け取り、正規化済みの Finding を返す。
 * Vulnerability は oid、Host は (assetId, hostname) の自然キーでインターンし、
 * 同一キーの 2 件目以降は最初に生成したインスタンスを再利用する（先勝ち）。
 *
 * インターン表はインスタンスごとに持つ。1 回のレポート生成ごとに
 * 新しい FindingNormalizer を生成すること。
 */

import type { Logger } from 'pino';
import type { RawNvt, RawRecord } from '../types/parser.js';
import type {
  Finding,
  Host,
  Port,
  Reference,
  SeverityEntry,
  Vulnerability,
} from '../types/entities.js';
import { DEFAULT_RISK_THRESHOLDS } from '../types/report.js';
import type { RiskThresholds } from '../types/report.js';
import { MissingIdentifierError } from '../types/errors.js';
import { classifyRisk, clampScore, toThreatLevel } from './risk.js';
import { createModuleLogger } from '../logger.js';

// ============================================================
// 値の変換
// ============================================================

/** 数値文字列をスコアとして解釈する。数値でなければ undefined。 */
function parseScore(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? clampScore(n) : undefined;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** `443/tcp` 形式のポート表記を分解する。`general/tcp` はポート番号 0。 */
export function parsePort(label: string | undefined): Port | undefined {
  if (label === undefined) return undefined;
  const slash = label.indexOf('/');
  const head = slash === -1 ? label : label.slice(0, slash);
  const protocol = slash === -1 ? '' : label.slice(slash + 1);
  const number = /^\d+$/.test(head) ? Number(head) : 0;
  return { number, protocol, label };
}

/** `key=value|key=value` 形式の tags を分解する */
export function parseTags(tags: string | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (tags === undefined) return result;
  for (const entry of tags.split('|')) {
    const eq = entry.indexOf('=');
    const key = (eq === -1 ? entry : entry.slice(0, eq)).trim();
    if (key === '') continue;
    result[key] = eq === -1 ? '' : entry.slice(eq + 1).trim();
  }
  return result;
}

/**
 * Host のインターンキー。(assetId, hostname) の組を JSON 配列として符号化する。
 * 区切り文字を含む値でも別の組と衝突しない。
 */
export function buildHostKey(assetId: string | undefined, hostname: string): string {
  return JSON.stringify([assetId ?? null, hostname]);
}

/**
 * severity の決定。
 * 明示的な <severity> → <severities> 内の最大スコア → cvss_base → undefined
 */
export function resolveSeverity(
  severity: string | undefined,
  nvt: RawNvt | undefined,
): number | undefined {
  const explicit = parseScore(severity);
  if (explicit !== undefined) return explicit;

  const scores = [
    parseScore(nvt?.severitiesScore),
    ...(nvt?.severities ?? []).map((s) => parseScore(s.score)),
  ].filter((s): s is number => s !== undefined);
  if (scores.length > 0) return Math.max(...scores);

  return parseScore(nvt?.cvssBase);
}

// ============================================================
// FindingNormalizer
// ============================================================

/** インターン表内の Host。ports は Finding の追加に伴って増える。 */
interface HostEntry {
  key: string;
  address?: string;
  assetId?: string;
  hostname: string;
  ports: Port[];
}

export class FindingNormalizer {
  private readonly thresholds: RiskThresholds;
  private readonly log: Logger;
  private readonly vulnerabilities = new Map<string, Vulnerability>();
  private readonly hosts = new Map<string, HostEntry>();

  constructor(thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS, log?: Logger) {
    this.thresholds = thresholds;
    this.log = log ?? createModuleLogger('normalizer');
  }

  /** これまでにインターンした Vulnerability の数 */
  get vulnerabilityCount(): number {
    return this.vulnerabilities.size;
  }

  /** これまでにインターンした Host の数 */
  get hostCount(): number {
    return this.hosts.size;
  }

  /**
   * RawRecord を Finding に変換する。
   *
   * 識別子の検査はインターン表に触れる前に行うので、
   * 失敗したレコードが他のレコードの結果に影響することはない。
   *
   * @throws MissingIdentifierError finding id または NVT oid がない場合
   */
  normalize(raw: RawRecord): Finding {
    const id = raw.id;
    if (id === undefined || id.trim() === '') {
      throw new MissingIdentifierError(raw.index, 'id');
    }
    const oid = raw.nvt?.oid;
    if (oid === undefined || oid.trim() === '') {
      throw new MissingIdentifierError(raw.index, 'nvt.oid', id);
    }

    const vulnerability = this.internVulnerability(oid, raw);
    const port = parsePort(raw.port);
    const host = this.internHost(raw, port);

    const severity = resolveSeverity(raw.severity, raw.nvt);
    const riskLevel = classifyRisk(severity, this.thresholds);

    const explicitThreat = toThreatLevel(raw.threat);
    if (raw.threat !== undefined && explicitThreat === undefined) {
      this.log.debug(
        { recordId: id, threat: raw.threat },
        'Unrecognized threat label, deriving from severity',
      );
    }

    return {
      id,
      name: raw.name,
      owner: raw.owner,
      vulnerability,
      host,
      port,
      threat: explicitThreat ?? riskLevel,
      severity,
      riskLevel,
      qodValue: parseNumber(raw.qodValue),
      qodType: raw.qodType,
      detectionDetails: raw.detectionDetails.map((d) => ({ name: d.name, value: d.value })),
      createdAt: raw.creationTime,
      modifiedAt: raw.modificationTime,
      description: raw.description,
      comment: raw.comment,
      scanNvtVersion: raw.scanNvtVersion,
      originalThreat: raw.originalThreat,
      originalSeverity: parseNumber(raw.originalSeverity),
    };
  }

  // ---------------------------------------------------------
  // インターン
  // ---------------------------------------------------------

  private internVulnerability(oid: string, raw: RawRecord): Vulnerability {
    const existing = this.vulnerabilities.get(oid);
    if (existing) {
      return existing;
    }

    const nvt = raw.nvt;
    const severities: SeverityEntry[] = (nvt?.severities ?? []).map((s) => ({
      type: s.type,
      origin: s.origin,
      date: s.date,
      score: parseScore(s.score),
      value: s.value,
    }));
    const references: Reference[] = (nvt?.refs ?? []).map((r) => ({ type: r.type, id: r.id }));

    const vulnerability: Vulnerability = {
      oid,
      name: nvt?.name ?? raw.name ?? oid,
      type: nvt?.type,
      family: nvt?.family,
      cvssBase: parseScore(nvt?.cvssBase),
      severities,
      solutionType: nvt?.solutionType,
      solution: nvt?.solution,
      tags: parseTags(nvt?.tags),
      references,
      cves: references.filter((r) => r.type.toLowerCase() === 'cve').map((r) => r.id),
    };
    this.vulnerabilities.set(oid, vulnerability);
    return vulnerability;
  }

  private internHost(raw: RawRecord, port: Port | undefined): Host {
    // hostname がない場合はアドレスをホスト名として扱う
    const hostname = raw.host.hostname ?? raw.host.address ?? '';
    const key = buildHostKey(raw.host.assetId, hostname);

    let entry = this.hosts.get(key);
    if (!entry) {
      entry = {
        key,
        address: raw.host.address,
        assetId: raw.host.assetId,
        hostname,
        ports: [],
      };
      this.hosts.set(key, entry);
    }

    if (port !== undefined && !entry.ports.some((p) => p.label === port.label)) {
      entry.ports.push(port);
    }
    return entry;
  }
}
