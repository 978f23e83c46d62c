/**
 * scantab — OpenVAS XML パーサー
 *
 * OpenVAS / GVM のレポート XML を解析し、`<result>` 要素ごとに
 * RawRecord 中間表現を遅延的に返す。
 * fast-xml-parser を使用して XML をパースする。
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type {
  RawDetectionDetail,
  RawNvt,
  RawRecord,
  RawReference,
  RawSeverity,
} from '../types/parser.js';
import { MalformedInputError } from '../types/errors.js';

// ============================================================
// ユーティリティ
// ============================================================

/** 値を配列に正規化する。undefined/null は空配列を返す。 */
function ensureArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 要素のテキストを取り出す。
 * 空要素・空白のみの要素は undefined として扱う。
 */
function text(node: unknown): string | undefined {
  if (typeof node === 'string') {
    const trimmed = node.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (Array.isArray(node)) {
    return text(node[0]);
  }
  if (isRecord(node)) {
    return text(node['#text']);
  }
  return undefined;
}

/** 属性値を取り出す */
function attr(node: unknown, name: string): string | undefined {
  if (Array.isArray(node)) {
    return attr(node[0], name);
  }
  if (!isRecord(node)) {
    return undefined;
  }
  return text(node[`@_${name}`]);
}

/** 子要素を取り出す。繰り返し要素は先頭を使う。 */
function child(node: unknown, name: string): unknown {
  if (Array.isArray(node)) {
    return child(node[0], name);
  }
  if (!isRecord(node)) {
    return undefined;
  }
  return node[name];
}

// ============================================================
// result 要素の探索
// ============================================================

/**
 * `<results>` 直下の `<result>` をドキュメント順に列挙する。
 * `<detection>` 内の入れ子の `<result>` は Finding ではないので降りない。
 */
function* findResults(node: unknown, depth: number): Generator<unknown> {
  if (Array.isArray(node)) {
    for (const item of node) {
      yield* findResults(item, depth);
    }
    return;
  }
  if (!isRecord(node)) {
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_') || key === '#text') {
      continue;
    }
    if (key === 'results') {
      for (const results of ensureArray(value)) {
        yield* ensureArray(child(results, 'result'));
      }
      continue;
    }
    if (key === 'result') {
      // ルートが単独の <result> のドキュメントも受け付ける
      if (depth === 0) {
        yield* ensureArray(value);
      }
      continue;
    }
    yield* findResults(value, depth + 1);
  }
}

// ============================================================
// 各ブロックの変換
// ============================================================

function toSeverity(node: unknown): RawSeverity {
  return {
    type: attr(node, 'type'),
    origin: text(child(node, 'origin')),
    date: text(child(node, 'date')),
    score: text(child(node, 'score')),
    value: text(child(node, 'value')),
  };
}

function toReferences(refs: unknown): RawReference[] {
  const references: RawReference[] = [];
  for (const ref of ensureArray(child(refs, 'ref'))) {
    const type = attr(ref, 'type');
    const id = attr(ref, 'id');
    if (type !== undefined && id !== undefined) {
      references.push({ type, id });
    }
  }
  return references;
}

function toNvt(node: unknown): RawNvt | undefined {
  if (node === undefined) {
    return undefined;
  }
  const severities = child(node, 'severities');
  const solution = child(node, 'solution');

  return {
    oid: attr(node, 'oid'),
    type: text(child(node, 'type')),
    name: text(child(node, 'name')),
    family: text(child(node, 'family')),
    cvssBase: text(child(node, 'cvss_base')),
    severitiesScore: attr(severities, 'score'),
    severities: ensureArray(child(severities, 'severity')).map(toSeverity),
    tags: text(child(node, 'tags')),
    solutionType: attr(solution, 'type'),
    solution: text(solution),
    refs: toReferences(child(node, 'refs')),
  };
}

function toDetectionDetails(detection: unknown): RawDetectionDetail[] {
  const details: RawDetectionDetail[] = [];
  const results = ensureArray(child(detection, 'result'));
  for (const result of results) {
    for (const detail of ensureArray(child(child(result, 'details'), 'detail'))) {
      const name = text(child(detail, 'name'));
      if (name === undefined) continue;
      details.push({ name, value: text(child(detail, 'value')) ?? '' });
    }
  }
  return details;
}

/**
 * 単一の result 要素を RawRecord に変換する。
 * 欠けている要素は undefined / 空配列になり、例外は投げない。
 */
function toRawRecord(node: unknown, index: number): RawRecord {
  const host = child(node, 'host');
  const qod = child(node, 'qod');

  return {
    index,
    id: attr(node, 'id'),
    name: text(child(node, 'name')),
    owner: text(child(child(node, 'owner'), 'name')),
    creationTime: text(child(node, 'creation_time')),
    modificationTime: text(child(node, 'modification_time')),
    comment: text(child(node, 'comment')),
    detectionDetails: toDetectionDetails(child(node, 'detection')),
    host: {
      address: text(host),
      assetId: attr(child(host, 'asset'), 'asset_id'),
      hostname: text(child(host, 'hostname')),
    },
    port: text(child(node, 'port')),
    nvt: toNvt(child(node, 'nvt')),
    scanNvtVersion: text(child(node, 'scan_nvt_version')),
    threat: text(child(node, 'threat')),
    severity: text(child(node, 'severity')),
    qodValue: text(child(qod, 'value')),
    qodType: text(child(qod, 'type')),
    description: text(child(node, 'description')),
    originalThreat: text(child(node, 'original_threat')),
    originalSeverity: text(child(node, 'original_severity')),
  };
}

// ============================================================
// メインパーサー
// ============================================================

function* iterateRecords(root: unknown): Generator<RawRecord> {
  let index = 0;
  for (const node of findResults(root, 0)) {
    yield toRawRecord(node, index);
    index++;
  }
}

/**
 * OpenVAS XML レポートをパースし、RawRecord を遅延的に返す。
 *
 * 整形式チェックは呼び出し時に行う。返されるイテレータは 1 回だけ走査できる。
 *
 * @param xml    - レポート XML 文字列
 * @param source - エラーメッセージに含めるファイル名など
 * @throws MalformedInputError XML として整形式でない場合
 */
export function parseOpenvasXml(xml: string, source?: string): IterableIterator<RawRecord> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedInputError(msg, line, col, source);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    allowBooleanAttributes: true,
    // 数値の解釈は Normalizer が行う（oid や名前が数値化されないように）
    parseTagValue: false,
    parseAttributeValue: false,
  });

  const parsed: unknown = parser.parse(xml);
  return iterateRecords(parsed);
}
