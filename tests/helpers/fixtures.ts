/**
 * テスト用の RawRecord / Finding ビルダー
 */

import pino from 'pino';
import { FindingNormalizer } from '../../src/engine/normalizer.js';
import type { Finding } from '../../src/types/entities.js';
import type { RawNvt, RawRecord } from '../../src/types/parser.js';

export const silentLogger = pino({ level: 'silent' });

export function rawNvt(overrides: Partial<RawNvt> = {}): RawNvt {
  return {
    oid: '1.3.6.1.4.1.25623.1.0.1',
    name: 'Test NVT',
    severities: [],
    refs: [],
    ...overrides,
  };
}

export function rawRecord(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    index: 0,
    id: 'res-1',
    detectionDetails: [],
    host: { address: '10.0.0.1' },
    nvt: rawNvt(),
    ...overrides,
  };
}

/** Finding 1 件分の簡易指定 */
export interface FindingSeed {
  id: string;
  oid: string;
  vulnName?: string;
  family?: string;
  host: string;
  port?: string;
  severity?: string;
}

/** 1 つの Normalizer で FindingSeed の列を Finding に変換する */
export function buildFindings(seeds: readonly FindingSeed[]): Finding[] {
  const normalizer = new FindingNormalizer(undefined, silentLogger);
  return seeds.map((seed, index) =>
    normalizer.normalize(
      rawRecord({
        index,
        id: seed.id,
        host: { address: seed.host },
        port: seed.port,
        severity: seed.severity,
        nvt: rawNvt({ oid: seed.oid, name: seed.vulnName ?? seed.oid, family: seed.family }),
      }),
    ),
  );
}

/** OpenVAS レポート XML の result 要素を組み立てる */
export interface ResultXmlFields {
  id?: string;
  host: string;
  hostname?: string;
  port?: string;
  oid?: string;
  nvtName?: string;
  cvssBase?: string;
  severity?: string;
  threat?: string;
}

export function resultXml(fields: ResultXmlFields): string {
  const idAttr = fields.id !== undefined ? ` id="${fields.id}"` : '';
  const hostname = fields.hostname !== undefined ? `<hostname>${fields.hostname}</hostname>` : '';
  const nvt =
    fields.oid !== undefined
      ? `<nvt oid="${fields.oid}"><name>${fields.nvtName ?? fields.oid}</name>` +
        (fields.cvssBase !== undefined ? `<cvss_base>${fields.cvssBase}</cvss_base>` : '') +
        '</nvt>'
      : '';
  return [
    `<result${idAttr}>`,
    `<host>${fields.host}${hostname}</host>`,
    fields.port !== undefined ? `<port>${fields.port}</port>` : '',
    nvt,
    fields.threat !== undefined ? `<threat>${fields.threat}</threat>` : '',
    fields.severity !== undefined ? `<severity>${fields.severity}</severity>` : '',
    '</result>',
  ].join('');
}

export function reportXml(results: readonly ResultXmlFields[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<report id="r-1" extension="xml" content_type="text/xml"><report id="r-1"><results>${results
    .map(resultXml)
    .join('\n')}</results></report></report>`;
}
