/**
 * scantab — Parser intermediate types
 *
 * パーサーはエクスポート XML の値を文字列のまま保持した中間表現を返す。
 * 数値の解釈・既定値の決定は Normalizer が行う。
 * 省略可能な要素はすべて optional プロパティで表す。
 */

// ============================================================
// NVT ブロック
// ============================================================

/** `<nvt><severities><severity>` の 1 エントリ */
export interface RawSeverity {
  type?: string;
  origin?: string;
  date?: string;
  score?: string;
  value?: string;
}

/** `<refs><ref type=".." id=".."/>` */
export interface RawReference {
  type: string;
  id: string;
}

export interface RawNvt {
  oid?: string;
  type?: string;
  name?: string;
  family?: string;
  cvssBase?: string;
  /** `<severities score="..">` の属性値 */
  severitiesScore?: string;
  severities: RawSeverity[];
  /** `key=value|key=value` 形式の生文字列 */
  tags?: string;
  solutionType?: string;
  solution?: string;
  refs: RawReference[];
}

// ============================================================
// result 要素
// ============================================================

export interface RawHost {
  /** `<host>` 直下のテキスト（通常は IP アドレス） */
  address?: string;
  assetId?: string;
  hostname?: string;
}

export interface RawDetectionDetail {
  name: string;
  value: string;
}

/** 1 件の `<result>` 要素の中間表現 */
export interface RawRecord {
  /** ドキュメント内での 0 始まりの位置（エラー報告用） */
  index: number;
  id?: string;
  name?: string;
  owner?: string;
  creationTime?: string;
  modificationTime?: string;
  comment?: string;
  detectionDetails: RawDetectionDetail[];
  host: RawHost;
  port?: string;
  nvt?: RawNvt;
  scanNvtVersion?: string;
  threat?: string;
  severity?: string;
  qodValue?: string;
  qodType?: string;
  description?: string;
  originalThreat?: string;
  originalSeverity?: string;
}
