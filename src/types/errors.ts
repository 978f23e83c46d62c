/**
 * scantab — Error types
 *
 * パイプライン各段のエラー。レコード単位のエラーは呼び出し側が
 * skip / abort を判断できるよう、レコード位置とフィールド名を持つ。
 */

export class ScantabError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScantabError';
  }
}

/** ドキュメントが XML として解釈できない（ドキュメント単位で致命的） */
export class MalformedInputError extends ScantabError {
  readonly line: number | undefined;
  readonly col: number | undefined;
  readonly source: string | undefined;

  constructor(message: string, line?: number, col?: number, source?: string) {
    const where = line !== undefined ? ` at ${line}:${col ?? 0}` : '';
    const from = source !== undefined ? ` (${source})` : '';
    super(`Malformed input${where}${from}: ${message}`);
    this.name = 'MalformedInputError';
    this.line = line;
    this.col = col;
    this.source = source;
  }
}

/** レコードに識別子（finding id / NVT oid）がない */
export class MissingIdentifierError extends ScantabError {
  readonly recordIndex: number;
  readonly recordId: string | undefined;
  readonly field: 'id' | 'nvt.oid';

  constructor(recordIndex: number, field: 'id' | 'nvt.oid', recordId?: string) {
    const label = recordId !== undefined ? `result ${recordId}` : `result #${recordIndex}`;
    super(`${label} has no usable ${field}`);
    this.name = 'MissingIdentifierError';
    this.recordIndex = recordIndex;
    this.recordId = recordId;
    this.field = field;
  }
}

/** 上流の契約が破られている。常に致命的。 */
export class InvariantViolationError extends ScantabError {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

/** レポートオプションが検証に失敗した */
export class ConfigValidationError extends ScantabError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid report options: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
