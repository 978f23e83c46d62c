/**
 * scantab — Configuration
 *
 * 環境変数とレポートオプションを Zod で検証する。
 * 設定ファイルの読み込みやコマンドライン解析は呼び出し側の責務。
 */

import { z } from 'zod';
import { ReportOptionsSchema } from './types/report.js';
import type { ReportOptions } from './types/report.js';
import { ConfigValidationError } from './types/errors.js';

// ============================================================
// 環境変数
// ============================================================

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  SCANTAB_LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
});

export interface EnvConfig {
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * 環境変数から設定を読み込む。
 * 不正な値は無視して既定値を使う（ロガー初期化前なので例外にしない）。
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse({ SCANTAB_LOG_LEVEL: env['SCANTAB_LOG_LEVEL'] });
  const logLevel = parsed.success ? parsed.data.SCANTAB_LOG_LEVEL : undefined;
  return { logLevel: logLevel ?? 'info' };
}

// ============================================================
// レポートオプション
// ============================================================

/**
 * 外部（MCP ツール引数・呼び出し側の設定）から渡されたオプションを検証し、
 * 既定値を補完する。
 *
 * @throws ConfigValidationError 検証に失敗した場合
 */
export function parseReportOptions(input: unknown = {}): ReportOptions {
  const result = ReportOptionsSchema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  throw new ConfigValidationError(issues);
}
