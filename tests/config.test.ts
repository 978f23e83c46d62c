import { describe, it, expect } from 'vitest';
import { loadEnvConfig, parseReportOptions } from '../src/config.js';
import { ConfigValidationError } from '../src/types/errors.js';

describe('parseReportOptions', () => {
  it('未指定の項目は既定値で補完する', () => {
    expect(parseReportOptions()).toEqual({
      includeByVulnerability: true,
      includeByHost: true,
      includeSummary: true,
      includeDetails: true,
      thresholds: { medium: 4.0, high: 7.0, critical: 9.0 },
      riskLevels: ['None', 'Low', 'Medium', 'High', 'Critical'],
      onMissingIdentifier: 'skip',
    });
  });

  it('null は空のオプションとして扱う', () => {
    expect(parseReportOptions(null).includeSummary).toBe(true);
  });

  it('指定した値を保持する', () => {
    const options = parseReportOptions({
      includeByHost: false,
      riskLevels: ['High', 'Critical'],
      thresholds: { medium: 5.0, high: 8.0, critical: 9.5 },
      onMissingIdentifier: 'abort',
    });
    expect(options.includeByHost).toBe(false);
    expect(options.riskLevels).toEqual(['High', 'Critical']);
    expect(options.thresholds).toEqual({ medium: 5.0, high: 8.0, critical: 9.5 });
    expect(options.onMissingIdentifier).toBe('abort');
  });

  describe('検証エラー', () => {
    function issuesOf(input: unknown): string[] {
      try {
        parseReportOptions(input);
      } catch (err) {
        if (err instanceof ConfigValidationError) return err.issues;
        throw err;
      }
      throw new Error('expected ConfigValidationError');
    }

    it('しきい値の順序が逆', () => {
      expect(issuesOf({ thresholds: { medium: 7.0, high: 4.0, critical: 9.0 } })).toEqual([
        'thresholds: thresholds must satisfy medium < high < critical',
      ]);
    });

    it('列挙外の RiskLevel は要素のパスで報告する', () => {
      const issues = issuesOf({ riskLevels: ['Severe'] });
      expect(issues).toHaveLength(1);
      expect(issues[0].startsWith('riskLevels.0: ')).toBe(true);
    });

    it('オブジェクトでない入力は (root) で報告する', () => {
      const issues = issuesOf('everything');
      expect(issues).toHaveLength(1);
      expect(issues[0].startsWith('(root): ')).toBe(true);
    });

    it('メッセージに全ての問題を含める', () => {
      expect(() => parseReportOptions({ onMissingIdentifier: 'retry', includeSummary: 'yes' })).toThrow(
        /^Invalid report options: .+; .+$/,
      );
    });
  });
});

describe('loadEnvConfig', () => {
  it('未設定なら info', () => {
    expect(loadEnvConfig({})).toEqual({ logLevel: 'info' });
  });

  it('大文字小文字を区別しない', () => {
    expect(loadEnvConfig({ SCANTAB_LOG_LEVEL: 'DEBUG' })).toEqual({ logLevel: 'debug' });
  });

  it('不正な値は既定値に戻す', () => {
    expect(loadEnvConfig({ SCANTAB_LOG_LEVEL: 'verbose' })).toEqual({ logLevel: 'info' });
  });
});
