/**
 * scantab — MCP Resources
 *
 * Read-only resources describing the risk classification.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DEFAULT_RISK_THRESHOLDS } from '../types/report.js';
import { MAX_SCORE, MIN_SCORE } from '../engine/risk.js';

export function registerResources(server: McpServer): void {
  // scantab://thresholds — 既定の RiskLevel しきい値と各レベルの範囲
  server.resource(
    'thresholds',
    'scantab://thresholds',
    { description: 'Default risk level thresholds and the score band of each level' },
    async (uri) => {
      const t = DEFAULT_RISK_THRESHOLDS;
      const bands = [
        { level: 'None', from: null, to: MIN_SCORE, note: 'absent score or score <= 0' },
        { level: 'Low', from: MIN_SCORE, to: t.medium, note: 'exclusive lower bound' },
        { level: 'Medium', from: t.medium, to: t.high },
        { level: 'High', from: t.high, to: t.critical },
        { level: 'Critical', from: t.critical, to: MAX_SCORE, note: 'inclusive upper bound' },
      ];
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify({ thresholds: t, bands }, null, 2),
          },
        ],
      };
    },
  );
}
