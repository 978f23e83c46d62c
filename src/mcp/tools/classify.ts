/**
 * scantab — MCP Classify Tool
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { DEFAULT_RISK_THRESHOLDS, RiskThresholdsSchema } from '../../types/report.js';
import { classifyRisk, clampScore } from '../../engine/risk.js';

export function registerClassifyTool(server: McpServer): void {
  server.tool(
    'classify_score',
    'Classify a severity score (0.0-10.0) into a risk level',
    {
      score: z.number().optional().describe('Severity score; omit for an absent score'),
      thresholds: RiskThresholdsSchema.optional().describe(
        'Lower bounds of the Medium/High/Critical risk levels',
      ),
    },
    async ({ score, thresholds }) => {
      const normalized = score !== undefined ? clampScore(score) : undefined;
      const riskLevel = classifyRisk(normalized, thresholds ?? DEFAULT_RISK_THRESHOLDS);
      return {
        content: [
          { type: 'text', text: JSON.stringify({ score: normalized ?? null, riskLevel }) },
        ],
      };
    },
  );
}
