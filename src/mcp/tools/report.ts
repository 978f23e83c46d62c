/**
 * scantab — MCP Report Tool
 *
 * Tool for turning OpenVAS XML exports into render-agnostic report tables.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { RISK_LEVELS } from '../../types/entities.js';
import { RiskThresholdsSchema } from '../../types/report.js';
import { generateReport } from '../../engine/pipeline.js';
import { createModuleLogger } from '../../logger.js';

const log = createModuleLogger('mcp');

export function registerReportTool(server: McpServer): void {
  server.tool(
    'generate_report',
    'Parse one or more OpenVAS XML report files and return grouped, severity-ranked report tables as JSON',
    {
      paths: z.array(z.string()).min(1).describe('Absolute paths to OpenVAS XML report files'),
      includeByVulnerability: z.boolean().optional().describe('Build the by-vulnerability table'),
      includeByHost: z.boolean().optional().describe('Build the by-host table'),
      includeSummary: z
        .boolean()
        .optional()
        .describe('Build the summary table and the vulnerabilities-by-family table'),
      includeDetails: z
        .boolean()
        .optional()
        .describe('Build the per-finding detail table (one row per vulnerability, host and port)'),
      riskLevels: z
        .array(z.enum(RISK_LEVELS))
        .optional()
        .describe('Only include findings at these risk levels'),
      thresholds: RiskThresholdsSchema.optional().describe(
        'Lower bounds of the Medium/High/Critical risk levels',
      ),
      onMissingIdentifier: z
        .enum(['skip', 'abort'])
        .optional()
        .describe('Skip results without an id, or abort the whole report'),
    },
    async ({ paths, ...options }) => {
      try {
        const result = generateReport(paths, options);
        const body = {
          tables: result.tables,
          totals: result.totals,
          filteredCount: result.filteredCount,
          skipped: result.skipped,
        };
        return { content: [{ type: 'text', text: JSON.stringify(body, null, 2) }] };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error({ err, paths }, 'Report generation failed');
        return {
          content: [{ type: 'text', text: `Report generation failed: ${message}` }],
          isError: true,
        };
      }
    },
  );
}
