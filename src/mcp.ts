import * as path from 'node:path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { analyzeDependencies } from './dependencies.js';
import { VERSION } from './reporter.js';
import { findUnusedComponents } from './usage.js';
import type { WarningHandler } from './types.js';

// stdout carries the protocol, so warnings go into the tool result instead.
function collectWarnings(): { warnings: string[]; onWarning: WarningHandler } {
  const warnings: string[] = [];
  return {
    warnings,
    onWarning: (file, error) => {
      warnings.push(`Warning: could not read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    },
  };
}

function text(lines: string[]): { content: Array<{ type: 'text'; text: string }> } {
  return { content: [{ type: 'text' as const, text: lines.filter(Boolean).join('\n') }] };
}

export function createMcpServer(cwd: string): McpServer {
  const server = new McpServer({
    name: 'figma-make-init',
    version: VERSION,
  });

  server.tool(
    'analyze_dependencies',
    'List the npm packages and Figma UI kit components a Figma Make export imports from app/components.',
    {
      source: z.string().describe('Path to the exported src folder, relative to the working directory'),
      match: z.enum(['substring', 'segment']).optional().describe('How import paths are matched against UI kit names'),
    },
    async ({ source, match }: { source: string; match?: 'substring' | 'segment' }) => {
      const { warnings, onWarning } = collectWarnings();
      const report = analyzeDependencies(path.resolve(cwd, source), { match, onWarning });
      return text([
        `npm packages (${report.npmPackages.length}): ${report.npmPackages.join(', ') || 'none'}`,
        `Figma UI components (${report.figmaUiComponents.length}): ${report.figmaUiComponents.join(', ') || 'none'}`,
        ...warnings,
      ]);
    }
  );

  server.tool(
    'find_unused_components',
    'List UI kit component files under src/app/components/ui that no entry file reaches. Does not delete anything.',
    { project: z.string().describe('Path to the scaffolded project, relative to the working directory') },
    async ({ project }: { project: string }) => {
      const projectDir = path.resolve(cwd, project);
      const { warnings, onWarning } = collectWarnings();
      const unused = findUnusedComponents(projectDir, onWarning);
      if (unused.length === 0) {
        return text(['No unused components.', ...warnings]);
      }
      return text([
        `${unused.length} unused components:`,
        ...unused.map((c) => `  - ${c.name} (${path.relative(projectDir, c.path)})`),
        ...warnings,
      ]);
    }
  );

  return server;
}

export async function runMcp(cwd: string): Promise<void> {
  const server = createMcpServer(cwd);
  await server.connect(new StdioServerTransport());
}
