#!/usr/bin/env node
import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { createInterface } from 'node:readline/promises';
import { analyzeDependencies } from './dependencies.js';
import { parseArgs } from './options.js';
import type { CliOptions } from './options.js';
import {
  VERSION,
  printDone,
  printError,
  printHeader,
  printNextSteps,
  printNotice,
  printReport,
  printUnused,
} from './reporter.js';
import { initProject } from './scaffold.js';
import { appDir, findUnusedComponents } from './usage.js';

const DEFAULT_PROJECT_NAME = 'figma-make-project';

async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

async function confirm(question: string): Promise<boolean> {
  const answer = await ask(`  ${question} [y/N] `);
  return /^y(es)?$/i.test(answer);
}

function requireTarget(target: string | undefined, command: string): string {
  if (!target) throw new Error(`Missing source folder. Usage: figma-make-init ${command} <src>`);
  const resolved = path.resolve(process.cwd(), target);
  if (!existsSync(resolved)) throw new Error(`Source folder does not exist: ${target}`);
  return resolved;
}

async function runInit(target: string | undefined, options: CliOptions): Promise<void> {
  printHeader('Set up a Figma Make project');
  const sourceDir = requireTarget(target, 'init');

  let output = options.output;
  if (!output && options.yes) {
    output = DEFAULT_PROJECT_NAME;
  } else if (!output) {
    output = (await ask(`  Enter a name for your project folder (${DEFAULT_PROJECT_NAME}): `)) || DEFAULT_PROJECT_NAME;
  }
  const outputDir = path.resolve(process.cwd(), output);

  if (existsSync(outputDir)) {
    if (!options.yes && !(await confirm(`Folder '${path.basename(outputDir)}' already exists. Overwrite contents?`))) {
      printNotice('Aborted.');
      process.exitCode = 1;
      return;
    }
  } else {
    printDone(`Creating folder: ${path.basename(outputDir)}`);
  }

  const result = initProject({
    sourceDir,
    outputDir,
    keepUnused: options['keep-unused'],
    skipInstall: options['skip-install'],
    match: options.match,
  });

  process.stdout.write('\n');
  printReport(result.report);
  printNextSteps(result.outputDir, output);
}

function runAnalyze(target: string | undefined, options: CliOptions): void {
  printHeader('Analyzing a Figma Make export');
  const root = requireTarget(target, 'analyze');

  printReport(analyzeDependencies(root, { match: options.match }));

  // Only a scaffolded project has src/app; show what init would prune there.
  if (existsSync(appDir(root))) {
    printUnused(findUnusedComponents(root), root);
  }
}

function printHelp(): void {
  process.stdout.write(`
  ${'\x1b[1m'}figma-make-init${'\x1b[0m'} — turn a Figma Make export into a Vite + Tailwind v4 project

  ${'\x1b[90m'}Usage:${'\x1b[0m'}
    figma-make-init <src> [options]          Scaffold a project from an exported src folder
    figma-make-init analyze <path>           Report packages and UI components without writing anything
    figma-make-init mcp                      MCP server (uses current directory)

  ${'\x1b[90m'}Options:${'\x1b[0m'}
    -o, --output <dir>                       Output folder (prompted for when omitted)
    --keep-unused                            Keep UI kit components nothing imports
    --skip-install                           Don't run npm install
    --match <substring|segment>              How import paths match UI kit names (default: substring)
    -y, --yes                                Don't prompt: default folder name, overwrite if present
    -v, --version                            Print the version
    -h, --help                               Show this help

  ${'\x1b[90m'}MCP tools:${'\x1b[0m'}
    analyze_dependencies    Packages and UI components an export needs
    find_unused_components  UI kit files no entry file reaches

  ${'\x1b[90m'}Examples:${'\x1b[0m'}
    figma-make-init ./export/src -o my-app
    figma-make-init analyze ./export/src --match segment

`);
}

async function main(): Promise<void> {
  const { command, target, options } = parseArgs(process.argv);

  if (options.help) {
    printHelp();
    return;
  }
  if (options.version) {
    process.stdout.write(`${VERSION}\n`);
    return;
  }

  switch (command) {
    case 'analyze':
      runAnalyze(target, options);
      break;

    case 'mcp': {
      const { runMcp } = await import('./mcp.js');
      await runMcp(process.cwd());
      break;
    }

    default:
      await runInit(target, options);
  }
}

main().catch((err: unknown) => {
  printError(err);
  process.exit(1);
});
