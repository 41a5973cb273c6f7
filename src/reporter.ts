import * as path from 'node:path';
import { InstallError } from './installer.js';
import type { DependencyReport, UnusedComponent } from './types.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const MAGENTA = '\x1b[35m';
const CYAN = '\x1b[36m';
const GRAY = '\x1b[90m';

function bold(s: string): string { return `${BOLD}${s}${RESET}`; }
function dim(s: string): string { return `${DIM}${s}${RESET}`; }
function red(s: string): string { return `${RED}${s}${RESET}`; }
function yellow(s: string): string { return `${YELLOW}${s}${RESET}`; }
function green(s: string): string { return `${GREEN}${s}${RESET}`; }
function cyan(s: string): string { return `${CYAN}${s}${RESET}`; }
function blue(s: string): string { return `${BLUE}${s}${RESET}`; }
function gray(s: string): string { return `${GRAY}${s}${RESET}`; }

export const VERSION = '0.1.0';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function printWarning(filePath: string, error: unknown): void {
  process.stderr.write(`  ${yellow(`Warning: could not read ${filePath}: ${errorMessage(error)}`)}\n`);
}

export function printNotice(message: string): void {
  process.stderr.write(`  ${yellow(message)}\n`);
}

export function indent(text: string, prefix = '    '): string {
  return text.split('\n').map((line) => prefix + line).join('\n');
}

export function formatError(error: unknown): string {
  let out = `\n${red(`Error: ${errorMessage(error)}`)}\n`;
  if (error instanceof InstallError) {
    const tail = error.outputTail();
    if (tail) out += `${gray(indent(tail))}\n`;
  }
  return out;
}

export function printError(error: unknown): void {
  process.stderr.write(formatError(error));
}

export function printHeader(title: string): void {
  process.stdout.write('\n');
  process.stdout.write(`  ${MAGENTA}╭──────────────────────────────────────╮${RESET}\n`);
  process.stdout.write(`  ${MAGENTA}│${RESET}  ${bold('figma-make-init')} ${dim(`v${VERSION}`)}              ${MAGENTA}│${RESET}\n`);
  process.stdout.write(`  ${MAGENTA}│${RESET}  ${dim(title.padEnd(36))}${MAGENTA}│${RESET}\n`);
  process.stdout.write(`  ${MAGENTA}╰──────────────────────────────────────╯${RESET}\n`);
  process.stdout.write('\n');
}

export function printStep(message: string): void {
  process.stdout.write(`  ${blue('›')} ${message}\n`);
}

export function printDone(message: string): void {
  process.stdout.write(`  ${green('✓')} ${message}\n`);
}

function printList(title: string, items: string[]): void {
  process.stdout.write(`  ${bold(title)} ${dim(`(${items.length})`)}\n`);
  if (items.length === 0) {
    process.stdout.write(`     ${gray('none')}\n`);
  }
  for (const item of items) {
    process.stdout.write(`     ${cyan(item)}\n`);
  }
  process.stdout.write('\n');
}

export function printReport(report: DependencyReport): void {
  printList('npm packages', report.npmPackages);
  printList('Figma UI components', report.figmaUiComponents);
}

export function printUnused(unused: UnusedComponent[], projectDir: string): void {
  printList(
    'Unused UI components',
    unused.map((c) => `${c.name.padEnd(20)} ${gray(path.relative(projectDir, c.path))}`)
  );
}

export function printNextSteps(outputDir: string, outputArg: string): void {
  process.stdout.write(`\n  ${bold(green(`✓ Project ready at: ${outputDir}`))}\n\n`);
  process.stdout.write(`  ${blue('To start developing:')}\n`);
  process.stdout.write(`    cd ${outputArg}\n`);
  process.stdout.write('    npm run dev\n\n');
}
