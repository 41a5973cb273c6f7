import { existsSync, unlinkSync } from 'node:fs';
import * as path from 'node:path';
import { findFileRecursive, listSourceFiles, readSourceFile, SOURCE_EXTENSIONS } from './imports.js';
import { printWarning } from './reporter.js';
import type { UnusedComponent, WarningHandler } from './types.js';

export const COMPONENT_EXTENSIONS = ['.jsx', '.tsx'] as const;

// import Button from "./components/ui/button"
const DEFAULT_UI_IMPORT_RE = /import\s+(\w+)\s+from\s+['"]\.\/components\/ui\/(\w+)['"]/g;

// import { Button } from "./components/ui"
const INDEX_UI_IMPORT_RE = /import\s+\{([^}]+)\}\s+from\s+['"]\.\/components\/ui['"]/g;

// import { Button } from "./components/ui/button"
const NAMED_UI_IMPORT_RE = /import\s+\{([^}]+)\}\s+from\s+['"]\.\/components\/ui\/\w+['"]/g;

export function appDir(projectDir: string): string {
  return path.join(projectDir, 'src', 'app');
}

export function uiKitDir(projectDir: string): string {
  return path.join(appDir(projectDir), 'components', 'ui');
}

function addBraceNames(list: string, used: Set<string>): void {
  for (const part of list.split(',')) {
    used.add(part.trim().split(' as ')[0].trim());
  }
}

export function scanComponentImports(content: string, used: Set<string>): void {
  let m: RegExpExecArray | null;

  DEFAULT_UI_IMPORT_RE.lastIndex = 0;
  while ((m = DEFAULT_UI_IMPORT_RE.exec(content)) !== null) {
    used.add(m[2]);
  }

  for (const re of [INDEX_UI_IMPORT_RE, NAMED_UI_IMPORT_RE]) {
    re.lastIndex = 0;
    while ((m = re.exec(content)) !== null) {
      addBraceNames(m[1], used);
    }
  }
}

function scanFile(filePath: string, used: Set<string>, onWarning: WarningHandler): void {
  const content = readSourceFile(filePath, onWarning);
  if (content !== null) scanComponentImports(content, used);
}

/**
 * Names of every component reachable from the entry files in `src/app`,
 * following imports through the component files found under the UI kit
 * directory. Names with no file on disk stay in the set but aren't expanded.
 */
export function findUsedComponents(projectDir: string, onWarning: WarningHandler = printWarning): Set<string> {
  const used = new Set<string>();
  const uiDir = uiKitDir(projectDir);

  for (const entry of listSourceFiles(appDir(projectDir), SOURCE_EXTENSIONS)) {
    scanFile(entry, used, onWarning);
  }

  const checked = new Set<string>();
  const queue = [...used];

  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined || checked.has(name)) continue;
    checked.add(name);

    const file = existsSync(uiDir) ? findFileRecursive(uiDir, name, COMPONENT_EXTENSIONS, onWarning) : undefined;
    if (!file) continue;

    const found = new Set<string>();
    scanFile(file, found, onWarning);
    for (const next of found) {
      if (!used.has(next)) {
        used.add(next);
        queue.push(next);
      }
    }
  }

  return used;
}

export function findUnusedComponents(projectDir: string, onWarning: WarningHandler = printWarning): UnusedComponent[] {
  const uiDir = uiKitDir(projectDir);
  if (!existsSync(uiDir)) return [];

  const files = listSourceFiles(uiDir, COMPONENT_EXTENSIONS);
  if (files.length === 0) return [];

  const used = findUsedComponents(projectDir, onWarning);
  return files
    .map((file) => ({ name: path.basename(file, path.extname(file)), path: file }))
    .filter((c) => !used.has(c.name));
}

export function removeUnusedComponents(projectDir: string, onWarning: WarningHandler = printWarning): number {
  let removed = 0;
  for (const component of findUnusedComponents(projectDir, onWarning)) {
    unlinkSync(component.path);
    removed++;
  }
  return removed;
}
