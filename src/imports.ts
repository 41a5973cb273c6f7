import { readFileSync, readdirSync, statSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import type { WarningHandler } from './types.js';

export const SOURCE_EXTENSIONS = ['.js', '.jsx', '.ts', '.tsx'] as const;

// import X from 'pkg' | import { X } from 'pkg' | import * as X from 'pkg'
const FROM_IMPORT_RE = /import\s+.*?\s+from\s+['"]([^'"]+)['"]/g;

const SIDE_EFFECT_IMPORT_RE = /import\s+['"]([^'"]+)['"]/g;

const IMPORT_PATTERNS = [FROM_IMPORT_RE, SIDE_EFFECT_IMPORT_RE];

// All `from` imports come first, then side-effect imports.
export function extractImports(content: string): string[] {
  const imports: string[] = [];

  for (const pattern of IMPORT_PATTERNS) {
    pattern.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = pattern.exec(content)) !== null) {
      imports.push(m[1]);
    }
  }

  return imports;
}

export function readSourceFile(filePath: string, onWarning: WarningHandler): string | null {
  try {
    const bytes = readFileSync(filePath);
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    onWarning(filePath, err);
    return null;
  }
}

function hasExtension(name: string, extensions: readonly string[]): boolean {
  return extensions.includes(path.extname(name));
}

// Symlinks count as files unless they point at a directory; a broken link is
// kept so that reading it reports the failure.
function isFileEntry(dir: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return !statSync(path.join(dir, entry.name)).isDirectory();
  } catch {
    return true;
  }
}

/**
 * Files directly inside `dir`, grouped by extension in the order given and
 * sorted by name within a group. A missing directory yields an empty list.
 */
export function listSourceFiles(dir: string, extensions: readonly string[] = SOURCE_EXTENSIONS): string[] {
  let names: string[];
  try {
    names = readdirSync(dir, { withFileTypes: true })
      .filter((e) => hasExtension(e.name, extensions) && isFileEntry(dir, e))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  const files: string[] = [];
  for (const ext of extensions) {
    for (const name of names) {
      if (path.extname(name) === ext) files.push(path.join(dir, name));
    }
  }
  return files;
}

function walk(dir: string, out: string[], onWarning: WarningHandler): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    onWarning(dir, err);
    return;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) walk(full, out, onWarning);
    else if (isFileEntry(dir, entry)) out.push(full);
  }
}

/**
 * First file anywhere under `dir` named `<baseName><ext>`, trying the
 * extensions in order. Symlinked directories are not descended into.
 */
export function findFileRecursive(
  dir: string,
  baseName: string,
  extensions: readonly string[],
  onWarning: WarningHandler
): string | undefined {
  const all: string[] = [];
  walk(dir, all, onWarning);
  for (const ext of extensions) {
    const match = all.find((f) => path.basename(f) === baseName + ext);
    if (match) return match;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
