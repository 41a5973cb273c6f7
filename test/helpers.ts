import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { PackageInstaller } from '../src/installer.js';
import type { WarningHandler } from '../src/types.js';

// Bytes that are not valid UTF-8.
export const NOT_UTF8 = Buffer.from([0xff, 0xfe, 0x00, 0xc3]);

export function makeTempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'figma-make-init-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    mkdirSync(path.dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
}

export function warningCollector(): { files: string[]; onWarning: WarningHandler } {
  const files: string[] = [];
  return { files, onWarning: (file) => { files.push(file); } };
}

export class RecordingInstaller implements PackageInstaller {
  readonly calls: string[][] = [];

  constructor(private readonly failOnCall?: { index: number; error: Error }) {}

  install(_cwd: string, packages: readonly string[]): void {
    const index = this.calls.length;
    this.calls.push([...packages]);
    if (this.failOnCall && this.failOnCall.index === index) throw this.failOnCall.error;
  }
}
