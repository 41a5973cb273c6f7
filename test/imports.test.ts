import * as assert from 'node:assert';
import { chmodSync, symlinkSync } from 'node:fs';
import * as path from 'node:path';
import { extractImports, findFileRecursive, listSourceFiles, readSourceFile } from '../src/imports.js';
import { NOT_UTF8, makeTempDir, removeDir, warningCollector, writeTree } from './helpers.js';

suite('extractImports', () => {
  test('lists from-imports before side-effect imports', () => {
    const content = [
      'import "./styles.css";',
      'import React from "react";',
      'import { Button } from "./components/ui/button";',
      "import * as Icons from 'lucide-react';",
    ].join('\n');

    assert.deepStrictEqual(extractImports(content), [
      'react',
      './components/ui/button',
      'lucide-react',
      './styles.css',
    ]);
  });

  test('keeps duplicates and type-only imports', () => {
    const content = [
      'import type { Props } from "./types";',
      'import clsx from "clsx";',
      'import { clsx as cx } from "clsx";',
    ].join('\n');

    assert.deepStrictEqual(extractImports(content), ['./types', 'clsx', 'clsx']);
  });

  test('ignores requires and dynamic imports', () => {
    const content = 'const a = require("a");\nconst b = await import("b");\n';
    assert.deepStrictEqual(extractImports(content), []);
  });
});

suite('readSourceFile', () => {
  let root: string;

  setup(() => { root = makeTempDir(); });
  teardown(() => { removeDir(root); });

  test('returns the text of a UTF-8 file', () => {
    writeTree(root, { 'a.ts': 'export const a = "é";\n' });
    const { files, onWarning } = warningCollector();

    assert.strictEqual(readSourceFile(path.join(root, 'a.ts'), onWarning), 'export const a = "é";\n');
    assert.deepStrictEqual(files, []);
  });

  test('warns and returns null for bytes that are not UTF-8', () => {
    writeTree(root, { 'bad.tsx': NOT_UTF8 });
    const { files, onWarning } = warningCollector();
    const file = path.join(root, 'bad.tsx');

    assert.strictEqual(readSourceFile(file, onWarning), null);
    assert.deepStrictEqual(files, [file]);
  });

  test('warns and returns null for a missing file', () => {
    const { files, onWarning } = warningCollector();
    const file = path.join(root, 'missing.ts');

    assert.strictEqual(readSourceFile(file, onWarning), null);
    assert.deepStrictEqual(files, [file]);
  });
});

suite('listSourceFiles', () => {
  let root: string;

  setup(() => { root = makeTempDir(); });
  teardown(() => { removeDir(root); });

  test('lists direct children grouped by extension', () => {
    writeTree(root, {
      'b.tsx': '',
      'a.ts': '',
      'c.js': '',
      'a.tsx': '',
      'styles.css': '',
      'nested/d.ts': '',
    });

    assert.deepStrictEqual(listSourceFiles(root), [
      path.join(root, 'c.js'),
      path.join(root, 'a.ts'),
      path.join(root, 'a.tsx'),
      path.join(root, 'b.tsx'),
    ]);
  });

  test('returns nothing for a missing directory', () => {
    assert.deepStrictEqual(listSourceFiles(path.join(root, 'nope')), []);
  });

  test('follows symlinks to files, including broken ones, but not to directories', () => {
    writeTree(root, { 'real/App.tsx': '', 'real/dir.ts/x.ts': '', 'src/b.ts': '' });
    symlinkSync(path.join(root, 'real/App.tsx'), path.join(root, 'src/App.tsx'));
    symlinkSync(path.join(root, 'real/gone.ts'), path.join(root, 'src/gone.ts'));
    symlinkSync(path.join(root, 'real/dir.ts'), path.join(root, 'src/dir.ts'));

    assert.deepStrictEqual(listSourceFiles(path.join(root, 'src')), [
      path.join(root, 'src/b.ts'),
      path.join(root, 'src/gone.ts'),
      path.join(root, 'src/App.tsx'),
    ]);
  });
});

suite('findFileRecursive', () => {
  let root: string;

  setup(() => { root = makeTempDir(); });
  teardown(() => { removeDir(root); });

  test('prefers the earlier extension', () => {
    writeTree(root, { 'a/button.tsx': '', 'z/button.jsx': '' });
    assert.strictEqual(findFileRecursive(root, 'button', ['.jsx', '.tsx'], () => {}), path.join(root, 'z/button.jsx'));
  });

  test('takes the first match in sorted directory order', () => {
    writeTree(root, { 'b/card.tsx': '', 'a/card.tsx': '', 'card.ts': '' });
    assert.strictEqual(findFileRecursive(root, 'card', ['.jsx', '.tsx'], () => {}), path.join(root, 'a/card.tsx'));
  });

  test('finds a symlinked file', () => {
    writeTree(root, { 'elsewhere/card.tsx': '', 'ui/forms/.keep': '' });
    symlinkSync(path.join(root, 'elsewhere/card.tsx'), path.join(root, 'ui/forms/card.tsx'));

    assert.strictEqual(
      findFileRecursive(path.join(root, 'ui'), 'card', ['.jsx', '.tsx'], () => {}),
      path.join(root, 'ui/forms/card.tsx')
    );
  });

  test('reports a directory it cannot list and keeps going', () => {
    const { files, onWarning } = warningCollector();
    assert.strictEqual(findFileRecursive(path.join(root, 'missing'), 'card', ['.tsx'], onWarning), undefined);
    assert.deepStrictEqual(files, [path.join(root, 'missing')]);
  });

  test('skips an unreadable subdirectory', function () {
    if (process.getuid?.() === 0) this.skip();
    writeTree(root, { 'locked/card.tsx': '', 'open/card.tsx': '' });
    chmodSync(path.join(root, 'locked'), 0o000);
    const { files, onWarning } = warningCollector();
    try {
      assert.strictEqual(findFileRecursive(root, 'card', ['.tsx'], onWarning), path.join(root, 'open/card.tsx'));
      assert.deepStrictEqual(files, [path.join(root, 'locked')]);
    } finally {
      chmodSync(path.join(root, 'locked'), 0o755);
    }
  });

  test('returns undefined when nothing matches', () => {
    writeTree(root, { 'card.tsx': '' });
    assert.strictEqual(findFileRecursive(root, 'select', ['.jsx', '.tsx'], () => {}), undefined);
  });
});
