import { statSync } from 'node:fs';
import * as path from 'node:path';
import { classifyImport } from './classifier.js';
import { extractImports, listSourceFiles, readSourceFile } from './imports.js';
import { printWarning } from './reporter.js';
import type { AnalyzeOptions, DependencyReport } from './types.js';

// Provided by the Vite React template.
export const TEMPLATE_PACKAGES: ReadonlySet<string> = new Set(['react', 'react-dom', 'react/jsx-runtime']);

export function componentsDir(sourceRoot: string): string {
  return path.join(sourceRoot, 'app', 'components');
}

/**
 * Collects the npm packages and UI-kit components imported by the files
 * directly under `<sourceRoot>/app/components`.
 */
export function analyzeDependencies(sourceRoot: string, options: AnalyzeOptions = {}): DependencyReport {
  const onWarning = options.onWarning ?? printWarning;
  const match = options.match ?? 'substring';

  if (!statSync(sourceRoot).isDirectory()) {
    throw new Error(`Not a directory: ${sourceRoot}`);
  }

  const packages = new Set<string>();
  const components = new Set<string>();

  for (const file of listSourceFiles(componentsDir(sourceRoot))) {
    const content = readSourceFile(file, onWarning);
    if (content === null) continue;

    for (const specifier of extractImports(content)) {
      const cls = classifyImport(specifier, match);
      if (cls.kind === 'package') {
        if (!TEMPLATE_PACKAGES.has(specifier)) packages.add(specifier);
      } else if (cls.kind === 'component') {
        components.add(cls.name);
      }
    }
  }

  return {
    npmPackages: Array.from(packages).sort(),
    figmaUiComponents: Array.from(components).sort(),
  };
}
