import { copyFileSync, cpSync, existsSync, mkdirSync, statSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { analyzeDependencies } from './dependencies.js';
import { InstallError, NpmInstaller } from './installer.js';
import type { PackageInstaller } from './installer.js';
import { indent, printDone, printNotice, printStep, printWarning } from './reporter.js';
import { removeUnusedComponents } from './usage.js';
import type { ScaffoldOptions, ScaffoldResult, WarningHandler } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// [template file, project file]; TypeScript templates carry a .tpl suffix.
export const TEMPLATE_FILES: ReadonlyArray<readonly [string, string]> = [
  ['vite.config.ts.tpl', 'vite.config.ts'],
  ['tsconfig.json', 'tsconfig.json'],
  ['tsconfig.app.json', 'tsconfig.app.json'],
  ['tsconfig.node.json', 'tsconfig.node.json'],
  ['package.json', 'package.json'],
  ['index.html', 'index.html'],
];

export const ENTRY_TEMPLATE = 'main.tsx.tpl';

export const TAILWIND_PACKAGES = ['tailwindcss', '@tailwindcss/vite', 'tw-animate-css'];

export const DEFAULT_PACKAGES = ['lucide-react', 'framer-motion', 'motion'];

export interface ScaffoldHooks {
  installer?: PackageInstaller;
  templateDir?: string;
  onStep?: (message: string) => void;
  onDone?: (message: string) => void;
  onNotice?: (message: string) => void;
  onWarning?: WarningHandler;
}

export function findTemplateDir(): string {
  const candidates = [
    path.join(__dirname, '../templates'),
    path.join(__dirname, '../../templates'),
  ];
  const found = candidates.find((c) => existsSync(path.join(c, ENTRY_TEMPLATE)));
  if (!found) throw new Error(`Project templates not found (looked in ${candidates.join(', ')})`);
  return found;
}

/** Detected packages plus the UI runtime defaults, first occurrence kept. */
export function packagesToInstall(detected: readonly string[]): string[] {
  return Array.from(new Set([...DEFAULT_PACKAGES, ...detected]));
}

/**
 * Builds a Vite project at `options.outputDir` from the Figma Make export in
 * `options.sourceDir`. The output directory may already exist; its contents
 * are overwritten file by file.
 */
export function initProject(options: ScaffoldOptions, hooks: ScaffoldHooks = {}): ScaffoldResult {
  const installer = hooks.installer ?? new NpmInstaller();
  const onStep = hooks.onStep ?? printStep;
  const onDone = hooks.onDone ?? printDone;
  const onNotice = hooks.onNotice ?? printNotice;
  const onWarning = hooks.onWarning ?? printWarning;
  const templateDir = hooks.templateDir ?? findTemplateDir();

  const sourceDir = path.resolve(options.sourceDir);
  const outputDir = path.resolve(options.outputDir);

  if (!statSync(sourceDir).isDirectory()) {
    throw new Error(`Source folder is not a directory: ${sourceDir}`);
  }
  mkdirSync(outputDir, { recursive: true });

  onStep('Analyzing dependencies...');
  const report = analyzeDependencies(sourceDir, { match: options.match, onWarning });
  onDone(`Found ${report.npmPackages.length} npm packages`);
  onDone(`Found ${report.figmaUiComponents.length} Figma UI components`);

  onStep('Allocating config files...');
  for (const [template, file] of TEMPLATE_FILES) {
    copyFileSync(path.join(templateDir, template), path.join(outputDir, file));
    onDone(`Added ${file}`);
  }
  cpSync(path.join(templateDir, 'public'), path.join(outputDir, 'public'), { recursive: true });
  onDone('Added public directory');

  const srcDir = path.join(outputDir, 'src');
  cpSync(sourceDir, srcDir, { recursive: true });
  copyFileSync(path.join(templateDir, ENTRY_TEMPLATE), path.join(srcDir, 'main.tsx'));
  onDone('Copied src folder and added entry point main.tsx');

  mkdirSync(path.join(srcDir, 'styles'), { recursive: true });
  copyFileSync(path.join(templateDir, 'fonts.css'), path.join(srcDir, 'styles', 'fonts.css'));
  onDone('Added fonts.css');

  let installedPackages: string[] = [];
  if (options.skipInstall) {
    onNotice('Skipping npm install (--skip-install)');
  } else {
    onStep('Running npm install...');
    installer.install(outputDir, []);
    onDone('Project initialized');

    onStep('Installing Tailwind CSS v4...');
    installer.install(outputDir, TAILWIND_PACKAGES);
    onDone('Tailwind CSS v4 installed');

    const packages = packagesToInstall(report.npmPackages);
    onStep(`Installing ${packages.length} dependencies...`);
    try {
      installer.install(outputDir, packages);
      installedPackages = packages;
      onDone(`Installed: ${packages.join(', ')}`);
    } catch (err) {
      if (!(err instanceof InstallError)) throw err;
      const tail = err.outputTail();
      onNotice(`${err.message}. Run 'npm install' manually in ${outputDir}.`);
      if (tail) onNotice(indent(tail));
    }
  }

  let removedComponents = 0;
  if (!options.keepUnused) {
    onStep('Removing unused components...');
    removedComponents = removeUnusedComponents(outputDir, onWarning);
    if (removedComponents > 0) onDone(`Removed ${removedComponents} unused components`);
  }

  return { outputDir, report, installedPackages, removedComponents };
}
