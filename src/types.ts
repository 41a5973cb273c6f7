export type MatchStrategy = 'substring' | 'segment';

export type ImportClass =
  | { kind: 'package' }
  | { kind: 'component'; name: string }
  | { kind: 'ignored' };

export interface DependencyReport {
  npmPackages: string[];
  figmaUiComponents: string[];
}

export type WarningHandler = (filePath: string, error: unknown) => void;

export interface AnalyzeOptions {
  match?: MatchStrategy;
  onWarning?: WarningHandler;
}

export interface UnusedComponent {
  name: string;
  path: string;
}

export interface ScaffoldOptions {
  sourceDir: string;
  outputDir: string;
  keepUnused: boolean;
  skipInstall: boolean;
  match: MatchStrategy;
}

export interface ScaffoldResult {
  outputDir: string;
  report: DependencyReport;
  installedPackages: string[];
  removedComponents: number;
}
