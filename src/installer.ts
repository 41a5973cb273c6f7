import { spawnSync } from 'node:child_process';

export interface PackageInstaller {
  /** Installs `packages` into the project at `cwd`; an empty list runs a plain install. */
  install(cwd: string, packages: readonly string[]): void;
}

export class InstallError extends Error {
  constructor(
    readonly packages: readonly string[],
    readonly exitCode: number | null,
    readonly output: string
  ) {
    super(
      packages.length > 0
        ? `npm install ${packages.join(' ')} failed (exit code ${exitCode ?? 'none'})`
        : `npm install failed (exit code ${exitCode ?? 'none'})`
    );
    this.name = 'InstallError';
  }

  /** The last `lines` non-empty lines npm printed. */
  outputTail(lines = 20): string {
    return this.output
      .split('\n')
      .map((l) => l.trimEnd())
      .filter(Boolean)
      .slice(-lines)
      .join('\n');
  }
}

export class NpmInstaller implements PackageInstaller {
  constructor(private readonly npmCommand = 'npm') {}

  install(cwd: string, packages: readonly string[]): void {
    const result = spawnSync(this.npmCommand, ['install', ...packages, '--no-fund', '--no-audit'], {
      cwd,
      env: process.env,
      encoding: 'utf-8',
      // npm is a .cmd shim on Windows
      shell: process.platform === 'win32',
    });
    if (result.error) throw result.error;
    if (result.status !== 0) {
      throw new InstallError(packages, result.status, `${result.stdout}${result.stderr}`);
    }
  }
}
