export class ConfigError extends Error {
  constructor(
    readonly path: string,
    reason: string
  ) {
    super(`Invalid config ${path}: ${reason}`);
    this.name = 'ConfigError';
  }
}

export class ScanRootError extends Error {
  constructor(
    readonly rootPath: string,
    reason: string
  ) {
    super(`Cannot scan ${rootPath}: ${reason}`);
    this.name = 'ScanRootError';
  }
}

export class ScanConflictError extends Error {
  constructor(readonly scanName: string) {
    super(`Scan name ${scanName} already exists.`);
    this.name = 'ScanConflictError';
  }
}

export class UnknownScanError extends Error {
  constructor(readonly scanName: string) {
    super(`No scan named ${scanName} in the catalog.`);
    this.name = 'UnknownScanError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }

  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
