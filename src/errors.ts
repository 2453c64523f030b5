export type SrcFilesErrorCode = 'MISSING_SOURCE' | 'PATTERN_NOT_FOUND' | 'DUPLICATE_BLOCK' | 'APPLY_IMPOSSIBLE';

/**
 * Base class for every failure the generator reports on purpose.
 */
export class SrcFilesError extends Error {
  constructor(
    message: string,
    public readonly code: SrcFilesErrorCode,
  ) {
    super(message);
    this.name = 'SrcFilesError';
  }
}

/**
 * The repository is not laid out the way the generator expects.
 * The CLI maps these to exit code 1.
 */
export class ConfigurationError extends SrcFilesError {
  constructor(
    message: string,
    code: SrcFilesErrorCode,
    public readonly filePath: string,
  ) {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}

export class MissingSourceError extends ConfigurationError {
  constructor(sourceRoot: string) {
    super(`Source directory not found: ${sourceRoot}`, 'MISSING_SOURCE', sourceRoot);
    this.name = 'MissingSourceError';
  }
}

export class PatternNotFoundError extends ConfigurationError {
  constructor(filePath: string) {
    super(`Failed to locate src_files block in ${filePath}`, 'PATTERN_NOT_FOUND', filePath);
    this.name = 'PatternNotFoundError';
  }
}

export class DuplicateBlockError extends ConfigurationError {
  constructor(
    filePath: string,
    public readonly matchCount: number,
  ) {
    super(`Found ${matchCount} src_files blocks in ${filePath}; expected exactly one`, 'DUPLICATE_BLOCK', filePath);
    this.name = 'DuplicateBlockError';
  }
}

export class ApplyImpossibleError extends ConfigurationError {
  constructor(
    targetPath: string,
    public readonly backupPath: string,
  ) {
    super(`Neither ${targetPath} nor ${backupPath} exist; cannot apply`, 'APPLY_IMPOSSIBLE', targetPath);
    this.name = 'ApplyImpossibleError';
  }
}

export function isConfigurationError(e: unknown): e is ConfigurationError {
  return e instanceof ConfigurationError;
}
