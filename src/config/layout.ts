import path from 'node:path';

/**
 * Repository conventions the generator is built around. `DEFAULT_LAYOUT` is
 * the only one the CLI uses.
 */
export type SourceListLayout = {
  /** Discovery root, relative to the project root (posix). */
  sourceDir: string;
  /** Only files whose name ends with this are discovered. */
  extension: string;
  /** Build file holding the generated array, relative to the project root. */
  targetFile: string;
  /** Appended to the target path to name its backup. */
  backupSuffix: string;
  /** Prepended to each discovered path in the rendered array. */
  entryPrefix: string;
  /** Always rendered first, independent of discovery. */
  helperEntry: string;
  /** Group label for files sitting directly in `sourceDir`. */
  rootGroup: string;
};

export const DEFAULT_LAYOUT: Readonly<SourceListLayout> = {
  sourceDir: 'native/flecs/src',
  extension: '.c',
  targetFile: 'src/Flecs.NET.Native/build.zig',
  backupSuffix: '.bak',
  entryPrefix: '../../',
  helperEntry: '../../native/flecs_helpers.c',
  rootGroup: 'core',
};

export type LayoutPaths = {
  projectRoot: string;
  sourceRoot: string;
  targetPath: string;
  backupPath: string;
};

export function resolveLayoutPaths(projectRoot: string, layout: SourceListLayout = DEFAULT_LAYOUT): LayoutPaths {
  const root = path.resolve(projectRoot);
  const targetPath = path.join(root, ...layout.targetFile.split('/'));
  return {
    projectRoot: root,
    sourceRoot: path.join(root, ...layout.sourceDir.split('/')),
    targetPath,
    backupPath: `${targetPath}${layout.backupSuffix}`,
  };
}

/**
 * Root of the repository this tool is checked into: the parent of `src/`
 * (running from sources) or `dist/` (running the build).
 */
export function defaultProjectRoot(): string {
  return path.resolve(__dirname, '..', '..');
}
