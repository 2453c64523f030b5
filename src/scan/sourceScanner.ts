import fg from 'fast-glob';
import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_LAYOUT, resolveLayoutPaths, type SourceListLayout } from '../config/layout';
import { MissingSourceError } from '../errors';
import { comparePathSegments, toPosixPath } from '../util/path';

export type SourceScanOptions = {
  projectRoot: string;
  layout?: SourceListLayout;
};

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/** Regular files, plus symlinks that resolve to a file. Dangling links are skipped. */
function isSourceFileEntry(entry: fg.Entry): boolean {
  if (entry.dirent.isFile()) return true;
  return entry.dirent.isSymbolicLink() && isFile(entry.path);
}

/**
 * Deterministically discovers the native sources under `layout.sourceDir`.
 * Returns posix paths relative to the project root, ordered segment by
 * segment on the absolute path.
 */
export function discoverSourceFiles(opts: SourceScanOptions): string[] {
  const layout = opts.layout ?? DEFAULT_LAYOUT;
  const { projectRoot, sourceRoot } = resolveLayoutPaths(opts.projectRoot, layout);
  if (!isDirectory(sourceRoot)) throw new MissingSourceError(sourceRoot);

  // Symlinked directories are not entered; file symlinks are kept once they resolve to a file.
  const matches = fg.sync(`**/*${fg.escapePath(layout.extension)}`, {
    cwd: sourceRoot,
    absolute: true,
    objectMode: true,
    onlyFiles: false,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    caseSensitiveMatch: true,
  });

  // fast-glob hands back posix paths even on Windows; sort on the absolute form, then relativize.
  const absolute = matches.filter(isSourceFileEntry).map((e) => toPosixPath(path.resolve(e.path)));
  absolute.sort(comparePathSegments);
  return absolute.map((abs) => toPosixPath(path.relative(projectRoot, abs)));
}
