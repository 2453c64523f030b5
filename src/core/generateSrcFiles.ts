import { DEFAULT_LAYOUT, resolveLayoutPaths, type LayoutPaths, type SourceListLayout } from '../config/layout';
import { discoverSourceFiles } from '../scan/sourceScanner';
import { groupSourceEntries, type SourceGroup } from '../render/groupEntries';
import { renderSrcFilesGroups } from '../render/srcFilesArray';

export type GenerateSrcFilesOptions = {
  projectRoot: string;
  layout?: SourceListLayout;
};

export type GenerateSrcFilesResult = {
  paths: LayoutPaths;
  entries: string[];
  groups: SourceGroup[];
  block: string;
};

/**
 * Core library entrypoint: discover, group and render.
 *
 * - Does not write files.
 * - Throws MissingSourceError when the source directory is absent.
 */
export function generateSrcFiles(opts: GenerateSrcFilesOptions): GenerateSrcFilesResult {
  const layout = opts.layout ?? DEFAULT_LAYOUT;
  const paths = resolveLayoutPaths(opts.projectRoot, layout);
  const entries = discoverSourceFiles({ projectRoot: paths.projectRoot, layout });
  const groups = groupSourceEntries(entries, layout);
  return { paths, entries, groups, block: renderSrcFilesGroups(groups, layout) };
}
