import { DEFAULT_LAYOUT, type SourceListLayout } from '../config/layout';
import { compareStrings } from '../util/path';

export type SourceGroup = {
  label: string;
  /** Project-root-relative paths, sorted. */
  entries: string[];
};

/**
 * Buckets entries by their first directory under `layout.sourceDir`; files
 * directly in it go to `layout.rootGroup`. Entries outside the source
 * directory are dropped.
 *
 * The root group comes first, the others follow in label order.
 */
export function groupSourceEntries(entries: readonly string[], layout: SourceListLayout = DEFAULT_LAYOUT): SourceGroup[] {
  const prefix = `${layout.sourceDir}/`;
  const byLabel = new Map<string, string[]>();

  for (const e of entries) {
    if (!e.startsWith(prefix)) continue;
    const rel = e.slice(prefix.length);
    const slash = rel.indexOf('/');
    const label = slash === -1 ? layout.rootGroup : rel.slice(0, slash);
    const bucket = byLabel.get(label);
    if (bucket) bucket.push(e);
    else byLabel.set(label, [e]);
  }

  const labels = [...byLabel.keys()].filter((l) => l !== layout.rootGroup).sort(compareStrings);
  if (byLabel.has(layout.rootGroup)) labels.unshift(layout.rootGroup);

  return labels.map((label) => ({
    label,
    entries: [...(byLabel.get(label) ?? [])].sort(compareStrings),
  }));
}
