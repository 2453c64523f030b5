import { DEFAULT_LAYOUT, type SourceListLayout } from '../config/layout';
import { groupSourceEntries, type SourceGroup } from './groupEntries';

/** First line of the generated declaration; the patcher keys on the same shape. */
export const SRC_FILES_HEADER = 'const src_files = [_][]const u8{';
export const SRC_FILES_FOOTER = '};';

const INDENT = '    ';

/** Zig string literal; a path only needs its double quotes and backslashes escaped. */
export function zigStringLiteral(p: string): string {
  return `"${p.replace(/[\\"]/g, (c) => `\\${c}`)}"`;
}

function quoteEntry(p: string): string {
  return `${INDENT}${zigStringLiteral(p)},`;
}

export function renderSrcFilesGroups(groups: readonly SourceGroup[], layout: SourceListLayout = DEFAULT_LAYOUT): string {
  const lines: string[] = [];
  lines.push(SRC_FILES_HEADER);
  lines.push(quoteEntry(layout.helperEntry));
  lines.push('');

  for (const g of groups) {
    lines.push(`${INDENT}// ${g.label}`);
    for (const e of g.entries) lines.push(quoteEntry(`${layout.entryPrefix}${e}`));
    lines.push('');
  }

  lines.push(SRC_FILES_FOOTER);
  return lines.join('\n');
}

/**
 * Render discovered entries as the Zig `src_files` array literal.
 * Pure: the same entry list always produces the same text.
 */
export function renderSrcFilesArray(entries: readonly string[], layout: SourceListLayout = DEFAULT_LAYOUT): string {
  return renderSrcFilesGroups(groupSourceEntries(entries, layout), layout);
}
