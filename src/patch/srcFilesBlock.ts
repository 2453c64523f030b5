import { DuplicateBlockError, PatternNotFoundError } from '../errors';

/**
 * `const src_files = [_][]const u8{` ... the first `};` on a line of its own,
 * plus any blank lines after it. Taking the blank lines too means the
 * replacement always leaves exactly one, so patching twice is a no-op.
 */
const SRC_FILES_BLOCK_SOURCE = String.raw`const\s+src_files\s*=\s*\[_\]\[\]const\s+u8\{[\s\S]*?\n\};\n(?:[ \t]*\n)*`;

export function countSrcFilesBlocks(text: string): number {
  return Array.from(text.matchAll(new RegExp(SRC_FILES_BLOCK_SOURCE, 'g'))).length;
}

/**
 * Swap the single generated `src_files` block in `text` for `block`.
 *
 * `label` only names the file in error messages.
 */
export function replaceSrcFilesBlock(text: string, block: string, label = 'build.zig'): string {
  const n = countSrcFilesBlocks(text);
  if (n === 0) throw new PatternNotFoundError(label);
  if (n > 1) throw new DuplicateBlockError(label, n);

  // Replacer function so `$` sequences in the block are taken literally.
  return text.replace(new RegExp(SRC_FILES_BLOCK_SOURCE), () => `${block}\n\n`);
}
