import fs from 'node:fs';
import path from 'node:path';
import { ApplyImpossibleError } from '../errors';
import { replaceSrcFilesBlock } from '../patch/srcFilesBlock';

export type ApplyState = 'no-apply' | 'apply-fresh' | 'apply-from-backup' | 'apply-impossible';

export type ApplyTarget = {
  targetPath: string;
  backupPath: string;
};

export type ApplyResult = ApplyTarget & {
  state: Extract<ApplyState, 'apply-fresh' | 'apply-from-backup'>;
};

export function planApply(opts: ApplyTarget & { apply: boolean }): ApplyState {
  if (!opts.apply) return 'no-apply';
  if (fs.existsSync(opts.targetPath)) return 'apply-fresh';
  if (fs.existsSync(opts.backupPath)) return 'apply-from-backup';
  return 'apply-impossible';
}

function removeQuietly(p: string): void {
  try {
    if (fs.existsSync(p)) fs.unlinkSync(p);
  } catch {
    // Cleanup must not mask the error that got us here.
  }
}

/**
 * Write via `<file>.tmp` and a rename so the target is never half-written.
 */
function writeFileViaTemp(filePath: string, content: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  try {
    fs.writeFileSync(tmpPath, content, 'utf8');
    fs.renameSync(tmpPath, filePath);
  } catch (e) {
    removeQuietly(tmpPath);
    throw e;
  }
}

/**
 * Patch the `src_files` block of the target build file, keeping the
 * pre-patch content at `backupPath`.
 *
 * - target present: it becomes the read source and is moved over the backup
 * - only the backup present (an earlier run stopped after the move): the
 *   backup is the read source and stays as it is
 * - neither: {@link ApplyImpossibleError}
 *
 * The new text is computed before anything is moved, so a missing or
 * duplicated block leaves the disk untouched. If the final write fails, any
 * target file is removed and the backup is left for recovery.
 */
export function applySrcFilesBlock(opts: ApplyTarget & { block: string }): ApplyResult {
  const { targetPath, backupPath } = opts;
  const state = planApply({ targetPath, backupPath, apply: true });
  if (state !== 'apply-fresh' && state !== 'apply-from-backup') {
    throw new ApplyImpossibleError(targetPath, backupPath);
  }

  const sourcePath = state === 'apply-fresh' ? targetPath : backupPath;
  const patched = replaceSrcFilesBlock(fs.readFileSync(sourcePath, 'utf8'), opts.block, sourcePath);

  if (state === 'apply-fresh') fs.renameSync(targetPath, backupPath);

  try {
    writeFileViaTemp(targetPath, patched);
  } catch (e) {
    removeQuietly(targetPath);
    throw e;
  }

  return { state, targetPath, backupPath };
}
