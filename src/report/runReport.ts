import type { ApplyState } from '../apply/applySrcFiles';
import type { SourceGroup } from '../render/groupEntries';
import { stableStringify } from '../util/deterministicJson';

export type ReportGroup = {
  label: string;
  files: number;
};

export type RunReport = {
  schema: 'src-files-report-v1';
  tool: { name: string; version: string };
  projectRoot: string;
  sourceDir: string;
  targetPath: string;
  backupPath: string;
  applyState: ApplyState;
  filesDiscovered: number;
  /** In render order. */
  groups: ReportGroup[];
};

export function createRunReport(args: {
  toolName: string;
  toolVersion: string;
  projectRoot: string;
  sourceDir: string;
  targetPath: string;
  backupPath: string;
  applyState: ApplyState;
  entries: readonly string[];
  groups: readonly SourceGroup[];
}): RunReport {
  return {
    schema: 'src-files-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    projectRoot: args.projectRoot,
    sourceDir: args.sourceDir,
    targetPath: args.targetPath,
    backupPath: args.backupPath,
    applyState: args.applyState,
    filesDiscovered: args.entries.length,
    groups: args.groups.map((g) => ({ label: g.label, files: g.entries.length })),
  };
}

export function serializeReport(report: RunReport): string {
  return stableStringify(report);
}
