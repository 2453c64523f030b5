#!/usr/bin/env node

import { Command } from 'commander';
import { VERSION } from './index';
import { defaultProjectRoot, DEFAULT_LAYOUT, type SourceListLayout } from './config/layout';
import { generateSrcFiles } from './core/generateSrcFiles';
import { applySrcFilesBlock, type ApplyState } from './apply/applySrcFiles';
import { buildSourceInventory, writeSourceInventoryFile } from './scan/inventory';
import { createRunReport } from './report/runReport';
import { writeReportFile } from './report/writeReport';
import { isConfigurationError } from './errors';

export const TOOL_NAME = 'zig-src-files';

export function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() !== '' ? v : undefined;
}

export type GenerateOptions = {
  root: string;
  apply: boolean;
  report?: string;
  verbose: boolean;
  layout?: SourceListLayout;
};

/**
 * Print the rendered block and, with `apply`, patch it into the build file.
 * Errors propagate; `main` turns them into exit codes.
 */
export function runGenerate(opts: GenerateOptions): number {
  const layout = opts.layout ?? DEFAULT_LAYOUT;
  const { paths, entries, groups, block } = generateSrcFiles({ projectRoot: opts.root, layout });

  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(`Discovered ${entries.length} file(s) in ${groups.length} group(s) under ${paths.sourceRoot}`);
  }

  // eslint-disable-next-line no-console
  console.log(block);

  let applyState: ApplyState = 'no-apply';
  if (opts.apply) {
    const res = applySrcFilesBlock({ targetPath: paths.targetPath, backupPath: paths.backupPath, block });
    applyState = res.state;
    // eslint-disable-next-line no-console
    console.log(`Applied updated src_files to ${res.targetPath} (backup at ${res.backupPath})`);
  }

  if (opts.report) {
    const report = createRunReport({
      toolName: TOOL_NAME,
      toolVersion: VERSION,
      projectRoot: paths.projectRoot,
      sourceDir: layout.sourceDir,
      targetPath: paths.targetPath,
      backupPath: paths.backupPath,
      applyState,
      entries,
      groups,
    });
    writeReportFile(opts.report, report);
    if (opts.verbose) {
      // eslint-disable-next-line no-console
      console.log(`Wrote report: ${opts.report}`);
    }
  }

  return 0;
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  program
    .name(TOOL_NAME)
    .description('Render native/flecs/src/**/*.c as the src_files array of build.zig, optionally patching it in place')
    .version(VERSION)
    .enablePositionalOptions()
    .option('--root <dir>', 'Project root', defaultProjectRoot())
    .option('--apply [bool]', 'Write the array into the build file, keeping a .bak backup (default false)', (v) => v, undefined)
    .option('--report <file>', 'Optional run report (.json for JSON, Markdown otherwise)', '')
    .option('-v, --verbose', 'Verbose logging', false);

  program
    .command('scan')
    .description('Emit the discovered source list as deterministic JSON.')
    .option('--root <dir>', 'Project root', defaultProjectRoot())
    .requiredOption('--out <file>', 'Output JSON file')
    .option('-v, --verbose', 'Verbose logging', false)
    .action((raw: Record<string, unknown>) => {
      const out = String(raw.out);
      const inv = buildSourceInventory({ projectRoot: String(raw.root) });
      writeSourceInventoryFile(out, inv);
      if (raw.verbose) {
        // eslint-disable-next-line no-console
        console.log(`Scanned ${inv.files.length} source file(s). Wrote: ${out}`);
      }
    });

  program.action((raw: Record<string, unknown>) => {
    exitCode = runGenerate({
      root: String(raw.root),
      apply: parseBoolish(raw.apply, false),
      report: optionalString(raw.report),
      verbose: Boolean(raw.verbose),
    });
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return isConfigurationError(e) ? 1 : 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  void main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
