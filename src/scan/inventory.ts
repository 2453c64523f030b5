import path from 'node:path';
import fs from 'node:fs';
import { DEFAULT_LAYOUT } from '../config/layout';
import { stableStringify } from '../util/deterministicJson';
import { discoverSourceFiles, type SourceScanOptions } from './sourceScanner';

export type SourceInventory = {
  schema: 'src-inventory-v1';
  projectRoot: string;
  sourceDir: string;
  extension: string;
  files: string[];
};

export function buildSourceInventory(opts: SourceScanOptions): SourceInventory {
  const layout = opts.layout ?? DEFAULT_LAYOUT;
  const files = discoverSourceFiles({ ...opts, layout });
  return {
    schema: 'src-inventory-v1',
    projectRoot: path.resolve(opts.projectRoot),
    sourceDir: layout.sourceDir,
    extension: layout.extension,
    files,
  };
}

export function writeSourceInventoryFile(outFile: string, inv: SourceInventory): void {
  const abs = path.resolve(outFile);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, stableStringify(inv), 'utf8');
}
