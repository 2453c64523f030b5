// Public library surface.

export const VERSION = '0.1.0';

export * from './errors';
export * from './config/layout';
export * from './scan/sourceScanner';
export * from './scan/inventory';
export * from './render/groupEntries';
export * from './render/srcFilesArray';
export * from './patch/srcFilesBlock';
export * from './apply/applySrcFiles';
export * from './core/generateSrcFiles';
export * from './report/runReport';
export * from './report/markdownReport';
export * from './report/writeReport';
