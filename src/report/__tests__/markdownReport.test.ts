import { reportToMarkdown } from '../markdownReport';
import { createRunReport, serializeReport } from '../runReport';
import { reportFormatFor } from '../writeReport';

function makeReport(groups: Array<{ label: string; entries: string[] }>) {
  return createRunReport({
    toolName: 'zig-src-files',
    toolVersion: 'test',
    projectRoot: '/work/repo',
    sourceDir: 'native/flecs/src',
    targetPath: '/work/repo/src/Flecs.NET.Native/build.zig',
    backupPath: '/work/repo/src/Flecs.NET.Native/build.zig.bak',
    applyState: 'apply-from-backup',
    entries: groups.flatMap((g) => g.entries),
    groups,
  });
}

describe('run report', () => {
  it('renders header and group table', () => {
    const md = reportToMarkdown(
      makeReport([
        { label: 'core', entries: ['native/flecs/src/world.c'] },
        { label: 'addons', entries: ['native/flecs/src/addons/a.c', 'native/flecs/src/addons/b.c'] },
      ]),
    );
    expect(md).toBe(
      [
        '# src_files report',
        '',
        '- Tool: **zig-src-files** test',
        '- Project root: `/work/repo`',
        '- Source dir: `native/flecs/src`',
        '- Target: `/work/repo/src/Flecs.NET.Native/build.zig`',
        '- Backup: `/work/repo/src/Flecs.NET.Native/build.zig.bak`',
        '- Apply state: apply-from-backup',
        '- Files discovered: **3** (rendered: **3**)',
        '',
        '## Groups',
        '',
        '| Group | Files |',
        '|---|---:|',
        '| core | 1 |',
        '| addons | 2 |',
        '',
      ].join('\n'),
    );
  });

  it('shows a placeholder row when nothing was discovered', () => {
    const md = reportToMarkdown(makeReport([]));
    expect(md.split('\n')).toContain('| (none) | 0 |');
  });

  it('serializes with sorted keys and a trailing newline', () => {
    const json = serializeReport(makeReport([]));
    expect(json.startsWith('{\n  "applyState": "apply-from-backup",\n  "backupPath"')).toBe(true);
    expect(json.endsWith('}\n')).toBe(true);
  });

  it('picks the format from the file extension', () => {
    expect(reportFormatFor('out/report.json')).toBe('json');
    expect(reportFormatFor('out/REPORT.JSON')).toBe('json');
    expect(reportFormatFor('out/report.md')).toBe('md');
    expect(reportFormatFor('report')).toBe('md');
  });
});
