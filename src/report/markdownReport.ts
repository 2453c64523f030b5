import type { RunReport } from './runReport';

export function reportToMarkdown(report: RunReport): string {
  const lines: string[] = [];
  const rendered = report.groups.reduce((n, g) => n + g.files, 0);

  lines.push(`# src_files report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Project root: \`${report.projectRoot}\``);
  lines.push(`- Source dir: \`${report.sourceDir}\``);
  lines.push(`- Target: \`${report.targetPath}\``);
  lines.push(`- Backup: \`${report.backupPath}\``);
  lines.push(`- Apply state: ${report.applyState}`);
  lines.push(`- Files discovered: **${report.filesDiscovered}** (rendered: **${rendered}**)`);
  lines.push('');

  lines.push(`## Groups`);
  lines.push('');
  lines.push(`| Group | Files |`);
  lines.push(`|---|---:|`);
  for (const g of report.groups) lines.push(`| ${g.label.replace(/\|/g, '\\|')} | ${g.files} |`);
  if (report.groups.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
  return lines.join('\n');
}
