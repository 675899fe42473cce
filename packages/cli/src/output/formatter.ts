import type { Source } from '@bindery/shared';

export function formatSource(source: Source): string {
  const update = source.hasUpdate ? ' (update available)' : '';
  return `  [${source.id}] ${source.name}@${source.version}${update}`;
}

export function formatSourceList(title: string, sources: Source[]): string {
  if (sources.length === 0) {
    return `No ${title.toLowerCase()}.`;
  }
  const lines = [`${title} (${sources.length}):`, ''];
  for (const source of sources) {
    lines.push(formatSource(source));
  }
  return lines.join('\n');
}

export function formatSourceDetail(source: Source): string {
  const lines: string[] = [];
  lines.push(`${source.name}@${source.version}`);
  lines.push(`  ID:        ${source.id}`);
  lines.push(`  Site:      ${source.url}`);
  lines.push(`  ABI:       ${source.abiTag}`);
  lines.push(`  Contract:  ${source.contractVersion}`);
  if (source.icon) {
    lines.push(`  Icon:      ${source.icon}`);
  }
  return lines.join('\n');
}
