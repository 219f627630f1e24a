import type { PortScan } from './models/types.js';

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

/** Plain-text rendering of a scan for the terminal */
export function formatScan(scan: PortScan): string {
  const lines: string[] = [];
  const { summary } = scan;

  lines.push(
    `used: ${summary.totalUsed}  available: ${summary.totalAvailable}  containers: ${summary.dockerContainers}`,
  );
  for (const warning of scan.warnings) {
    lines.push(`warning (${warning.source}): ${warning.message}`);
  }
  lines.push('');
  lines.push(`${pad('PORT', 12)}${pad('SOURCE', 11)}${pad('NAME', 24)}METHOD`);

  for (const entry of scan.entries) {
    if (entry.kind === 'range') {
      if (entry.state === 'virtual-hidden') {
        lines.push(`${pad(`${entry.start}-${entry.end}/${entry.protocol}`, 12)}${pad('-', 11)}(hidden, ${entry.count} ports)`);
      }
      continue;
    }
    const { record } = entry;
    const name = record.containerName ?? record.serviceName ?? record.processName ?? '-';
    lines.push(
      `${pad(`${record.port}/${record.protocol}`, 12)}${pad(record.source, 11)}${pad(name, 24)}${record.detectionMethod}`,
    );
  }

  if (scan.hidden.length > 0) {
    lines.push('');
    lines.push(`hidden: ${scan.hidden.map((record) => `${record.port}/${record.protocol}`).join(', ')}`);
  }

  return lines.join('\n');
}
