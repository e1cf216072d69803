import chalk from 'chalk';
import { formatCpu, formatKilobytes, formatPercent, formatTimeAgo } from '@fleetmon/shared';

export { formatBytes, formatCpu, formatKilobytes, formatPercent } from '@fleetmon/shared';

function colorByLoad(value: number, text: string): string {
  if (value > 80) return chalk.red(text);
  if (value > 50) return chalk.yellow(text);
  return chalk.green(text);
}

export function formatCpuDisplay(cpu: number): string {
  return colorByLoad(cpu, formatCpu(cpu));
}

export function formatMemUsageDisplay(memUsage: number): string {
  return colorByLoad(memUsage, formatPercent(memUsage));
}

/** Used over total; both in kilobytes as nodes report them. */
export function formatMemoryPair(usedKb: number, totalKb: number): string {
  if (totalKb === 0) return chalk.gray('-');
  return `${formatKilobytes(usedKb)} / ${formatKilobytes(totalKb)}`;
}

export function formatUpdated(lastUpdated: Date, now: Date = new Date()): string {
  return chalk.gray(formatTimeAgo(lastUpdated, now));
}
