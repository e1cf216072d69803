import Table from 'cli-table3';
import chalk from 'chalk';
import type {
  BoardAggregate,
  FleetSummary,
  HierarchyIdentity,
  NodeRecord,
  SocAggregate,
} from '@fleetmon/shared';
import { deriveSocId, isValidIPv4 } from '@fleetmon/core';
import {
  formatBytes,
  formatCpuDisplay,
  formatMemUsageDisplay,
  formatMemoryPair,
  formatUpdated,
} from '../utils/format.js';

function tableOptions(head: string[]) {
  return {
    head: head.map((title) => chalk.bold(title)),
    style: {
      head: [],
      border: ['gray'],
    },
  };
}

export function renderNodeTable(nodes: NodeRecord[]): string {
  const table = new Table(
    tableOptions(['name', 'ip', 'soc', 'cpu', 'mem', 'memory', 'cores', 'gpus', 'platform']),
  );

  for (const node of nodes) {
    table.push([
      node.nodeName,
      node.ip,
      isValidIPv4(node.ip) ? deriveSocId(node.ip) : chalk.gray('-'),
      formatCpuDisplay(node.cpuUsage),
      formatMemUsageDisplay(node.memUsage),
      formatMemoryPair(node.usedMemory, node.totalMemory),
      String(node.cpuCount),
      String(node.gpuCount),
      `${node.os}/${node.arch}`,
    ]);
  }

  return table.toString();
}

export function renderNodeInfo(node: NodeRecord): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`\n  ${node.nodeName} (${node.ip})`));
  lines.push(`  Platform:    ${node.os}/${node.arch}`);
  lines.push(`  CPU:         ${formatCpuDisplay(node.cpuUsage)} of ${node.cpuCount} cores`);
  lines.push(`  GPUs:        ${node.gpuCount}`);
  lines.push(`  Memory:      ${formatMemoryPair(node.usedMemory, node.totalMemory)}`);
  lines.push(`  Mem Usage:   ${formatMemUsageDisplay(node.memUsage)}`);
  lines.push('');
  lines.push(chalk.bold('  I/O'));
  lines.push(`  Net RX:      ${formatBytes(node.rxBytes)}`);
  lines.push(`  Net TX:      ${formatBytes(node.txBytes)}`);
  lines.push(`  Disk Read:   ${formatBytes(node.readBytes)}`);
  lines.push(`  Disk Write:  ${formatBytes(node.writeBytes)}`);
  lines.push('');

  return lines.join('\n');
}

export function renderSocTable(socs: SocAggregate[], now: Date = new Date()): string {
  const table = new Table(
    tableOptions(['soc', 'nodes', 'cpu', 'mem', 'memory', 'cores', 'gpus', 'updated']),
  );

  for (const soc of socs) {
    table.push([
      soc.socId,
      String(soc.nodes.length),
      formatCpuDisplay(soc.totalCpuUsage),
      formatMemUsageDisplay(soc.totalMemUsage),
      formatMemoryPair(soc.totalUsedMemory, soc.totalMemory),
      String(soc.totalCpuCount),
      String(soc.totalGpuCount),
      formatUpdated(soc.lastUpdated, now),
    ]);
  }

  return table.toString();
}

export function renderBoardTable(boards: BoardAggregate[], now: Date = new Date()): string {
  const table = new Table(
    tableOptions(['board', 'socs', 'nodes', 'cpu', 'mem', 'cores', 'gpus', 'updated']),
  );

  for (const board of boards) {
    table.push([
      board.boardId,
      String(board.socs.length),
      String(board.nodes.length),
      formatCpuDisplay(board.totalCpuUsage),
      formatMemUsageDisplay(board.totalMemUsage),
      String(board.totalCpuCount),
      String(board.totalGpuCount),
      formatUpdated(board.lastUpdated, now),
    ]);
  }

  return table.toString();
}

export function renderSummary(summary: FleetSummary): string {
  const lines: string[] = [];

  lines.push(chalk.bold('\n  Fleet'));
  lines.push(`  Boards:      ${summary.boardCount}`);
  lines.push(`  SoCs:        ${summary.socCount}`);
  lines.push(`  Nodes:       ${summary.nodeCount}`);
  lines.push(`  Avg CPU:     ${formatCpuDisplay(summary.avgCpuUsage)}`);
  lines.push(`  Avg Mem:     ${formatMemUsageDisplay(summary.avgMemUsage)}`);
  lines.push(`  Cores:       ${summary.totalCpuCount}`);
  lines.push(`  GPUs:        ${summary.totalGpuCount}`);
  lines.push('');

  return lines.join('\n');
}

export function renderIdentity(ip: string, identity: HierarchyIdentity): string {
  return [
    chalk.bold(`\n  ${ip}`),
    `  SoC:         ${identity.socId}`,
    `  Board:       ${identity.boardId}`,
    '',
  ].join('\n');
}
