import chalk from 'chalk';
import Table from 'cli-table3';
import { ExecutionResult, RunReport } from '../interfaces';

/**
 * @description Shortens text to `max` characters, marking the cut with `...`.
 */
export function truncate(text: string, max: number): string {
  const flat = text.trim().replace(/\s*\n\s*/g, ' | ');
  if (flat.length <= max) return flat;
  return `${flat.slice(0, Math.max(0, max - 3))}...`;
}

export function formatSummary(report: RunReport): string {
  return `Execution complete: ${report.successCount}/${report.total} commands successful`;
}

export function renderResultsTable(results: readonly ExecutionResult[]): string {
  const table = new Table({
    head: ['#', 'Command', 'Exit', 'Status', 'Time (ms)'],
    colWidths: [5, 40, 7, 8, 11],
    wordWrap: true,
  });

  for (const result of results) {
    table.push([
      result.position,
      result.command,
      result.exitStatus,
      result.succeeded ? chalk.green('OK') : chalk.red('FAILED'),
      result.duration,
    ]);
  }

  return table.toString();
}
