/**
 * Terminal summary table renderer.
 *
 * Produces a colorized box summarizing one invocation: one line per target
 * with its status and result count, followed by the failure causes.
 */

import chalk from 'chalk';

import type { RunSummary, TargetOutcome } from '../types/run.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 60;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Format the run summary into a colorized terminal table string.
 *
 * Succeeded targets are green, failed targets red; the pass rate is
 * colored green when every target succeeded, red otherwise.
 */
export function formatSummaryTable(summary: RunSummary): string {
  const lines: string[] = [];
  const border = (left: string, right: string): string =>
    chalk.cyan(`${left}${''.padStart(BOX_WIDTH, '═')}${right}`);

  lines.push(border('╔', '╗'));
  lines.push(formatCenteredLine('Masquerade Monitor Run Summary', true));
  lines.push(border('╠', '╣'));

  lines.push(formatLine(`Started: ${summary.startedAt.toISOString()}`));
  lines.push(formatLine(`Duration: ${formatDuration(summary.durationMs)}`));

  lines.push(border('╠', '╣'));
  lines.push(formatSectionHeader('TARGETS'));
  for (const outcome of summary.outcomes) {
    lines.push(formatLineRaw(formatOutcome(outcome)));
  }

  const failed = summary.outcomes.filter((o) => o.status === 'failed');
  const succeeded = summary.outcomes.length - failed.length;
  const ratio = `${succeeded}/${summary.outcomes.length} succeeded`;
  lines.push(border('╠', '╣'));
  lines.push(formatLineRaw(`Targets: ${failed.length === 0 ? chalk.green(ratio) : chalk.red(ratio)}`));
  lines.push(formatLine(`last_run updated: ${summary.committed.length} entr${summary.committed.length === 1 ? 'y' : 'ies'}`));

  if (failed.length > 0) {
    lines.push(border('╠', '╣'));
    lines.push(formatSectionHeader('FAILURES'));
    for (const outcome of failed) {
      lines.push(formatLine(truncate(`${outcome.name}: ${outcome.error ?? 'unknown error'}`)));
    }
  }

  lines.push(border('╚', '╝'));
  return lines.join('\n');
}

/**
 * Print the formatted summary table to stdout.
 */
export function printSummary(summary: RunSummary): void {
  console.log(formatSummaryTable(summary));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function formatOutcome(outcome: TargetOutcome): string {
  const mark = outcome.status === 'succeeded' ? chalk.green('✓') : chalk.red('✗');
  const label = truncate(`${outcome.name}${outcome.kind === 'group' ? ' (group)' : ''}`, 30);
  const detail =
    outcome.status === 'succeeded'
      ? `${outcome.resultCount} result(s), ${outcome.iocCount} IOC(s)`
      : chalk.red('failed');
  return `${mark} ${label.padEnd(30)} ${detail}`;
}

/**
 * Format a line of text padded within the box borders.
 */
function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Format a line that may contain chalk-colored segments.
 *
 * Since chalk adds invisible ANSI escape codes, padding is computed from
 * the visible length.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string, isBold: boolean = false): string {
  const totalPadding = BOX_WIDTH - 2 - text.length;
  const leftPad = Math.floor(totalPadding / 2);
  const rightPad = totalPadding - leftPad;
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
  const styled = isBold ? chalk.bold.white(padded) : padded;
  return `${chalk.cyan('║')} ${styled} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

function truncate(text: string, max: number = BOX_WIDTH - 2): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Format a processing duration from milliseconds to a human-readable string.
 */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Strip ANSI escape codes from a string to get its visible length.
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
