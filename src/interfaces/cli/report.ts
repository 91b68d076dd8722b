/**
 * Diagnostic and result reporting for the CLI
 */

import chalk from 'chalk';
import {
  formatDiagnostic,
  sortDiagnostics,
  type Diagnostic,
  type DiagnosticSummary,
} from '../../catalog/diagnostics.js';

/**
 * Diagnostics grouped by severity, errors first, one line each
 */
export function formatReport(diagnostics: readonly Diagnostic[]): string[] {
  const sorted = sortDiagnostics(diagnostics);
  const errors = sorted.filter((d) => d.severity === 'error');
  const warnings = sorted.filter((d) => d.severity === 'warning');
  const lines: string[] = [];

  if (errors.length > 0) {
    lines.push(chalk.bold.red(`Errors (${errors.length}):`));
    for (const d of errors) {
      lines.push(chalk.red(`  ✗ ${formatDiagnostic(d)}`));
    }
  }

  if (warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(chalk.bold.yellow(`Warnings (${warnings.length}):`));
    for (const d of warnings) {
      lines.push(chalk.yellow(`  ⚠ ${formatDiagnostic(d)}`));
    }
  }

  return lines;
}

export function formatSummary(summary: DiagnosticSummary): string[] {
  const lines = [`${summary.errors} error(s), ${summary.warnings} warning(s)`];

  if (summary.excluded.length > 0) {
    lines.push('Excluded from the catalog:');
    for (const subject of summary.excluded) {
      lines.push(`  - ${subject}`);
    }
  }

  return lines;
}

export function printReport(diagnostics: readonly Diagnostic[], summary: DiagnosticSummary): void {
  const lines = formatReport(diagnostics);
  if (lines.length > 0) {
    console.error(lines.join('\n'));
    console.error('');
  }

  const color = summary.errors > 0 ? chalk.red : summary.warnings > 0 ? chalk.yellow : chalk.green;
  console.error(color(formatSummary(summary).join('\n')));
}
