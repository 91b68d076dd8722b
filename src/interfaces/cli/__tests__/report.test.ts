import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatReport, formatSummary } from '../report.js';
import { parseList } from '../new-plugin-wizard.js';
import { error, warning } from '../../../catalog/diagnostics.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatReport', () => {
  it('groups errors before warnings', () => {
    const lines = formatReport([
      warning('skill.missing_trigger', 'Skill "notes" description has no "Use when" trigger', {
        pluginId: 'docs',
        componentPath: 'docs/skills/notes/SKILL.md',
      }),
      error('plugin.invalid_name', 'Bad name', { componentPath: 'Bad' }),
    ]);

    expect(lines).toEqual([
      'Errors (1):',
      '  ✗ error plugin.invalid_name Bad name (Bad)',
      '',
      'Warnings (1):',
      '  ⚠ warning skill.missing_trigger [docs] Skill "notes" description has no "Use when" trigger (docs/skills/notes/SKILL.md)',
    ]);
  });

  it('prints nothing without diagnostics', () => {
    expect(formatReport([])).toEqual([]);
  });
});

describe('formatSummary', () => {
  it('lists excluded plugins and files', () => {
    expect(formatSummary({ errors: 1, warnings: 1, excluded: ['Bad', 'tools/commands/x.md'] })).toEqual([
      '1 error(s), 1 warning(s)',
      'Excluded from the catalog:',
      '  - Bad',
      '  - tools/commands/x.md',
    ]);
  });

  it('prints only counts when nothing was excluded', () => {
    expect(formatSummary({ errors: 0, warnings: 2, excluded: [] })).toEqual(['0 error(s), 2 warning(s)']);
  });
});

describe('parseList', () => {
  it('splits on commas and drops blanks', () => {
    expect(parseList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
    expect(parseList('')).toEqual([]);
  });
});
