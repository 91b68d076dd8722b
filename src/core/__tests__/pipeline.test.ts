import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ExitCode, exitCodeForError, runCheck, runRender } from '../pipeline.js';
import { ConfigManager } from '../config.js';
import { MapTemplateSource } from '../../render/targets.js';
import { CancelledError, ConfigurationError, RenderError, ScanError } from '../../utils/errors.js';
import { TOOLS_PLUGIN, makeTmpDir, markdown, writeTree } from '../../__tests__/helpers.js';

describe('pipeline', () => {
  let cleanup: (() => void)[] = [];

  afterEach(() => {
    cleanup.forEach((fn) => fn());
    cleanup = [];
  });

  function fixture(files: Record<string, string>): string {
    const root = makeTmpDir();
    cleanup.push(() => fs.rmSync(root, { recursive: true, force: true }));
    writeTree(root, files);
    return root;
  }

  describe('runCheck', () => {
    it('exits 0 for a clean tree', async () => {
      const outcome = await runCheck(fixture(TOOLS_PLUGIN));

      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.summary).toEqual({ errors: 0, warnings: 0, excluded: [] });
    });

    it('exits 1 when errors are found and lists what was excluded', async () => {
      const root = fixture({
        ...TOOLS_PLUGIN,
        'Bad_Plugin/commands/run.md': markdown({ name: 'run', description: 'Runs.' }),
        'docs/skills/notes/SKILL.md': markdown({ name: 'notes', description: 'Use when taking notes.' }),
      });

      const outcome = await runCheck(root);

      expect(outcome.exitCode).toBe(ExitCode.ValidationErrors);
      expect(outcome.diagnostics.map((d) => d.code)).toEqual([
        'plugin.invalid_name',
        'plugin.missing_required_component',
      ]);
      expect(outcome.summary).toEqual({ errors: 2, warnings: 0, excluded: ['Bad_Plugin'] });
      expect([...outcome.catalog.plugins.keys()]).toEqual(['docs', 'tools']);
    });

    it('exits 0 when there are only warnings', async () => {
      const config = ConfigManager.fromObject({ knownModels: ['custom'] });

      const outcome = await runCheck(fixture(TOOLS_PLUGIN), { config });

      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.diagnostics.map((d) => d.code)).toEqual(['agent.unknown_model']);
    });

    it('propagates a scan failure', async () => {
      await expect(runCheck(path.join(fixture({}), 'missing'))).rejects.toBeInstanceOf(ScanError);
    });
  });

  describe('runRender', () => {
    it('renders into the configured output directory', async () => {
      const root = fixture(TOOLS_PLUGIN);
      const config = ConfigManager.fromObject({ outputDir: path.join(root, 'site') });

      const outcome = await runRender(root, { config, targets: ['manifest'] });

      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.results.map((r) => r.outputFile)).toEqual([path.join(root, 'site', 'marketplace.json')]);
      expect(JSON.parse(fs.readFileSync(path.join(root, 'site', 'marketplace.json'), 'utf-8')).plugins[0].id).toBe(
        'tools'
      );
    });

    it('renders despite validation errors and reports them', async () => {
      const root = fixture({
        ...TOOLS_PLUGIN,
        'docs/skills/notes/SKILL.md': markdown({ name: 'notes', description: 'Use when taking notes.' }),
      });

      const outcome = await runRender(root, {
        targets: ['agents'],
        mode: 'dry-run',
        outputDir: path.join(root, 'out'),
        templates: new MapTemplateSource({ agents: '{{stats.totalPlugins}}' }),
      });

      expect(outcome.exitCode).toBe(ExitCode.ValidationErrors);
      expect(outcome.results[0].content).toBe('2');
      expect(fs.existsSync(path.join(root, 'out'))).toBe(false);
    });

    it('merges render diagnostics into the outcome', async () => {
      const root = fixture(TOOLS_PLUGIN);

      const outcome = await runRender(root, {
        targets: ['manifest', 'usage'],
        mode: 'dry-run',
        outputDir: path.join(root, 'out'),
        templates: new MapTemplateSource({}),
      });

      expect(outcome.exitCode).toBe(ExitCode.ValidationErrors);
      expect(outcome.diagnostics.map((d) => d.code)).toEqual(['render.missing_template']);
    });

    it('keeps and renders an oversized skill without a trigger', async () => {
      const root = fixture({
        ...TOOLS_PLUGIN,
        'tools/skills/x/SKILL.md': markdown({ name: 'x', description: 'a'.repeat(2000) }),
      });

      const outcome = await runRender(root, {
        targets: ['agent-skills'],
        mode: 'dry-run',
        outputDir: path.join(root, 'out'),
        templates: new MapTemplateSource({ 'agent-skills': '{{#allSkills}}{{plugin}}:{{name}};{{/allSkills}}' }),
      });

      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.diagnostics.map((d) => [d.code, d.severity, d.message])).toEqual([
        ['skill.description_too_long', 'warning', 'Skill "x" description is 2000 characters (limit 1024)'],
        ['skill.missing_trigger', 'warning', 'Skill "x" description has no "Use when" trigger'],
      ]);
      expect(outcome.results[0].content).toBe('tools:testing;tools:x;');
    });

    it('rejects unknown targets before scanning', async () => {
      await expect(runRender('/definitely/not/here', { targets: ['nope'] })).rejects.toBeInstanceOf(RenderError);
    });
  });

  describe('exitCodeForError', () => {
    it('maps failures to exit codes', () => {
      expect(exitCodeForError(new CancelledError())).toBe(130);
      expect(exitCodeForError(new ScanError('x'))).toBe(2);
      expect(exitCodeForError(new RenderError('x'))).toBe(3);
      expect(exitCodeForError(new ConfigurationError('x'))).toBe(1);
      expect(exitCodeForError(new Error('x'))).toBe(1);
    });
  });
});
