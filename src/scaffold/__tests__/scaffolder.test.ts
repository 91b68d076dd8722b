import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { scaffoldPlugin } from '../scaffolder.js';
import { scan } from '../../catalog/scanner.js';
import { validate } from '../../catalog/validator.js';
import { ScaffoldError } from '../../utils/errors.js';
import { makeTmpDir } from '../../__tests__/helpers.js';

describe('scaffoldPlugin', () => {
  let cleanup: (() => void)[] = [];

  afterEach(() => {
    cleanup.forEach((fn) => fn());
    cleanup = [];
  });

  function tmp(): string {
    const dir = makeTmpDir();
    cleanup.push(() => fs.rmSync(dir, { recursive: true, force: true }));
    return dir;
  }

  it('creates a plugin the scanner accepts without diagnostics', async () => {
    const root = tmp();

    const result = await scaffoldPlugin(root, {
      id: 'my-tools',
      description: 'My tools',
      category: 'development',
      agents: ['code-reviewer'],
      commands: ['build'],
      skills: ['testing'],
    });

    expect(result.pluginPath).toBe(path.join(root, 'my-tools'));
    expect(result.files).toEqual([
      '.claude-plugin/plugin.json',
      'agents/code-reviewer.md',
      'commands/build.md',
      'skills/testing/SKILL.md',
    ]);

    const { catalog, diagnostics } = await scan(root);
    expect(diagnostics).toEqual([]);
    expect(validate(catalog)).toEqual([]);

    const record = catalog.plugins.get('my-tools');
    expect(record?.description).toBe('My tools');
    expect(record?.version).toBe('0.1.0');
    expect(record?.category).toBe('development');
    expect(record?.components.map((c) => `${c.kind}:${c.name}:${c.model ?? ''}`)).toEqual([
      'agent:code-reviewer:sonnet',
      'command:build:',
      'skill:testing:',
    ]);
    expect(record?.components[2].extra.use_when).toBe('Use when working on testing tasks.');
  });

  it('writes the requested model and version', async () => {
    const root = tmp();

    await scaffoldPlugin(root, { id: 'ops', description: 'Ops', agents: ['pager'], model: 'haiku', version: '2.0.0' });

    const manifest = JSON.parse(fs.readFileSync(path.join(root, 'ops', '.claude-plugin', 'plugin.json'), 'utf-8'));
    expect(manifest).toEqual({ name: 'ops', description: 'Ops', version: '2.0.0' });
    expect(fs.readFileSync(path.join(root, 'ops', 'agents', 'pager.md'), 'utf-8')).toContain('\nmodel: haiku\n');
  });

  it('rejects invalid ids and names', async () => {
    const root = tmp();

    await expect(scaffoldPlugin(root, { id: 'My_Tools', description: 'x', commands: ['run'] })).rejects.toThrow(
      'Invalid plugin id "My_Tools": use lowercase letters, digits and inner hyphens'
    );
    await expect(scaffoldPlugin(root, { id: 'tools', description: 'x', commands: ['Run'] })).rejects.toThrow(
      'Invalid command name "Run": use lowercase letters, digits and inner hyphens'
    );
    await expect(scaffoldPlugin(root, { id: 'tools', description: 'x', agents: ['a', 'a'] })).rejects.toThrow(
      'Duplicate agent name "a"'
    );
    expect(fs.readdirSync(root)).toEqual([]);
  });

  it('requires an agent or a command', async () => {
    await expect(scaffoldPlugin(tmp(), { id: 'docs', description: 'x', skills: ['notes'] })).rejects.toThrow(
      'A plugin needs at least one agent or command'
    );
  });

  it('refuses to overwrite an existing plugin', async () => {
    const root = tmp();
    fs.mkdirSync(path.join(root, 'tools'));

    await expect(scaffoldPlugin(root, { id: 'tools', description: 'x', commands: ['run'] })).rejects.toBeInstanceOf(
      ScaffoldError
    );
    expect(fs.readdirSync(path.join(root, 'tools'))).toEqual([]);
  });
});
