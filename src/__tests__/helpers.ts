import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ComponentKind, ComponentRecord, PluginRecord } from '../catalog/types.js';

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'plugin-catalog-test-'));
}

/**
 * Write files given as root-relative posix paths, creating directories
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, ...relativePath.split('/'));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
  }
}

export function markdown(fields: Record<string, string>, body = 'Body'): string {
  const lines = Object.entries(fields).map(([key, value]) => `${key}: ${value}`);
  return `---\n${lines.join('\n')}\n---\n\n${body}\n`;
}

export function component(
  kind: ComponentKind,
  name: string,
  filePath: string,
  overrides: Partial<ComponentRecord> = {}
): ComponentRecord {
  return { kind, name, description: `${name} description`, filePath, extra: {}, ...overrides };
}

export function plugin(id: string, components: ComponentRecord[], overrides: Partial<PluginRecord> = {}): PluginRecord {
  return { id, description: '', keywords: [], path: `/plugins/${id}`, components, ...overrides };
}

/** One plugin with an agent, a command and a skill */
export const TOOLS_PLUGIN: Record<string, string> = {
  'tools/agents/reviewer.md': markdown({ name: 'reviewer', description: 'Reviews code.', model: 'sonnet', color: 'blue' }),
  'tools/commands/build.md': markdown({ name: 'build', description: 'Builds the project.' }, 'Run the build.'),
  'tools/skills/testing/SKILL.md': markdown({ name: 'testing', description: 'Test helpers. Use when writing tests.' }),
};
