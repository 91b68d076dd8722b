/**
 * Template context: sorted, display-ready views of a catalog
 */

import type { Catalog, ComponentKind, ComponentRecord, PluginRecord } from '../catalog/types.js';
import { compareStrings } from '../catalog/diagnostics.js';

export const DEFAULT_CATEGORY = 'general';

export interface ComponentView {
  plugin: string;
  kind: ComponentKind;
  name: string;
  description: string;
  /** Description collapsed to one line with pipes escaped, for Markdown tables */
  summary: string;
  model: string;
  file: string;
  useWhen: string;
}

export interface PluginView {
  id: string;
  description: string;
  summary: string;
  version: string;
  category: string;
  keywords: string;
  agents: ComponentView[];
  commands: ComponentView[];
  skills: ComponentView[];
  hasAgents: boolean;
  hasCommands: boolean;
  hasSkills: boolean;
  agentCount: number;
  commandCount: number;
  skillCount: number;
}

export interface CategoryView {
  name: string;
  plugins: PluginView[];
}

export interface CatalogStats {
  totalPlugins: number;
  totalAgents: number;
  totalCommands: number;
  totalSkills: number;
}

export interface MarketplaceInfo {
  name: string;
  owner?: string;
}

export interface TemplateContext {
  marketplace: MarketplaceInfo;
  plugins: PluginView[];
  categories: CategoryView[];
  allAgents: ComponentView[];
  allCommands: ComponentView[];
  allSkills: ComponentView[];
  stats: CatalogStats;
  /** ISO timestamp, or '' when the output should not be stamped */
  generatedAt: string;
}

export function tableCell(text: string): string {
  return text.replace(/\s+/g, ' ').trim().replace(/\|/g, '\\|');
}

export function sortedPlugins(catalog: Catalog): PluginRecord[] {
  return [...catalog.plugins.values()].sort((a, b) => compareStrings(a.id, b.id));
}

/**
 * Components of one kind, by name then file path
 */
export function componentsOfKind(plugin: PluginRecord, kind: ComponentKind): ComponentRecord[] {
  return plugin.components
    .filter((c) => c.kind === kind)
    .sort((a, b) => compareStrings(a.name, b.name) || compareStrings(a.filePath, b.filePath));
}

function toComponentView(pluginId: string, component: ComponentRecord): ComponentView {
  return {
    plugin: pluginId,
    kind: component.kind,
    name: component.name,
    description: component.description,
    summary: tableCell(component.description),
    model: component.model ?? '',
    file: component.filePath,
    useWhen: component.extra.use_when ?? '',
  };
}

function toPluginView(plugin: PluginRecord): PluginView {
  const view = (kind: ComponentKind) => componentsOfKind(plugin, kind).map((c) => toComponentView(plugin.id, c));
  const agents = view('agent');
  const commands = view('command');
  const skills = view('skill');

  return {
    id: plugin.id,
    description: plugin.description,
    summary: tableCell(plugin.description),
    version: plugin.version ?? '',
    category: plugin.category ?? DEFAULT_CATEGORY,
    keywords: plugin.keywords.join(', '),
    agents,
    commands,
    skills,
    hasAgents: agents.length > 0,
    hasCommands: commands.length > 0,
    hasSkills: skills.length > 0,
    agentCount: agents.length,
    commandCount: commands.length,
    skillCount: skills.length,
  };
}

export interface ContextOptions {
  marketplace?: MarketplaceInfo;
  generatedAt?: Date;
}

export function buildContext(catalog: Catalog, options: ContextOptions = {}): TemplateContext {
  const plugins = sortedPlugins(catalog).map(toPluginView);

  const categoryMap = new Map<string, PluginView[]>();
  for (const plugin of plugins) {
    const list = categoryMap.get(plugin.category) ?? [];
    list.push(plugin);
    categoryMap.set(plugin.category, list);
  }
  const categories = [...categoryMap.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([name, list]) => ({ name, plugins: list }));

  const allAgents = plugins.flatMap((p) => p.agents);
  const allCommands = plugins.flatMap((p) => p.commands);
  const allSkills = plugins.flatMap((p) => p.skills);

  return {
    marketplace: options.marketplace ?? { name: 'Plugin Marketplace' },
    plugins,
    categories,
    allAgents,
    allCommands,
    allSkills,
    stats: {
      totalPlugins: plugins.length,
      totalAgents: allAgents.length,
      totalCommands: allCommands.length,
      totalSkills: allSkills.length,
    },
    generatedAt: options.generatedAt ? options.generatedAt.toISOString() : '',
  };
}
