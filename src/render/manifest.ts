/**
 * Machine-readable marketplace manifest
 *
 * The output is a pure function of the catalog's sorted contents: no
 * timestamps, no absolute paths, fixed key order.
 */

import type { Catalog, ComponentKind, PluginAuthor, PluginRecord } from '../catalog/types.js';
import { DEFAULT_CATEGORY, componentsOfKind, sortedPlugins, type MarketplaceInfo } from './context.js';

export interface ManifestComponent {
  name: string;
  description: string;
  model?: string;
}

export interface ManifestPlugin {
  id: string;
  description: string;
  version: string | null;
  category: string;
  keywords: string[];
  author?: PluginAuthor;
  license?: string;
  homepage?: string;
  agents: ManifestComponent[];
  commands: ManifestComponent[];
  skills: ManifestComponent[];
}

export interface Manifest {
  name: string;
  owner?: string;
  plugins: ManifestPlugin[];
}

function manifestComponents(plugin: PluginRecord, kind: ComponentKind): ManifestComponent[] {
  return componentsOfKind(plugin, kind).map((c) => ({
    name: c.name,
    description: c.description,
    ...(c.model !== undefined ? { model: c.model } : {}),
  }));
}

export function buildManifest(catalog: Catalog, marketplace: MarketplaceInfo = { name: 'Plugin Marketplace' }): Manifest {
  return {
    name: marketplace.name,
    ...(marketplace.owner !== undefined ? { owner: marketplace.owner } : {}),
    plugins: sortedPlugins(catalog).map((plugin) => ({
      id: plugin.id,
      description: plugin.description,
      version: plugin.version ?? null,
      category: plugin.category ?? DEFAULT_CATEGORY,
      keywords: [...plugin.keywords],
      ...(plugin.author !== undefined ? { author: { ...plugin.author } } : {}),
      ...(plugin.license !== undefined ? { license: plugin.license } : {}),
      ...(plugin.homepage !== undefined ? { homepage: plugin.homepage } : {}),
      agents: manifestComponents(plugin, 'agent'),
      commands: manifestComponents(plugin, 'command'),
      skills: manifestComponents(plugin, 'skill'),
    })),
  };
}

export function serializeManifest(manifest: Manifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}
