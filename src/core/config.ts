import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { DEFAULT_KNOWN_MODELS, DEFAULT_MAX_SKILL_DESCRIPTION_LENGTH } from '../catalog/validator.js';
import { DEFAULT_SCAN_CONCURRENCY } from '../catalog/scanner.js';

// Zod schemas for validation
const MarketplaceSchema = z.object({
  name: z.string().min(1).default('Plugin Marketplace'),
  owner: z.string().optional(),
});

const CatalogConfigSchema = z.object({
  marketplace: MarketplaceSchema.default({}),
  knownModels: z.array(z.string().min(1)).default([...DEFAULT_KNOWN_MODELS]),
  maxSkillDescriptionLength: z.number().int().positive().default(DEFAULT_MAX_SKILL_DESCRIPTION_LENGTH),
  concurrency: z.number().int().positive().default(DEFAULT_SCAN_CONCURRENCY),
  outputDir: z.string().default('docs'),
  templatesDir: z.string().optional(),
});

export type MarketplaceConfig = z.infer<typeof MarketplaceSchema>;
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type CatalogConfigInput = z.input<typeof CatalogConfigSchema>;

/**
 * Overrides from command-line flags; undefined leaves the file value alone
 */
export interface ConfigOverrides {
  knownModels?: string[];
  outputDir?: string;
  templatesDir?: string;
  marketplaceName?: string;
}

export class ConfigManager {
  private constructor(private readonly config: CatalogConfig) {}

  /**
   * Validate a raw configuration object, filling in defaults
   */
  static fromObject(raw: unknown): ConfigManager {
    const parsed = CatalogConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }
    return new ConfigManager(parsed.data);
  }

  /**
   * Load a JSON or YAML configuration file. Relative directories inside it
   * are resolved against the file's own directory.
   */
  static async fromFile(filePath: string): Promise<ConfigManager> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read configuration file ${filePath}: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML/JSON in ${filePath}: ${errorMessage(error)}`);
    }

    const manager = ConfigManager.fromObject(raw);
    const baseDir = path.dirname(path.resolve(filePath));
    return new ConfigManager({
      ...manager.config,
      outputDir: path.resolve(baseDir, manager.config.outputDir),
      ...(manager.config.templatesDir !== undefined
        ? { templatesDir: path.resolve(baseDir, manager.config.templatesDir) }
        : {}),
    });
  }

  static async load(filePath?: string): Promise<ConfigManager> {
    return filePath ? ConfigManager.fromFile(filePath) : ConfigManager.fromObject({});
  }

  withOverrides(overrides: ConfigOverrides): ConfigManager {
    return new ConfigManager({
      ...this.config,
      ...(overrides.knownModels !== undefined ? { knownModels: overrides.knownModels } : {}),
      ...(overrides.outputDir !== undefined ? { outputDir: overrides.outputDir } : {}),
      ...(overrides.templatesDir !== undefined ? { templatesDir: overrides.templatesDir } : {}),
      marketplace: {
        ...this.config.marketplace,
        ...(overrides.marketplaceName !== undefined ? { name: overrides.marketplaceName } : {}),
      },
    });
  }

  getConfig(): CatalogConfig {
    return this.config;
  }

  getMarketplace(): MarketplaceConfig {
    return this.config.marketplace;
  }

  getKnownModels(): string[] {
    return this.config.knownModels;
  }

  getMaxSkillDescriptionLength(): number {
    return this.config.maxSkillDescriptionLength;
  }

  getConcurrency(): number {
    return this.config.concurrency;
  }

  getOutputDir(): string {
    return this.config.outputDir;
  }

  getTemplatesDir(): string | undefined {
    return this.config.templatesDir;
  }
}
