/**
 * plugin-catalog command definitions
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { readFileSync } from 'fs';
import { dirname, join, relative } from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager } from '../../core/config.js';
import { ExitCode, exitCodeForError, runCheck, runRender, type RenderRunOutcome } from '../../core/pipeline.js';
import { RENDER_TARGETS, TARGET_NAMES } from '../../render/targets.js';
import type { RenderResult } from '../../render/renderer.js';
import { scaffoldPlugin } from '../../scaffold/scaffolder.js';
import { RenderError } from '../../utils/errors.js';
import { renderMarkdown } from '../../utils/markdown.js';
import { logger, LogLevel } from '../../utils/logger.js';
import { formatReport, printReport } from './report.js';
import { parseList, runNewPluginWizard, type NewPluginFlags } from './new-plugin-wizard.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../../package.json'), 'utf-8')));

interface CommonOptions {
  config?: string;
  knownModels?: string[];
  debug?: boolean;
}

interface RenderCommandOptions extends CommonOptions {
  target: string[];
  dryRun?: boolean;
  output?: string;
  templates?: string;
  stamp?: boolean;
  pretty?: boolean;
  name?: string;
}

interface NewCommandOptions extends Omit<NewPluginFlags, 'id'> {
  yes?: boolean;
  debug?: boolean;
}

async function loadConfig(options: CommonOptions & { output?: string; templates?: string; name?: string }) {
  const config = await ConfigManager.load(options.config);
  return config.withOverrides({
    knownModels: options.knownModels,
    outputDir: options.output,
    templatesDir: options.templates,
    marketplaceName: options.name,
  });
}

/**
 * Run a command body with SIGINT wired to cancellation and errors mapped to
 * exit codes
 */
async function runCommand(label: string, body: (signal: AbortSignal) => Promise<number>): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted, stopping after the current step...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    process.exitCode = await body(controller.signal);
  } catch (error) {
    logger.error(`${label} failed`, error);
    if (error instanceof RenderError && error.diagnostics.length > 0) {
      console.error(formatReport(error.diagnostics).join('\n'));
    }
    process.exitCode = exitCodeForError(error);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function applyDebug(options: { debug?: boolean }) {
  if (options.debug) {
    logger.setLogLevel(LogLevel.DEBUG);
  }
}

function printPreview(result: RenderResult, pretty: boolean) {
  const heading = chalk.bold.cyan(`--- ${result.target.outputPath} ---`);
  const body = pretty && result.target.format === 'markdown' ? renderMarkdown(result.content) : result.content;
  process.stdout.write(`${heading}\n${body}${body.endsWith('\n') ? '' : '\n'}\n`);
}

/**
 * Build the command tree. Program options are only read before the
 * subcommand, so `new --version` reaches the scaffolder.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('plugin-catalog')
    .enablePositionalOptions()
    .description('Scan, validate and document a directory of agent/command/skill plugins')
    .version(packageJson.version);

  program
    .command('scan')
    .description('Scan and validate a plugin root; exits 1 when errors are found')
    .argument('<root>', 'Directory containing one subdirectory per plugin')
    .option('-c, --config <file>', 'JSON or YAML configuration file')
    .option('--known-models <list>', 'Comma-separated accepted agent models', parseList)
    .option('--debug', 'Enable debug logging')
    .action(async (root: string, options: CommonOptions) => {
      applyDebug(options);
      await runCommand('Scan', async (signal) => {
        const config = await loadConfig(options);
        const spinner = ora({ text: `Scanning ${root}...`, stream: process.stderr }).start();

        try {
          const outcome = await runCheck(root, { config, signal });
          spinner.succeed(`Scanned ${outcome.catalog.plugins.size} plugins`);
          printReport(outcome.diagnostics, outcome.summary);
          return outcome.exitCode;
        } catch (error) {
          spinner.fail('Scan failed');
          throw error;
        }
      });
    });

  program
    .command('render')
    .description('Scan, validate and render the manifest and reference docs')
    .argument('<root>', 'Directory containing one subdirectory per plugin')
    .addOption(
      new Option('-t, --target <names...>', 'Targets to render').choices([...TARGET_NAMES, 'all']).default(['all'])
    )
    .option('--dry-run', 'Print rendered content instead of writing files')
    .option('-o, --output <dir>', 'Output directory (default: docs)')
    .option('--templates <dir>', 'Directory of <target>.md.tmpl templates')
    .option('--stamp', 'Stamp Markdown output with the generation time')
    .option('--pretty', 'Format Markdown previews for the terminal (with --dry-run)')
    .option('--name <name>', 'Marketplace name used in the output')
    .option('-c, --config <file>', 'JSON or YAML configuration file')
    .option('--known-models <list>', 'Comma-separated accepted agent models', parseList)
    .option('--debug', 'Enable debug logging')
    .action(async (root: string, options: RenderCommandOptions) => {
      applyDebug(options);
      await runCommand('Render', async (signal) => {
        const config = await loadConfig(options);
        const mode = options.dryRun ? 'dry-run' : 'write';
        const spinner = ora({ text: `Rendering ${root}...`, stream: process.stderr }).start();

        let outcome: RenderRunOutcome;
        try {
          outcome = await runRender(root, {
            config,
            signal,
            targets: options.target,
            mode,
            generatedAt: options.stamp ? new Date() : undefined,
          });
          spinner.succeed(`Rendered ${outcome.results.length} target(s)`);
        } catch (error) {
          spinner.fail('Render failed');
          throw error;
        }

        for (const result of outcome.results) {
          if (mode === 'dry-run') {
            printPreview(result, Boolean(options.pretty));
          } else {
            logger.success(`Wrote ${relative(process.cwd(), result.outputFile)} (${result.bytesWritten} bytes)`);
          }
        }

        printReport(outcome.diagnostics, outcome.summary);
        return outcome.exitCode;
      });
    });

  program
    .command('new')
    .description('Scaffold a new plugin directory')
    .argument('<root>', 'Directory containing one subdirectory per plugin')
    .argument('[id]', 'Plugin id (hyphen-case)')
    .option('-d, --description <text>', 'Plugin description')
    .option('--agent <names...>', 'Agents to create')
    .option('--command <names...>', 'Commands to create')
    .option('--skill <names...>', 'Skills to create')
    .option('--model <model>', 'Model for created agents', 'sonnet')
    .option('--version <version>', 'Plugin version', '0.1.0')
    .option('--category <category>', 'Plugin category')
    .option('-y, --yes', 'Never prompt; fail when something is missing')
    .option('--debug', 'Enable debug logging')
    .action(async (root: string, id: string | undefined, options: NewCommandOptions) => {
      applyDebug(options);
      await runCommand('Scaffold', async () => {
        const flags: NewPluginFlags = { ...options, id };
        const complete = id !== undefined && options.description !== undefined && (options.agent || options.command);

        const scaffold =
          complete || options.yes || !process.stdin.isTTY
            ? {
                id: id ?? '',
                description: options.description ?? '',
                version: options.version,
                category: options.category,
                model: options.model,
                agents: options.agent,
                commands: options.command,
                skills: options.skill,
              }
            : await runNewPluginWizard(flags);

        const result = await scaffoldPlugin(root, scaffold);
        for (const file of result.files) {
          console.error(chalk.gray(`  + ${file}`));
        }
        logger.success(`Plugin "${scaffold.id}" created. Run "plugin-catalog render ${root}" to update the docs.`);
        return ExitCode.Success;
      });
    });

  program
    .command('targets')
    .description('List render targets')
    .action(() => {
      for (const target of RENDER_TARGETS) {
        console.log(`${target.name.padEnd(14)} ${target.outputPath}`);
      }
    });

  return program;
}
