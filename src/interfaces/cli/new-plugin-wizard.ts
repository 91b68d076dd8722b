/**
 * Interactive prompts for `new`, asked only for what the flags left out
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { isValidPluginId } from '../../catalog/validator.js';
import type { ScaffoldOptions } from '../../scaffold/scaffolder.js';

export interface NewPluginFlags {
  id?: string;
  description?: string;
  version?: string;
  category?: string;
  agent?: string[];
  command?: string[];
  skill?: string[];
  model?: string;
}

interface WizardAnswers {
  id: string;
  description: string;
  agents: string;
  commands: string;
  skills: string;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function validateNameList(input: string): boolean | string {
  const names = parseList(input);
  const invalid = names.filter((n) => !isValidPluginId(n));
  return invalid.length === 0 || `Not hyphen-case: ${invalid.join(', ')}`;
}

export async function runNewPluginWizard(flags: NewPluginFlags): Promise<ScaffoldOptions> {
  console.error(chalk.bold.cyan('\nNew plugin\n'));

  const needsComponents = !flags.agent && !flags.command;

  const answers = await inquirer.prompt<WizardAnswers>([
    {
      type: 'input',
      name: 'id',
      message: 'Plugin id (hyphen-case):',
      when: () => flags.id === undefined,
      validate: (input: string) => isValidPluginId(input) || 'Use lowercase letters, digits and inner hyphens',
    },
    {
      type: 'input',
      name: 'description',
      message: 'Description:',
      when: () => flags.description === undefined,
      validate: (input: string) => input.trim().length > 0 || 'A description is required',
    },
    {
      type: 'input',
      name: 'agents',
      message: 'Agents (comma-separated, may be empty):',
      when: () => needsComponents,
      default: '',
      validate: validateNameList,
    },
    {
      type: 'input',
      name: 'commands',
      message: 'Commands (comma-separated, may be empty):',
      when: () => needsComponents,
      default: '',
      validate: validateNameList,
    },
    {
      type: 'input',
      name: 'skills',
      message: 'Skills (comma-separated, may be empty):',
      when: () => flags.skill === undefined,
      default: '',
      validate: validateNameList,
    },
  ]);

  return {
    id: flags.id ?? answers.id,
    description: flags.description ?? answers.description,
    version: flags.version,
    category: flags.category,
    model: flags.model,
    agents: flags.agent ?? parseList(answers.agents ?? ''),
    commands: flags.command ?? parseList(answers.commands ?? ''),
    skills: flags.skill ?? parseList(answers.skills ?? ''),
  };
}
