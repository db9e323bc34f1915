import inquirer from 'inquirer';
import chalk from 'chalk';
import {
  APPLICATION_STATUSES,
  DEFAULT_STATUS,
  formatCalendarDate,
  isCalendarDate,
  type ApplicationStatusEnum,
  type NewApplication,
} from '../storage/records/index.js';

/**
 * Prompt for the fields of a new application. Values already given on the
 * command line are used as defaults.
 */
export async function promptApplication(defaults: Partial<NewApplication> = {}): Promise<NewApplication> {
  const answers = await inquirer.prompt<{
    company: string;
    position: string;
    portalUrl: string;
    dateApplied: string;
    status: ApplicationStatusEnum;
  }>([
    {
      type: 'input',
      name: 'company',
      message: chalk.cyan('Company:'),
      default: defaults.company,
      validate: (input: string) => input.trim().length > 0 || 'Company is required',
    },
    {
      type: 'input',
      name: 'position',
      message: chalk.cyan('Position:'),
      default: defaults.position,
      validate: (input: string) => input.trim().length > 0 || 'Position is required',
    },
    {
      type: 'input',
      name: 'portalUrl',
      message: chalk.cyan('Application portal URL (optional):'),
      default: defaults.portalUrl,
    },
    {
      type: 'input',
      name: 'dateApplied',
      message: chalk.cyan('Date applied (YYYY-MM-DD):'),
      default: defaults.dateApplied ?? formatCalendarDate(new Date()),
      validate: (input: string) => isCalendarDate(input.trim()) || 'Use a date like 2024-05-01',
    },
    {
      type: 'list',
      name: 'status',
      message: chalk.cyan('Status:'),
      choices: [...APPLICATION_STATUSES],
      default: DEFAULT_STATUS,
    },
  ]);

  return {
    company: answers.company,
    position: answers.position,
    portalUrl: answers.portalUrl.trim() || undefined,
    dateApplied: answers.dateApplied.trim(),
    status: answers.status,
  };
}

/**
 * Pick a status from the fixed list.
 */
export async function promptStatus(current?: ApplicationStatusEnum): Promise<ApplicationStatusEnum> {
  const { status } = await inquirer.prompt<{ status: ApplicationStatusEnum }>([
    {
      type: 'list',
      name: 'status',
      message: chalk.cyan('New status:'),
      choices: [...APPLICATION_STATUSES],
      default: current,
    },
  ]);
  return status;
}

/**
 * Prompt for confirmation
 */
export async function promptConfirm(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: chalk.yellow(message),
      default: false,
    },
  ]);
  return confirmed;
}
