/**
 * @module cli
 * @description Command-line interface for the Safety Guard Agent
 *
 * Usage:
 *   safety-guard evaluate "<description>" [--feature <text>]... [--format json|text]
 *   safety-guard inspect [--format json|text]
 *
 * Exit codes: 0 approved, 2 confirmation required, 1 blocked or error.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import type { GuardRequest } from '@request-guard/contracts';
import { GuardError, InputValidationError, assertStartupRequirements } from '@request-guard/lib';
import { AGENT_IDENTITY, AGENT_LOG_CONTEXT, createAgent, startupChecks } from './agent.js';
import { loadConfigFromEnv, parseConfig, type GuardConfig } from './config.js';
import { describeGuard, exitCodeFor, formatInspection, formatSafetyCheck } from './format.js';

type OutputFormat = 'json' | 'text';

interface EvaluateOptions {
  feature: string[];
  constraint: string[];
  environment: string[];
  user: string[];
  format: OutputFormat;
  auditLog?: string;
  leetspeak: boolean;
}

interface InspectOptions {
  format: OutputFormat;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function formatOption(): Option {
  return new Option('-f, --format <format>', 'Output format').choices(['json', 'text']).default('text');
}

/**
 * Build the request the CLI evaluates
 */
export function buildRequest(description: string, options: EvaluateOptions): GuardRequest {
  const environment = options.environment;
  return {
    description,
    ...(options.feature.length > 0 && { features: options.feature }),
    ...(options.constraint.length > 0 && { constraints: options.constraint }),
    ...(environment.length > 0 && { environment: environment.length === 1 ? environment[0] : environment }),
    ...(options.user.length > 0 && { target_users: options.user }),
  };
}

function resolveConfig(env: NodeJS.ProcessEnv, overrides: Partial<GuardConfig>): GuardConfig {
  return parseConfig({ ...loadConfigFromEnv(env), ...overrides });
}

async function runEvaluate(description: string, options: EvaluateOptions): Promise<void> {
  const config = resolveConfig(process.env, {
    ...(options.auditLog !== undefined && { auditLogPath: options.auditLog }),
    ...(!options.leetspeak && { leetspeakEnabled: false }),
  });
  assertStartupRequirements(AGENT_LOG_CONTEXT, startupChecks(config), { announce: false });

  const agent = createAgent({ config });
  try {
    const request = agent.validateInput(buildRequest(description, options));
    const check = agent.evaluate(request);

    if (options.format === 'json') {
      console.log(JSON.stringify(check, null, 2));
    } else {
      console.log(formatSafetyCheck(check));
    }

    process.exitCode = exitCodeFor(check.decision);
  } finally {
    await agent.shutdown();
  }
}

function runInspect(options: InspectOptions): void {
  const config = resolveConfig(process.env, {});

  if (options.format === 'json') {
    console.log(JSON.stringify({ agent: AGENT_IDENTITY, ...describeGuard(config) }, null, 2));
  } else {
    console.log(formatInspection(config));
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('safety-guard')
    .description('Evaluate project requests for unsafe intent before generation')
    .version(AGENT_IDENTITY.agent_version);

  program
    .command('evaluate')
    .description('Evaluate a request description')
    .argument('<description>', 'Free-text description of what to build')
    .option('--feature <text>', 'Declared feature (repeatable)', collect, [])
    .option('--constraint <text>', 'Known constraint (repeatable)', collect, [])
    .option('--environment <text>', 'Operating environment (repeatable)', collect, [])
    .option('--user <text>', 'Target user role (repeatable)', collect, [])
    .option('--audit-log <path>', 'Append the audit record to this JSON-lines file')
    .option('--no-leetspeak', 'Disable leetspeak normalization')
    .addOption(formatOption())
    .action(async (description: string, options: EvaluateOptions) => {
      await runEvaluate(description, options);
    });

  program
    .command('inspect')
    .description('Show rule tables and active configuration')
    .addOption(formatOption())
    .action((options: InspectOptions) => {
      runInspect(options);
    });

  return program;
}

/**
 * Run the CLI against process.argv
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    if (error instanceof InputValidationError) {
      console.error(chalk.red(error.message));
      for (const issue of error.issues) {
        console.error(chalk.red(`  ${issue.path || '(root)'}: ${issue.message}`));
      }
    } else if (error instanceof GuardError) {
      console.error(chalk.red(`${error.code}: ${error.message}`));
    } else {
      console.error(chalk.red('Evaluation failed'), error);
    }
    process.exitCode = 1;
  }
}
