#!/usr/bin/env node

/**
 * Issue Mirror Sync CLI
 *
 * One-way reconciliation of Jira issues into an Airfocus workspace
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { AirfocusClient } from './lib/airfocus-client';
import { printPlan } from './lib/change-preview';
import { SyncConfig, loadConfigFromEnvironment, withOverrides } from './lib/config';
import { FatalPreconditionError, errorMessage } from './lib/errors';
import { FieldResolver } from './lib/field-resolver';
import { JiraClient } from './lib/jira-client';
import { logger } from './lib/logger';
import { SnapshotStore } from './lib/snapshot-store';
import { SnapshotOptions, SyncEngine } from './lib/sync-engine';
import { PlannedRecord, ReconciliationInput, Resolution, RunReport } from './lib/types';

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

interface SyncOptions {
  concurrency?: number;
  maxRetries?: number;
  snapshots: boolean;
  yes?: boolean;
}

interface PlanOptions {
  diff?: boolean;
}

interface Components {
  config: SyncConfig;
  jira: JiraClient;
  airfocus: AirfocusClient;
  engine: SyncEngine;
  snapshots: SnapshotOptions;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Load configuration and wire clients and engine
 */
function initialize(global: GlobalOptions, overrides: Partial<Pick<SyncConfig, 'concurrency' | 'maxRetries'>> = {}): Components {
  const config = withOverrides(loadConfigFromEnvironment(process.cwd(), global.config), overrides);
  logger.setLevel(global.debug ? 'debug' : config.logLevel);

  logger.debug(`Jira: ${config.jira.restUrl} (project ${config.jira.projectKey}, token set)`);
  logger.debug(`Airfocus: ${config.airfocus.restUrl} (workspace ${config.airfocus.workspaceId}, API key set)`);

  const jira = new JiraClient({
    restUrl: config.jira.restUrl,
    token: config.jira.token,
    projectKey: config.jira.projectKey,
    jql: config.jira.jql,
    teamField: config.jira.teamField,
    timeoutMs: config.httpTimeoutMs,
    retries: config.httpRetries,
  });

  const airfocus = new AirfocusClient({
    restUrl: config.airfocus.restUrl,
    apiKey: config.airfocus.apiKey,
    workspaceId: config.airfocus.workspaceId,
    timeoutMs: config.httpTimeoutMs,
    retries: config.httpRetries,
  });

  const engine = new SyncEngine(
    { source: jira, reader: airfocus, writer: airfocus },
    {
      statusMapping: config.statusMapping,
      fallbackStatus: config.fallbackStatus,
      externalKeyField: config.externalKeyField,
      team: config.team,
      keyPattern: config.keyPattern,
      itemColor: config.itemColor,
      concurrency: config.concurrency,
      maxRetries: config.maxRetries,
    }
  );

  const snapshots: SnapshotOptions = {
    store: new SnapshotStore(config.dataDir, config.snapshotRetention),
    projectKey: config.jira.projectKey,
    workspaceId: config.airfocus.workspaceId,
  };

  return { config, jira, airfocus, engine, snapshots };
}

async function fetchWithSpinner(engine: SyncEngine, snapshots?: SnapshotOptions): Promise<ReconciliationInput> {
  const spinner = ora('Fetching Jira issues and Airfocus items...').start();
  try {
    const input = await engine.fetchInputs(snapshots);
    spinner.succeed(`Fetched ${input.records.length} Jira issues, ${input.items.length} Airfocus items`);
    return input;
  } catch (error) {
    spinner.fail('Fetch failed');
    throw error;
  }
}

function summarizePlan(planned: PlannedRecord[]): { creates: number; updates: number; failures: number; skips: number } {
  const summary = { creates: 0, updates: 0, failures: 0, skips: 0 };
  for (const record of planned) {
    if ('skipReason' in record) summary.skips++;
    else if ('failure' in record) summary.failures++;
    else if (record.intent.kind === 'create') summary.creates++;
    else summary.updates++;
  }
  return summary;
}

/**
 * Print run summary
 */
function printReport(report: RunReport): void {
  const { counts } = report;

  console.log(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(chalk.bold.cyan(report.cancelled ? 'Sync Results (cancelled)' : 'Sync Results'));
  console.log(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  console.log(chalk.green(`✓ Created: ${counts.created}`));
  console.log(chalk.blue(`✓ Updated: ${counts.updated}`));
  if (counts.skipped > 0) {
    console.log(chalk.gray(`⊘ Skipped: ${counts.skipped}`));
  }
  if (counts.failed > 0) {
    console.log(chalk.red(`✗ Failed: ${counts.failed}`));
    for (const outcome of report.outcomes) {
      if (outcome.failure) {
        console.log(chalk.red(`  ${outcome.externalKey || '(no key)'} [${outcome.failure.kind}]: ${outcome.failure.reason}`));
      }
    }
  }

  console.log();
}

function fail(error: unknown): never {
  if (error instanceof FatalPreconditionError) {
    console.error(chalk.red(`\nError: ${error.message}`));
  } else {
    console.error(chalk.red(`\nUnexpected error: ${errorMessage(error)}`));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
  }
  process.exit(1);
}

/**
 * First Ctrl-C stops dispatching new records, the second exits at once
 */
function abortOnInterrupt(): { signal: AbortSignal; abort: () => void; dispose: () => void } {
  const controller = new AbortController();

  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      console.error(chalk.red('\nInterrupted again, exiting'));
      process.exit(130);
    }
    logger.warn('Interrupted: finishing in-flight writes, no new records will be started (Ctrl-C again to exit)');
    controller.abort();
  };

  process.on('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    abort: () => controller.abort(),
    dispose: () => process.off('SIGINT', onInterrupt),
  };
}

// Create CLI
const program = new Command();

program
  .name('mirror-sync')
  .description('Mirror Jira issues into an Airfocus workspace')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to the JSON config file')
  .option('--debug', 'Verbose logging');

// Sync command (default)
program
  .command('sync', { isDefault: true })
  .description('Create and update Airfocus items from Jira issues')
  .option('--concurrency <n>', 'Records written in parallel', parseInteger)
  .option('--max-retries <n>', 'Retries for a failed write', parseInteger)
  .option('--no-snapshots', 'Do not write fetched data to the data directory')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: SyncOptions) => {
    try {
      const { engine, snapshots } = initialize(program.opts<GlobalOptions>(), {
        concurrency: options.concurrency,
        maxRetries: options.maxRetries,
      });

      const input = await fetchWithSpinner(engine, options.snapshots ? snapshots : undefined);
      const summary = summarizePlan(engine.plan(input));
      console.log(
        chalk.gray(
          `Planned: ${summary.creates} create, ${summary.updates} update, ${summary.failures} invalid, ${summary.skips} skipped`
        )
      );

      const writes = summary.creates + summary.updates;
      let confirmed = true;
      if (writes === 0) {
        console.log(chalk.green('✓ Nothing to write'));
      } else if (!options.yes && process.stdin.isTTY) {
        const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
          {
            type: 'confirm',
            name: 'proceed',
            message: `Write ${writes} item(s) to Airfocus?`,
            default: true,
          },
        ]);
        confirmed = proceed;
      }

      // A declined run reconciles with an aborted signal: nothing is dispatched
      // and every record is reported as skipped.
      const interrupt = abortOnInterrupt();
      if (!confirmed) {
        interrupt.abort();
      }
      let report: RunReport;
      try {
        report = await engine.reconcile(input, { signal: interrupt.signal });
      } finally {
        interrupt.dispose();
      }

      printReport(report);
      if (report.counts.failed > 0) {
        process.exitCode = 2;
      }
    } catch (error) {
      fail(error);
    }
  });

// Plan command
program
  .command('plan')
  .description('Show what a sync would do without writing anything')
  .option('--diff', 'Show what each update would overwrite')
  .action(async (options: PlanOptions) => {
    try {
      const { engine } = initialize(program.opts<GlobalOptions>());
      const input = await fetchWithSpinner(engine);
      const planned = engine.plan(input);

      console.log(chalk.bold('\nPlanned changes:'));
      printPlan(planned, { showDiff: options.diff });

      const summary = summarizePlan(planned);
      console.log(
        chalk.gray(
          `\n${summary.creates} create, ${summary.updates} update, ${summary.failures} invalid, ${summary.skips} skipped`
        )
      );
      if (summary.failures > 0) {
        process.exitCode = 2;
      }
    } catch (error) {
      fail(error);
    }
  });

// Fields command
program
  .command('fields')
  .description('List workspace fields and statuses and check the configured names')
  .action(async () => {
    try {
      const { config, airfocus } = initialize(program.opts<GlobalOptions>());

      const spinner = ora('Fetching workspace schema...').start();
      let resolver: FieldResolver;
      let schemaText: string[];
      try {
        const schema = await airfocus.fetchSchema();
        spinner.succeed(`Workspace has ${schema.fields.length} fields and ${schema.statuses.length} statuses`);
        resolver = new FieldResolver(schema);
        schemaText = [
          chalk.bold('\nFields:'),
          ...schema.fields.map((field) => {
            const options = field.options.length > 0 ? chalk.gray(` [${field.options.map((o) => o.name).join(', ')}]`) : '';
            return `  ${field.name} ${chalk.gray(`(${field.kind}, ${field.id})`)}${options}`;
          }),
          chalk.bold('\nStatuses:'),
          ...schema.statuses.map((status) => `  ${status.name} ${chalk.gray(`(${status.id})`)}${status.isDefault ? chalk.gray(' default') : ''}`),
        ];
      } catch (error) {
        spinner.fail('Could not fetch workspace schema');
        throw new FatalPreconditionError(errorMessage(error), { cause: error });
      }

      schemaText.forEach((line) => console.log(line));

      console.log(chalk.bold('\nConfiguration check:'));
      const check = (label: string, resolution: Resolution): void => {
        if (resolution.found) {
          console.log(chalk.green(`  ✓ ${label} -> ${resolution.id}`));
        } else {
          console.log(chalk.red(`  ✗ ${label}: ${resolution.reason}`));
        }
      };

      if (config.externalKeyField) {
        check(`key field "${config.externalKeyField}"`, resolver.resolveField(config.externalKeyField));
      } else {
        console.log(chalk.gray('  key field disabled: keys live in the description marker'));
      }

      for (const entry of config.statusMapping) {
        check(`status "${entry.mirrorStatus}"`, resolver.resolveStatus(entry.mirrorStatus));
      }
      if (config.fallbackStatus) {
        check(`fallback status "${config.fallbackStatus}"`, resolver.resolveStatus(config.fallbackStatus));
      }

      if (config.team) {
        const field = resolver.resolveField(config.team.field);
        check(`team field "${config.team.field}"`, field);
        const definition = field.found ? resolver.getField(field.id) : undefined;
        if (field.found && definition && definition.kind !== 'text') {
          check(`team option "${config.team.value}"`, resolver.resolveOption(field.id, config.team.value));
        }
      }

      console.log();
    } catch (error) {
      fail(error);
    }
  });

// Clean command
program
  .command('clean')
  .description('Delete old snapshots from the data directory')
  .action(() => {
    try {
      const { config, snapshots } = initialize(program.opts<GlobalOptions>());
      const removed = snapshots.store.cleanup();
      console.log(chalk.green(`✓ Removed ${removed} old snapshot(s) from ${config.dataDir}`));
    } catch (error) {
      fail(error);
    }
  });

// Parse and execute
program.parseAsync().catch(fail);
