#!/usr/bin/env tsx
/**
 * Dataset migration command line
 *
 * Usage:
 *   npm run migrate -- list
 *   npm run migrate -- fetch [codes...]
 *   npm run migrate -- show <code>
 *   npm run migrate -- edit <code> <file>
 *   npm run migrate -- transform <code> --substitute --encode
 *   npm run migrate -- upsert <codes...>
 *   npm run migrate -- delete <codes...>
 *   npm run migrate -- clear
 *
 * Credentials and endpoints come from .env.local / .env (see lib/dataset-api/config.ts).
 */

import { promises as fs } from 'fs';
import { Command, Option } from 'commander';
import { config as loadEnv } from 'dotenv';
import { getMissingCredentials, loadMigrationConfig, type MigrationConfig } from '../lib/dataset-api/config';
import { errorMessage } from '../lib/dataset-api/errors';
import { DatasetHttpClient } from '../lib/dataset-api/http/client';
import type { EnvironmentRole } from '../lib/dataset-api/types';
import { DatasetMigrationPipeline } from '../lib/migration/pipeline';
import { formatBatchSummary, summarizeBatch } from '../lib/migration/reporter';
import { MigrationSession } from '../lib/migration/session';
import { StagingStore, renderForEditing } from '../lib/migration/staging-store';
import type { BatchResult, PipelineMode } from '../lib/migration/types';

loadEnv({ path: '.env.local' });
loadEnv();

type GlobalOptions = {
  mode?: PipelineMode;
};

interface Context {
  config: MigrationConfig;
  store: StagingStore;
  session: MigrationSession;
  pipeline: DatasetMigrationPipeline;
}

function createContext(options: GlobalOptions): Context {
  const config = loadMigrationConfig();
  const store = new StagingStore(config.stagingDir, config.codesFile);
  const session = new MigrationSession({
    sourceBaseUrl: config.source.baseUrl,
    destinationBaseUrl: config.destination.baseUrl,
    mode: options.mode ?? config.mode,
    rules: config.rules,
  });
  const pipeline = new DatasetMigrationPipeline(session, {
    client: new DatasetHttpClient({
      tokenHeader: config.tokenHeader,
      defaultTimeoutMs: config.timeouts.requestMs,
    }),
    store,
    timeouts: config.timeouts,
  });

  return { config, store, session, pipeline };
}

async function authenticateRole(context: Context, role: EnvironmentRole): Promise<void> {
  const missing = getMissingCredentials(role);
  if (missing.length > 0) {
    throw new Error(`Missing ${role} credentials: ${missing.join(', ')}`);
  }

  console.log(`Authenticating ${role}...`);
  await context.pipeline.authenticate(role, context.config[role].credentials);
  console.log(`✓ ${role} authenticated.`);
}

function reportBatch(result: BatchResult): void {
  console.log(formatBatchSummary(result));

  const summary = summarizeBatch(result);
  for (const line of summary.errorSample) {
    console.error(`  ✗ ${line}`);
  }
  if (summary.errorCount > summary.errorSample.length) {
    console.error(`  … ${summary.errorCount - summary.errorSample.length} more errors in the log`);
  }
}

/**
 * Run a command body; a failure of the command as a whole is printed and sets the exit code
 */
function run(body: (context: Context) => Promise<void>): () => Promise<void> {
  return async () => {
    try {
      await body(createContext(program.opts<GlobalOptions>()));
    } catch (error) {
      console.error(`✗ ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  };
}

const program = new Command('migrate-datasets')
  .description('Migrate datasets between two environments of the dataset API')
  .addOption(
    new Option('--mode <mode>', 'pipeline mode (defaults to DATASETS_MODE)').choices(['migration', 'standard'])
  );

program
  .command('auth')
  .description('Authenticate both environments and report the result')
  .action(
    run(async context => {
      const outcomes = await context.pipeline.authenticateBoth({
        source: context.config.source.credentials,
        destination: context.config.destination.credentials,
      });
      for (const role of ['source', 'destination'] as const) {
        const outcome = outcomes[role];
        console.log(outcome.ok ? `✓ ${role}: READY` : `✗ ${role}: ${outcome.error}`);
      }
    })
  );

program
  .command('list')
  .description('Pull dataset codes from the source and save the codes file')
  .action(
    run(async context => {
      await authenticateRole(context, 'source');
      const identifiers = await context.pipeline.pullIdentifiers();
      console.log(`Pulled ${identifiers.length} dataset codes.`);
      identifiers.forEach(identifier => console.log(`  ${identifier}`));
    })
  );

program
  .command('fetch [codes...]')
  .description('Fetch datasets from the source into staging (default: every code in the codes file)')
  .action((codes: string[]) =>
    run(async context => {
      const identifiers = codes.length > 0 ? codes : await context.store.loadCodes();
      if (identifiers.length === 0) {
        console.log('No dataset codes available. Run `list` first.');
        return;
      }
      await authenticateRole(context, 'source');
      reportBatch(await context.pipeline.fetchAll(identifiers));
    })()
  );

program
  .command('status')
  .description('Show listed codes and which have a local copy')
  .action(
    run(async context => {
      const codes = await context.store.loadCodes();
      const staged = new Set(await context.store.refresh());

      for (const code of codes) {
        console.log(`${code}  ${staged.has(code) ? 'Local copy available' : 'No local copy'}`);
      }
      for (const identifier of staged) {
        if (!codes.includes(identifier)) {
          console.log(`${identifier}  Local copy available (not in codes file)`);
        }
      }
      console.log(`Staging directory: ${context.config.stagingDir}`);
    })
  );

program
  .command('show <code>')
  .description('Print the local copy of a dataset, fetching it first when there is none')
  .action((code: string) =>
    run(async context => {
      if (!(await context.store.load(code))) {
        await authenticateRole(context, 'source');
      }
      console.log(renderForEditing(await context.pipeline.loadForEditing(code)));
    })()
  );

program
  .command('edit <code> <file>')
  .description('Replace the local copy of a dataset with the JSON in <file>')
  .action((code: string, file: string) =>
    run(async context => {
      const text = await fs.readFile(file, 'utf-8');
      await context.pipeline.saveEdit(code, text);
      console.log(`✓ Local edits saved for ${code}.`);
    })()
  );

program
  .command('transform <code>')
  .description('Apply transforms to a local copy (decode, then substitute, then encode)')
  .option('--decode', 'decode body/bodyMeta from base64 JSON')
  .option('--substitute', 'apply the configured find/replace rules')
  .option('--encode', 'encode body/bodyMeta as base64 JSON')
  .action((code: string, options: { decode?: boolean; substitute?: boolean; encode?: boolean }) =>
    run(async context => {
      await context.pipeline.applyTransforms(code, options);
      console.log(`✓ Transformed local copy of ${code}.`);
    })()
  );

program
  .command('upsert <codes...>')
  .description('Upsert the named datasets on the destination from their local copies')
  .action((codes: string[]) =>
    run(async context => {
      await authenticateRole(context, 'destination');
      reportBatch(await context.pipeline.upsertMany(codes));
    })()
  );

program
  .command('delete <codes...>')
  .description('Delete the named datasets on the destination')
  .action((codes: string[]) =>
    run(async context => {
      await authenticateRole(context, 'destination');
      reportBatch(await context.pipeline.deleteMany(codes));
    })()
  );

program
  .command('remove-local <code>')
  .description('Delete the local copy of one dataset')
  .action((code: string) =>
    run(async context => {
      const removed = await context.pipeline.removeLocalCopy(code);
      console.log(removed ? `✓ Deleted local copy of ${code}.` : `No local copy of ${code}.`);
    })()
  );

program
  .command('clear')
  .description('Clear all locally saved dataset files')
  .action(
    run(async context => {
      await context.pipeline.clearWorkspace();
      console.log('✓ Local saved files cleared.');
    })
  );

program.parseAsync(process.argv).catch(error => {
  console.error(`✗ ${errorMessage(error)}`);
  process.exitCode = 1;
});
