#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs/promises';
import path from 'node:path';

import { BundleKeeperError, getLogger, loadConfig, setLogLevel, type BundleKeeperConfig, type LogLevel } from '@bundlekeeper/core';
import { exportUploadArchive } from './lib/export.js';
import { embedTable, exportTable, identityTable, mergeTable, reconcileTable, stageTable } from './lib/format.js';
import { runEmbed, runInspect, runMerge, runReconcile, runStage, UsageError, type CommandResult } from './lib/project.js';

interface OutputArgs {
  format?: string;
  out?: string;
}

interface ProjectArgs {
  root?: string;
  config?: string;
}

async function writeOutput(args: OutputArgs, content: string): Promise<void> {
  if (args.out) {
    await fs.mkdir(path.dirname(path.resolve(args.out)), { recursive: true });
    await fs.writeFile(args.out, content, 'utf8');
    return;
  }
  process.stdout.write(content);
}

async function emit<T>(args: OutputArgs, result: CommandResult<T>, toTable: (report: T) => string[]): Promise<void> {
  const content = args.format === 'table' ? `${toTable(result.report).join('\n')}\n` : `${JSON.stringify(result.report, null, 2)}\n`;
  await writeOutput(args, content);
  process.exitCode = result.exitCode;
}

async function projectConfig(args: ProjectArgs): Promise<BundleKeeperConfig> {
  return loadConfig(args.root ?? process.cwd(), args.config);
}

/** Engine and usage errors end the command with a one-line message instead of a stack. */
async function guarded(run: () => Promise<void>): Promise<void> {
  try {
    await run();
  } catch (err) {
    if (err instanceof BundleKeeperError) {
      process.stderr.write(`error: [${err.code}] ${err.message}\n`);
      process.exitCode = 1;
      return;
    }
    if (err instanceof UsageError || err instanceof RangeError) {
      process.stderr.write(`error: ${err.message}\n`);
      process.exitCode = 2;
      return;
    }
    throw err;
  }
}

export async function main(argv = process.argv): Promise<number> {
  // `process.exitCode` persists across multiple `main()` calls in the same process (tests).
  process.exitCode = 0;

  const parser = yargs(hideBin(argv))
    .scriptName('bundlekeeper')
    .strict()
    .help()
    // Shared options (accepted by all commands).
    .option('root', {
      type: 'string',
      describe: 'Project root (defaults to cwd)'
    })
    .option('config', {
      type: 'string',
      describe: 'Path to bundlekeeper.yaml, relative to the root'
    })
    .option('format', {
      choices: ['json', 'table'] as const,
      default: 'json',
      describe: 'Output format'
    })
    .option('out', {
      type: 'string',
      describe: 'Write output to this file (default: stdout)'
    })
    .option('log-level', {
      choices: ['error', 'warn', 'info', 'debug'] as const,
      describe: 'Log level (default: BUNDLEKEEPER_LOG_LEVEL or info)'
    })
    .middleware((args) => {
      const level: LogLevel | undefined = args.logLevel;
      if (level) setLogLevel(level);
    })
    .command(
      'stage [targets..]',
      'Stage built bundles under their canonical names and write the descriptions file',
      (cmd) =>
        cmd.positional('targets', {
          type: 'string',
          array: true,
          describe: 'Build targets (defaults to the configured platforms)'
        }),
      async (args) =>
        guarded(async () => {
          const config = await projectConfig(args);
          await emit(args, await runStage(config, args.targets ?? []), stageTable);
        })
    )
    .command(
      'merge [targets..]',
      'Merge per-platform build manifests into bundle descriptions',
      (cmd) =>
        cmd.positional('targets', {
          type: 'string',
          array: true,
          describe: 'Build targets (defaults to the configured platforms)'
        }),
      async (args) =>
        guarded(async () => {
          const config = await projectConfig(args);
          await emit(args, await runMerge(config, args.targets ?? []), mergeTable);
        })
    )
    .command(
      'reconcile',
      'Check which staged bundles are missing remotely and copy them to the upload area',
      (cmd) =>
        cmd
          .option('base-url', {
            type: 'string',
            describe: 'Public URL bundles are published under (overrides remote.base_url)'
          })
          .option('concurrency', {
            type: 'number',
            describe: 'Maximum existence checks in flight'
          })
          .option('max-retries', {
            type: 'number',
            describe: 'Retries for a check that could not determine existence'
          })
          .option('retry-delay-ms', {
            type: 'number',
            describe: 'Delay before each retry'
          }),
      async (args) =>
        guarded(async () => {
          const config = await projectConfig(args);
          const logger = getLogger('cli');
          const controller = new AbortController();
          const onSigint = (): void => {
            logger.warn('Interrupted; cancelling outstanding checks');
            controller.abort();
          };
          process.once('SIGINT', onSigint);
          try {
            const result = await runReconcile(config, {
              baseUrl: args.baseUrl,
              concurrency: args.concurrency,
              maxRetries: args.maxRetries,
              retryDelayMs: args.retryDelayMs,
              signal: controller.signal,
              onProgress: (p) => logger.debug(`${p.file.fileName}: ${p.outcome}`, { settled: p.settled, total: p.total })
            });
            await emit(args, result, reconcileTable);
          } finally {
            process.removeListener('SIGINT', onSigint);
          }
        })
    )
    .command(
      'embed <target> [names..]',
      'Copy bundles for one platform into the embedded directory',
      (cmd) =>
        cmd
          .positional('target', {
            type: 'string',
            demandOption: true,
            describe: 'Build target whose bundles are embedded'
          })
          .positional('names', {
            type: 'string',
            array: true,
            describe: 'Bundle names (defaults to the configured embedded list)'
          }),
      async (args) =>
        guarded(async () => {
          const config = await projectConfig(args);
          await emit(args, await runEmbed(config, args.target, args.names ?? []), embedTable);
        })
    )
    .command(
      'inspect <file>',
      'Parse a staged bundle file name into name, platform and hash',
      (cmd) =>
        cmd.positional('file', {
          type: 'string',
          demandOption: true,
          describe: 'Staged file name or path'
        }),
      async (args) =>
        guarded(async () => {
          const config = await projectConfig(args);
          await emit(args, runInspect(config, args.file), identityTable);
        })
    )
    .command(
      'export <zip>',
      'Write the upload area to a zip archive',
      (cmd) =>
        cmd.positional('zip', {
          type: 'string',
          demandOption: true,
          describe: 'Archive path to write'
        }),
      async (args) =>
        guarded(async () => {
          const config = await projectConfig(args);
          const report = await exportUploadArchive(config.uploadDir, path.resolve(args.zip));
          await emit(args, { report, exitCode: report.validated ? 0 : 1 }, exportTable);
        })
    )
    .demandCommand(1, 'Provide a command');

  await parser.parse();
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    return process.argv[1] === thisFile;
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
