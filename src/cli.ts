#!/usr/bin/env node
import { Command } from 'commander';
import { type Settings, loadSettings } from './config.js';
import { PlanError, describeError } from './errors.js';
import { isThresholdLevel, log, setLogLevel } from './logging.js';
import { openSession } from './session.js';
import { type LineReader, createLineReader, runShell } from './shell.js';
import type { PlanSession } from './types.js';

interface CliOptions {
  preserveConforming?: boolean;
  logLevel?: string;
}

async function editDirectory(p: string, settings: Settings, opts: CliOptions, reader: LineReader) {
  let session: PlanSession;
  try {
    session = openSession(p, {
      numberPattern: settings.numberPattern,
      preserveConforming: opts.preserveConforming ?? settings.preserveConforming,
    });
  } catch (e) {
    if (!(e instanceof PlanError)) throw e;
    process.stderr.write(`ERROR: ${e.message}\n`);
    process.exitCode = 1;
    return;
  }
  await runShell(session, { reader, output: process.stdout });
}

async function editDirectories(paths: string[], opts: CliOptions) {
  const settings = loadSettings();
  const level = opts.logLevel ?? settings.logLevel;
  if (level !== undefined) {
    if (!isThresholdLevel(level)) throw new Error(`Unknown log level '${level}'`);
    setLogLevel(level);
  }

  const reader = createLineReader(process.stdin);
  try {
    for (const p of paths) await editDirectory(p, settings, opts, reader);
  } finally {
    reader.close();
  }
}

const program = new Command()
  .name('folio')
  .description('Interactively plan and commit page and chapter renames in a directory.')
  .argument('<paths...>', 'directories to edit, one after another')
  .option('--preserve-conforming', 'keep names that already follow the "<series> v000 c000 p000" convention')
  .option('--log-level <level>', 'debug, info, warn, error or silent')
  .action(editDirectories);

program.parseAsync(process.argv).catch(err => {
  log('error', describeError(err));
  process.exitCode = 1;
});
