import path from 'path';
import { PlanError } from './errors.js';
import { formatHelp, formatListing } from './listing.js';
import { getLogs, log } from './logging.js';
import {
  bulk,
  changeDirectory,
  commitSession,
  deleteEntry,
  editEntry,
  ignoreEntry,
  parseIndexArgument,
  reload,
  setClassification,
} from './session.js';
import type { PlanSession } from './types.js';

export interface ShellContext {
  session: PlanSession;
  print: (line: string) => void;
  /** Set once `write` has run */
  committed?: boolean;
}

export type CommandResult = 'continue' | 'exit';

export interface CommandDefinition {
  name: string;
  aliases: readonly string[];
  summary: readonly string[];
  run: (ctx: ShellContext, args: string) => CommandResult;
}

type CommandSpec = Omit<CommandDefinition, 'aliases'> & { short?: readonly string[] };

function defineCommand(spec: CommandSpec): CommandDefinition {
  const { short = [], ...rest } = spec;
  const names = [spec.name, ...short];
  const aliases = [...new Set(names.flatMap(n => [n, n.toUpperCase()]))];
  return { ...rest, aliases };
}

export const COMMANDS: readonly CommandDefinition[] = [
  defineCommand({
    name: 'bulk',
    short: ['b'],
    summary: [
      'Take a pattern and rebuild the renames for all entries.',
      'The pattern must capture the page number in exactly one group.',
      'The last match in each name is used; entries without one get the next counter value.',
      'Discards edits, ignores and deletions.',
    ],
    run(ctx, args) {
      ctx.session = bulk(ctx.session, args);
      ctx.print(`Rebuilt ${ctx.session.entries.length} entries with pattern '${args.trim()}'.`);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'cd',
    summary: ['Change the current directory (a path, or the index of a listed directory).'],
    run(ctx, args) {
      ctx.session = changeDirectory(ctx.session, args);
      ctx.print(`Editing directory '${ctx.session.basePath}'.`);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'edit',
    short: ['e'],
    summary: ['Edit a single rename entry: edit <index> <new name>.'],
    run(ctx, args) {
      const { index, rest } = parseIndexArgument(ctx.session, args);
      const previous = ctx.session.entries[index].proposed;
      ctx.session = editEntry(ctx.session, index, rest);
      ctx.print(`Editing rename index ${index}: '${previous}' -> '${ctx.session.entries[index].proposed}'.`);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'help',
    short: ['h', '?'],
    summary: ['Display this summary.'],
    run(ctx) {
      for (const line of formatHelp(COMMANDS)) ctx.print(line);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'ignore',
    short: ['i'],
    summary: ['Ignore a single entry (leave it untouched on write).'],
    run(ctx, args) {
      const { index } = parseIndexArgument(ctx.session, args);
      ctx.session = ignoreEntry(ctx.session, index);
      ctx.print(`Ignoring index ${index}.`);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'logs',
    summary: ['Show recent log entries: logs [count].'],
    run(ctx, args) {
      const count = Number.parseInt(args.trim() || '20', 10);
      if (!Number.isInteger(count) || count <= 0) throw new PlanError('InvalidArgument', `Invalid count '${args.trim()}'.`);
      for (const e of getLogs().slice(-count)) ctx.print(`${new Date(e.time).toISOString()} ${e.level.toUpperCase()} ${e.msg}`);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'ls',
    short: ['l', 'p', 'print'],
    summary: ['List the entries in the current directory.'],
    run(ctx) {
      for (const line of formatListing(ctx.session)) ctx.print(line);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'quit',
    short: ['q', 'exit', 'EOF'],
    summary: ['Quit without writing any renames.'],
    run(ctx) {
      ctx.print('Quitting without writing renames.');
      return 'exit';
    },
  }),
  defineCommand({
    name: 'reload',
    summary: ['Reload this directory from disk.'],
    run(ctx) {
      ctx.session = reload(ctx.session);
      ctx.print('Directory reloaded.');
      return 'continue';
    },
  }),
  defineCommand({
    name: 'rm',
    short: ['d', 'delete'],
    summary: ['Mark a single entry for deletion from disk.'],
    run(ctx, args) {
      const { index } = parseIndexArgument(ctx.session, args);
      ctx.session = deleteEntry(ctx.session, index);
      const target = path.join(ctx.session.basePath, ctx.session.entries[index].original);
      ctx.print(`Index ${index} (${target}) marked for delete.`);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'type',
    short: ['t'],
    summary: ['Set the type for this directory: (n)one, (s)eries, or (c)hapter.'],
    run(ctx, args) {
      ctx.session = setClassification(ctx.session, args);
      ctx.print(`Setting directory type to ${ctx.session.classification}.`);
      return 'continue';
    },
  }),
  defineCommand({
    name: 'write',
    short: ['w'],
    summary: ['Write all the renames to disk and quit.'],
    run(ctx) {
      const report = commitSession(ctx.session);
      ctx.committed = true;
      for (const f of report.failures) ctx.print(`ERROR: Index ${f.index} ('${f.original}'): ${f.error.message}`);
      if (report.failures.length) ctx.print(`Renames committed to disk with ${report.failures.length} failure(s).`);
      else ctx.print('Renames committed to disk.');
      return 'exit';
    },
  }),
];

export function buildDispatchTable(commands: readonly CommandDefinition[]) {
  const table = new Map<string, CommandDefinition>();
  for (const c of commands) {
    for (const alias of c.aliases) {
      const taken = table.get(alias);
      if (taken) throw new Error(`Alias '${alias}' of '${c.name}' is already used by '${taken.name}'`);
      table.set(alias, c);
    }
  }
  return table;
}

const DISPATCH = buildDispatchTable(COMMANDS);

export function findCommand(word: string) {
  return DISPATCH.get(word);
}

/**
 * Run one input line against the context. Operator errors are printed and leave
 * `ctx.session` as it was.
 */
export function executeLine(ctx: ShellContext, line: string): CommandResult {
  const text = line.trim();
  if (!text) return 'continue';
  const m = /^(\S+)\s*([\s\S]*)$/.exec(text);
  const word = m ? m[1] : text;
  const args = m ? m[2] : '';
  const command = findCommand(word);
  if (!command) {
    ctx.print(`*** Unknown command: ${word}`);
    return 'continue';
  }
  try {
    return command.run(ctx, args);
  } catch (e) {
    if (!(e instanceof PlanError)) throw e;
    log('warn', `${command.name}: ${e.kind}: ${e.message}`);
    ctx.print(`ERROR: ${e.message}`);
    return 'continue';
  }
}
