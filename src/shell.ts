import readline from 'readline';
import { type ShellContext, executeLine, findCommand } from './commands.js';
import { log } from './logging.js';
import type { PlanSession } from './types.js';

/** One input stream read line by line, shared by every shell that runs on it. */
export interface LineReader {
  lines: AsyncIterator<string>;
  close(): void;
}

export function createLineReader(input: NodeJS.ReadableStream): LineReader {
  const rl = readline.createInterface({ input, terminal: false });
  return { lines: rl[Symbol.asyncIterator](), close: () => rl.close() };
}

export interface ShellIO {
  reader: LineReader;
  output: NodeJS.WritableStream;
}

export interface ShellOutcome {
  session: PlanSession;
  committed: boolean;
}

export async function runShell(session: PlanSession, io: ShellIO): Promise<ShellOutcome> {
  const ctx: ShellContext = {
    session,
    print: line => { io.output.write(`${line}\n`); },
  };
  const prompt = () => { io.output.write(`${ctx.session.basePath} > `); };

  ctx.print(`Editing directory '${ctx.session.basePath}'. Type 'help' or '?' for help.`);
  log('info', `shell started in ${ctx.session.basePath}`);
  prompt();

  // Pulled by hand: a for-await break would return() the iterator and close the reader
  // for the next directory.
  for (;;) {
    const next = await io.reader.lines.next();
    if (next.done) break;
    if (executeLine(ctx, next.value) === 'exit') {
      return { session: ctx.session, committed: ctx.committed === true };
    }
    prompt();
  }

  // End of input behaves like `quit`.
  findCommand('EOF')?.run(ctx, '');
  return { session: ctx.session, committed: ctx.committed === true };
}
