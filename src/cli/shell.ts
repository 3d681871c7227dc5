#!/usr/bin/env node
/**
 * Interactive query shell
 *
 * Usage:
 *   ndsql [--data-dir <dir>] [--log-level <level>]
 *
 * Reads one SELECT statement per line and prints the matching rows as a
 * table. With stdin piped in, every line is run in order without prompting.
 */

import * as readline from 'readline';
import { runQuery } from '../session';
import { renderTable, formatSummary } from '../format/table';
import { stripInput } from '../grammar';
import { parseArgs, USAGE } from '../config';
import { InvalidInputError, getErrorMessage } from '../errors';
import { getLogger, setLogLevel } from '../util/logger';

const logger = getLogger('shell');

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

export interface ShellOptions {
  input?: NodeJS.ReadableStream,
  output?: NodeJS.WritableStream,
  errorOutput?: NodeJS.WritableStream,
  dataDir?: string,
  interactive?: boolean,
  prompt?: string,
}

export class QueryShell {
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;
  private errorOutput: NodeJS.WritableStream;
  private dataDir: string | undefined;
  private interactive: boolean;
  private promptText: string;
  readonly history: string[] = [];
  private closed = false;
  // The statement still running when the prompt loop is closed.
  private pending: Promise<void> = Promise.resolve();

  constructor(options: ShellOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.errorOutput = options.errorOutput ?? process.stderr;
    this.dataDir = options.dataDir;
    this.interactive = options.interactive ?? false;
    this.promptText = options.prompt ?? (this.interactive
      ? `${colors.cyan}${colors.bold}ndsql>${colors.reset} `
      : 'ndsql> ');
  }

  private color(code: string, text: string): string {
    return this.interactive ? `${code}${text}${colors.reset}` : text;
  }

  /**
   * Runs one line of input. Resolves to false once the user asked to leave;
   * query failures are reported and never reject.
   */
  async execute(line: string): Promise<boolean> {
    let command = stripInput(line);
    if (command === '') return true;
    this.history.push(line.trim());
    let keyword = command.toLowerCase();
    if (keyword === 'exit' || keyword === 'quit') return false;

    try {
      let result = await runQuery(command, { baseDir: this.dataDir });
      if (result == null) return true;
      let table = renderTable(result.header, result.rows);
      if (table !== '') this.output.write(table + '\n');
      this.output.write(
        formatSummary(result.rows.length, result.elapsedMs) + '\n');
    } catch (error) {
      if (!(error instanceof InvalidInputError)) {
        logger.error('Query failed:', error);
      }
      this.errorOutput.write(
        this.color(colors.red, `Error: ${getErrorMessage(error)}`) + '\n');
    }
    return true;
  }

  private prompt(rl: readline.Interface): void {
    rl.question(this.promptText, answer => {
      this.pending = this.execute(answer).then(keepGoing => {
        if (this.closed) return;
        if (keepGoing) this.prompt(rl);
        else rl.close();
      }).catch((error: unknown) => {
        logger.error(error);
        if (!this.closed) rl.close();
      });
    });
  }

  async run(): Promise<void> {
    let rl = readline.createInterface({
      input: this.input,
      output: this.interactive ? this.output : undefined,
      terminal: this.interactive && this.input === process.stdin,
    });
    this.closed = false;
    let closed = new Promise<void>(resolve => rl.on('close', () => {
      this.closed = true;
      resolve();
    }));

    if (this.interactive) {
      this.output.write(`Type a SELECT statement, or ${
        this.color(colors.bold, 'exit')} to quit.\n`);
      rl.on('SIGINT', () => rl.close());
      this.prompt(rl);
      await closed;
      await this.pending;
      this.output.write('\n');
      return;
    }

    // Non-interactive: read every line, then run them in order.
    let lines: string[] = [];
    rl.on('line', line => {
      lines.push(line);
    });
    await closed;
    for (let line of lines) {
      if (!await this.execute(line)) break;
    }
  }
}

async function main(): Promise<void> {
  let config = parseArgs(process.argv.slice(2), process.env);
  if (config.help) {
    process.stdout.write(USAGE);
    return;
  }
  setLogLevel(config.logLevel);
  let shell = new QueryShell({
    dataDir: config.dataDir,
    interactive: process.stdin.isTTY === true,
  });
  await shell.run();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    process.exitCode = 1;
  });
}
