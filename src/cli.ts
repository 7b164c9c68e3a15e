#!/usr/bin/env node
import * as fs from 'fs';
import { MorkLexer, describeToken } from './lexer';
import { MorkParser } from './parser';
import { MorkTables } from './types';
import { toObject } from './values';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

type Mode = 'tables' | 'tokens' | 'json';

const USAGE = 'Usage: mork-dump [--tokens | --json] <file.mork>...';

const byKey = <T>(entries: Iterable<[string, T]>): Array<[string, T]> =>
  Array.from(entries).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

export const formatTables = (tables: MorkTables): string[] => {
  const lines: string[] = [];
  for (const [key, table] of byKey(tables)) {
    lines.push(`----- ${key} -----`);
    for (const [rowId, row] of byKey(table.rows)) {
      lines.push(`  row ${rowId}:`);
      for (const [name, value] of byKey(row)) {
        lines.push(`    ${name}: '${value}'`);
      }
    }
  }
  return lines;
};

const dumpTokens = (filePath: string, out: CliOutput): boolean => {
  const lexer = MorkLexer.fromContent(fs.readFileSync(filePath), filePath);
  for (const token of lexer.tokenize()) {
    if (token.kind === 'error') {
      out.error(`ERROR: ${filePath}:${describeToken(token)}`);
      return false;
    }
    out.log(describeToken(token));
  }
  return true;
};

const dumpFile = (filePath: string, mode: Mode, out: CliOutput): boolean => {
  if (mode === 'tokens') {
    return dumpTokens(filePath, out);
  }
  const { tables, error } = MorkParser.parseFile(filePath);
  if (error) {
    out.error(`ERROR: ${error.message}`);
    return false;
  }
  if (mode === 'json') {
    out.log(JSON.stringify(toObject(tables), null, 2));
  } else {
    formatTables(tables).forEach((line) => out.log(line));
  }
  return true;
};

/** Returns the process exit code. */
export const runCli = (args: string[], out: CliOutput = consoleOutput): number => {
  let mode: Mode = 'tables';
  const files: string[] = [];
  for (const arg of args) {
    if (arg === '--tokens') {
      mode = 'tokens';
    } else if (arg === '--json') {
      mode = 'json';
    } else if (arg === '--help' || arg === '-h') {
      out.log(USAGE);
      return 0;
    } else if (arg.startsWith('--')) {
      out.error(`Unknown option ${arg}`);
      out.error(USAGE);
      return 2;
    } else {
      files.push(arg);
    }
  }

  if (files.length === 0) {
    out.error(USAGE);
    return 2;
  }

  let failed = false;
  for (const filePath of files) {
    try {
      if (!dumpFile(filePath, mode, out)) {
        failed = true;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      out.error(`ERROR: ${filePath}: ${message}`);
      failed = true;
    }
  }
  return failed ? 1 : 0;
};

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
