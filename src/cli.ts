#!/usr/bin/env node

import { Command } from 'commander';
import { VERSION } from './index';
import { boolFlag, charFlag, doubleFlag, intFlag, slot, strFlag, type FlagValue } from './flags/declarations';
import { parseFlags } from './flags/parseFlags';
import { printHelp } from './flags/renderHelp';
import { buildFlagTable, collectValues, loadFlagTableFile } from './table/flagTableFile';
import { stableStringify } from './util/deterministicJson';
import { errorMessage } from './util/errorMessage';
import { doubleToJson, formatFixed, nonFiniteName } from './util/formatDouble';

/**
 * Where the CLI writes. Tests pass collectors; the binary uses the process streams.
 */
export type CliIo = {
  write: (text: string) => void;
  error: (text: string) => void;
};

export const processIo: CliIo = {
  write: (text) => {
    process.stdout.write(text);
  },
  error: (text) => {
    process.stderr.write(text);
  },
};

export const EXIT_OK = 0;
export const EXIT_PARSE_FAILED = 1;
export const EXIT_USAGE = 2;

function lineSink(io: CliIo): (line: string) => void {
  return (line) => io.write(`${line}\n`);
}

/**
 * The example program: five flags with defaults, help on `-h`, values printed otherwise.
 * `args` excludes the program name.
 */
export function runDemo(args: string[], io: CliIo = processIo): number {
  const showHelp = slot(false);
  const outName = slot('out');
  const aChar = slot('A');
  const aNumber = slot(0);
  const aDouble = slot(123.123);

  const flags = [
    boolFlag(showHelp, { short: '-h', long: '--help', description: 'show help message' }),
    strFlag(outName, { short: '-o', long: '--output', description: 'set output file' }),
    charFlag(aChar, { short: '-c', long: '--char', description: 'give me a char!' }),
    intFlag(aNumber, { short: '-n', long: '--number', description: 'print this number' }),
    doubleFlag(aDouble, { short: '-d', long: '--double', description: 'print a double' }),
  ];

  const result = parseFlags(flags, ['example', ...args], { diagnostics: lineSink(io) });
  if (!result.ok) return EXIT_PARSE_FAILED;

  if (showHelp.value) {
    printHelp('example', 'A sample application to showcase the library', flags, io.write);
    return EXIT_OK;
  }

  io.write(`Output file: ${outName.value}\n`);
  io.write(`A char:      ${aChar.value}\n`);
  io.write(`A number:    ${aNumber.value}\n`);
  io.write(`A double:    ${formatFixed(aDouble.value, 6)}\n`);
  return EXIT_OK;
}

export type CheckOptions = {
  table: string;
  args: string[];
  json: boolean;
  verbose: boolean;
};

function formatValue(v: FlagValue): string {
  if (typeof v === 'string') return JSON.stringify(v);
  if (typeof v === 'number') return nonFiniteName(v) ?? String(v);
  return String(v);
}

function toJsonValues(values: Record<string, FlagValue>): Record<string, boolean | number | string> {
  const out: Record<string, boolean | number | string> = {};
  for (const [key, value] of Object.entries(values)) out[key] = typeof value === 'number' ? doubleToJson(value) : value;
  return out;
}

async function loadTableOrReport(file: string, io: CliIo) {
  try {
    return buildFlagTable(await loadFlagTableFile(file));
  } catch (e) {
    io.error(`${errorMessage(e)}\n`);
    return undefined;
  }
}

/**
 * Parse `args` against the flag table in `table` and print the resulting values.
 */
export async function runCheck(opts: CheckOptions, io: CliIo = processIo): Promise<number> {
  const table = await loadTableOrReport(opts.table, io);
  if (!table) return EXIT_USAGE;

  const result = parseFlags(table.flags, [table.name, ...opts.args], { diagnostics: lineSink(io) });
  if (!result.ok) return EXIT_PARSE_FAILED;

  const values = collectValues(table.flags);
  if (opts.json) {
    io.write(stableStringify(toJsonValues(values)));
  } else {
    for (const [key, value] of Object.entries(values)) io.write(`${key}: ${formatValue(value)}\n`);
  }

  if (opts.verbose) {
    io.error(`Parsed ${opts.args.length} argument(s) against ${table.flags.length} flag(s) from ${opts.table}\n`);
  }
  return EXIT_OK;
}

export async function runHelp(opts: { table: string }, io: CliIo = processIo): Promise<number> {
  const table = await loadTableOrReport(opts.table, io);
  if (!table) return EXIT_USAGE;
  printHelp(table.name, table.description, table.flags, io.write);
  return EXIT_OK;
}

async function main(argv: string[]): Promise<number> {
  const program = new Command();
  let exitCode = EXIT_OK;

  program
    .name('flagtable')
    .description('Declarative command-line flag parsing: demo program and flag table utilities')
    .version(VERSION)
    .enablePositionalOptions();

  program
    .command('demo')
    .description('Run the example program (-h, -o, -c, -n, -d)')
    .argument('[args...]', 'Flags passed to the example program')
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions()
    .action((args: string[]) => {
      exitCode = runDemo(args);
    });

  program
    .command('check')
    .description('Parse arguments against a flag table file and print the values (put them after --)')
    .requiredOption('--table <file>', 'Flag table JSON file')
    .option('--json', 'Print values as JSON', false)
    .option('-v, --verbose', 'Verbose logging', false)
    .argument('[args...]', 'Arguments to parse')
    .allowUnknownOption()
    .passThroughOptions()
    .action(async (args: string[], raw: { table: string; json: boolean; verbose: boolean }) => {
      exitCode = await runCheck({ table: raw.table, args, json: raw.json, verbose: raw.verbose });
    });

  program
    .command('help-table')
    .description('Print the help text of a flag table file')
    .requiredOption('--table <file>', 'Flag table JSON file')
    .action(async (raw: { table: string }) => {
      exitCode = await runHelp({ table: raw.table });
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(errorMessage(e));
    return EXIT_USAGE;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = EXIT_USAGE;
    });
}
