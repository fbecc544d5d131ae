#!/usr/bin/env node

/**
 * xml-reindent CLI
 *
 * Commands:
 *   format  - Reformat a document into canonical indented form
 *   check   - Exit non-zero when a document is not already formatted
 *   tokens  - Print the token stream of a document, one JSON object per line
 *
 * Input is a file path, `-` / nothing for stdin, or inline XML.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import {
  CheckCommandOptions,
  CommandIo,
  FormatCommandOptions,
  TokensCommandOptions,
  runCheck,
  runFormat,
  runTokens,
} from './commands';
import { MAX_INDENT_WIDTH } from './core/formatter';
import { readStream } from './io/file-io';

const program = new Command();

program
  .name('xml-reindent')
  .description('Reformat XML into one construct per line, indented by nesting depth.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

const io: CommandIo = {
  log: (text) => process.stdout.write(`${text}\n`),
  error: (text) => process.stderr.write(`${text}\n`),
  readStdin: () => readStream(process.stdin),
};

function parseIndent(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > MAX_INDENT_WIDTH) {
    throw new InvalidArgumentError(`Expected an integer between 0 and ${MAX_INDENT_WIDTH}.`);
  }
  return n;
}

function reportFormatOption(flags: string, description: string): Option {
  return new Option(flags, description).choices(['console', 'json']).default('console');
}

const INPUT_DESCRIPTION = 'File path, inline XML, or - for stdin (default: stdin)';

// ─── format Command ─────────────────────────────────────────────────────────

program
  .command('format')
  .description('Reformat a document into canonical indented form')
  .argument('[input]', INPUT_DESCRIPTION)
  .option('-o, --output <file>', 'Write the result to a file instead of stdout')
  .option('-i, --indent <n>', 'Spaces per nesting level', parseIndent, 2)
  .option('--validate', 'Check well-formedness with a full XML validator first')
  .addOption(reportFormatOption('--error-format <format>', 'Diagnostic format: console, json'))
  .action(async (input: string | undefined, opts: FormatCommandOptions) => {
    process.exitCode = await runFormat(input, opts, io);
  });

// ─── check Command ──────────────────────────────────────────────────────────

program
  .command('check')
  .description('Exit with code 1 when a document is not already formatted')
  .argument('[input]', INPUT_DESCRIPTION)
  .option('-i, --indent <n>', 'Spaces per nesting level', parseIndent, 2)
  .addOption(reportFormatOption('-f, --format <format>', 'Report format: console, json'))
  .action(async (input: string | undefined, opts: CheckCommandOptions) => {
    process.exitCode = await runCheck(input, opts, io);
  });

// ─── tokens Command ─────────────────────────────────────────────────────────

program
  .command('tokens')
  .description('Print the token stream, one JSON object per line')
  .argument('[input]', INPUT_DESCRIPTION)
  .addOption(reportFormatOption('--error-format <format>', 'Diagnostic format: console, json'))
  .action(async (input: string | undefined, opts: TokensCommandOptions) => {
    process.exitCode = await runTokens(input, opts, io);
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parseAsync().catch((error: unknown) => {
  console.error(`❌ Error: ${error instanceof Error ? error.message : error}`);
  process.exit(1);
});
