/**
 * Command handlers behind the CLI.
 *
 * Each handler resolves its input, does its work and returns the process exit
 * code. Output goes through a CommandIo so handlers run the same way under
 * the CLI and under test.
 */

import { XmlPrettifier } from './prettifier';
import { formatDiagnostic } from './core/reporter';
import { ReportFormat } from './core/types';
import { decodeInput } from './formats';
import { ResolvedInput, StdinReader, resolveInput, writeOutputFile } from './io/file-io';

export interface CommandIo {
  /** Write a line to standard output */
  log(text: string): void;

  /** Write a line to standard error */
  error(text: string): void;

  readStdin: StdinReader;
}

export interface FormatCommandOptions {
  output?: string;
  indent?: number;
  validate?: boolean;
  errorFormat?: ReportFormat;
}

export interface CheckCommandOptions {
  indent?: number;
  format?: ReportFormat;
}

export interface TokensCommandOptions {
  errorFormat?: ReportFormat;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function reportFailure(
  io: CommandIo,
  error: unknown,
  format: ReportFormat,
  resolved: ResolvedInput | undefined
): number {
  const source = resolved ? decodeInput(resolved.content) : undefined;
  io.error(formatDiagnostic(error, format, source));
  return 1;
}

// ─── format ─────────────────────────────────────────────────────────────────

export async function runFormat(
  input: string | undefined,
  opts: FormatCommandOptions,
  io: CommandIo
): Promise<number> {
  let resolved: ResolvedInput | undefined;

  try {
    const prettifier = new XmlPrettifier({ indentWidth: opts.indent, validate: opts.validate });
    resolved = await resolveInput(input, io.readStdin);
    const formatted = prettifier.format(resolved.content);

    if (opts.output) {
      writeOutputFile(opts.output, `${formatted}\n`);
      io.log(`📄 Formatted ${resolved.label} written to ${opts.output}`);
    } else {
      io.log(formatted);
    }
    return 0;
  } catch (error) {
    return reportFailure(io, error, opts.errorFormat ?? 'console', resolved);
  }
}

// ─── check ──────────────────────────────────────────────────────────────────

export async function runCheck(
  input: string | undefined,
  opts: CheckCommandOptions,
  io: CommandIo
): Promise<number> {
  const format = opts.format ?? 'console';
  let resolved: ResolvedInput | undefined;

  try {
    const prettifier = new XmlPrettifier({ indentWidth: opts.indent });
    resolved = await resolveInput(input, io.readStdin);
    const result = prettifier.check(resolved.content);

    io.log(prettifier.summarize(result, resolved.label, format));
    return result.canonical ? 0 : 1;
  } catch (error) {
    return reportFailure(io, error, format, resolved);
  }
}

// ─── tokens ─────────────────────────────────────────────────────────────────

export async function runTokens(
  input: string | undefined,
  opts: TokensCommandOptions,
  io: CommandIo
): Promise<number> {
  let resolved: ResolvedInput | undefined;

  try {
    resolved = await resolveInput(input, io.readStdin);
    const tokens = new XmlPrettifier().tokens(resolved.content);

    for (const token of tokens) {
      io.log(JSON.stringify(token));
    }
    return 0;
  } catch (error) {
    return reportFailure(io, error, opts.errorFormat ?? 'console', resolved);
  }
}
