/**
 * CLI Input / Output
 *
 * Resolves the `[input]` argument of a command to a document:
 *   <path>     → file contents
 *   -, absent  → standard input
 *   <xml>      → the argument itself, when it looks like XML
 */

import * as fs from 'fs';
import * as path from 'path';
import { InputError } from '../core/errors';
import { isXml } from '../formats';

export interface ResolvedInput {
  /** Human-readable name of the source ('<stdin>', '<inline>' or a path) */
  label: string;
  content: Uint8Array;
}

export type StdinReader = () => Promise<Uint8Array>;

/**
 * Read a readable stream to completion.
 */
export async function readStream(stream: AsyncIterable<Uint8Array | string>): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export async function resolveInput(arg: string | undefined, readStdin: StdinReader): Promise<ResolvedInput> {
  if (arg === undefined || arg === '-') {
    return { label: '<stdin>', content: await readStdin() };
  }

  // If it looks like a file path, read it
  if (fs.existsSync(arg)) {
    if (!fs.statSync(arg).isFile()) {
      throw new InputError(`Not a file: ${arg}`);
    }
    return { label: arg, content: fs.readFileSync(arg) };
  }

  // Otherwise treat as inline data
  if (isXml(arg)) {
    return { label: '<inline>', content: Buffer.from(arg, 'utf-8') };
  }

  throw new InputError(`Input not found: ${arg}`);
}

/**
 * Write a document to a file, creating parent directories as needed.
 */
export function writeOutputFile(file: string, content: string): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  fs.writeFileSync(file, content, 'utf-8');
}
