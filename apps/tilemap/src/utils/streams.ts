import { ReadStream } from 'node:fs';
import type { Readable } from 'node:stream';
import { IOError, errorMessage } from '../errors';

/** Drains a stream as UTF-8 text and destroys it afterwards, whatever happened. */
export async function readText(input: Readable, source?: string): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of input) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    }
  } catch (error) {
    throw new IOError(`Failed to read stream (${errorMessage(error)})`, source, { cause: error });
  } finally {
    input.destroy();
  }
  return Buffer.concat(chunks).toString('utf8');
}

export const streamSource = (input: Readable): string | undefined =>
  input instanceof ReadStream && typeof input.path === 'string' ? input.path : undefined;
