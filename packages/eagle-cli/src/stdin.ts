/**
 * Reading item ids from standard input.
 *
 * Accepts either a JSON array of strings or one id per line / per NUL-delimited
 * record, so output of `--output id` and `--print0` pipes straight back in.
 */

import { z } from 'zod';
import { UsageError } from './errors.js';

const idArraySchema = z.array(z.string());

export function parseIdsInput(raw: string): string[] {
  const text = raw.trim();
  if (text === '') return [];

  if (text.startsWith('[')) {
    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (err) {
      throw new UsageError(
        `stdin looks like JSON but could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    const ids = idArraySchema.safeParse(decoded);
    if (!ids.success) {
      throw new UsageError('stdin JSON must be an array of id strings');
    }
    return ids.data;
  }

  return text
    .split(/[\n\0]/)
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

/**
 * Read the whole stream and parse ids from it.
 */
export async function readIdsFromStdin(
  stream: AsyncIterable<string | Buffer> = process.stdin,
): Promise<string[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return parseIdsInput(Buffer.concat(chunks).toString('utf8'));
}
