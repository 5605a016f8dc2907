import fs from 'node:fs';
import readline from 'node:readline';
import type { Readable } from 'node:stream';

/** Raw per-window score payloads, in window order. Values are validated by the gating engine. */
export type ScoreSource = AsyncIterable<unknown> | Iterable<unknown>;

/**
 * Reads one JSON document per line. Lines that are not valid JSON are yielded
 * as their raw text so the engine can reject them as malformed windows.
 */
export async function* readJsonLines(input: Readable): AsyncGenerator<unknown> {
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }
      let value: unknown;
      try {
        value = JSON.parse(trimmed);
      } catch {
        value = trimmed;
      }
      yield value;
    }
  } finally {
    lines.close();
  }
}

/** `-` or no path reads the given stdin stream. */
export function openScoreInput(inputPath: string | null, stdin: Readable): Readable {
  if (!inputPath || inputPath === '-') {
    return stdin;
  }
  return fs.createReadStream(inputPath, { encoding: 'utf-8' });
}
