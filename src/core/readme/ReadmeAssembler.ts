// src/core/readme/ReadmeAssembler.ts

import { z } from 'zod';

/**
 * One record of the file-content endpoint. A record that is not an object,
 * or whose `text` is not a string, reads as an empty line.
 */
export const ReadmeLineSchema = z
  .object({
    text: z.string().optional().catch(undefined),
  })
  .catch({});

export type ReadmeLine = z.infer<typeof ReadmeLineSchema>;

/** README content is small; one or two pages of this size cover most files */
export const README_PAGE_SIZE = 500;
export const README_DATA_KEY = 'lines';

export function parseReadmeLines(records: readonly unknown[]): ReadmeLine[] {
  return records.map((record) => ReadmeLineSchema.parse(record));
}

/**
 * Join line records into a single text blob, one newline after every line
 * (including the last).
 */
export function assembleReadme(lines: readonly ReadmeLine[]): string {
  let text = '';
  for (const line of lines) {
    text += `${line.text ?? ''}\n`;
  }
  return text;
}
