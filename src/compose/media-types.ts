/**
 * Media type lookup by file extension
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';

export const DEFAULT_MEDIA_TYPE = 'application/octet-stream';

// data/ sits two levels above both src/compose and dist/compose
const TABLE_URL = new URL('../../data/media-types.json', import.meta.url);

let table: Map<string, string> | undefined;

function loadTable(): Map<string, string> {
  const parsed: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf-8'));
  const entries = new Map<string, string>();
  if (parsed !== null && typeof parsed === 'object') {
    for (const [ext, type] of Object.entries(parsed)) {
      if (typeof type === 'string') entries.set(ext, type);
    }
  }
  return entries;
}

/**
 * Guesses a media type from a file name's extension
 *
 * @param filePath - File name or path
 * @returns The media type, or application/octet-stream when unknown
 */
export function guessMediaType(filePath: string): string {
  table ??= loadTable();
  const ext = extname(filePath).slice(1).toLowerCase();
  return table.get(ext) ?? DEFAULT_MEDIA_TYPE;
}
