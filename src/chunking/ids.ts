import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

const ID_TEXT_PREFIX = 50;
const ID_LENGTH = 16;

export function md5Hex(data: string | Uint8Array): string {
  return createHash('md5').update(data).digest('hex');
}

/**
 * Stable record id: derived from the file name, the chunk position and the
 * first characters of the chunk, so re-chunking identical content yields
 * identical ids.
 */
export function generateChunkId(filename: string, chunkIndex: number, text: string): string {
  const prefix = Array.from(text).slice(0, ID_TEXT_PREFIX).join('');
  return md5Hex(`${filename}_${chunkIndex}_${prefix}`).slice(0, ID_LENGTH);
}

export async function computeFileHash(path: string): Promise<string> {
  return md5Hex(await readFile(path));
}
