import fs from 'fs/promises';
import { TextDecoder } from 'util';
import { HeaderReadError } from '../types';

// PAR exports are plain ASCII; stray bytes from hand edits are replaced rather than rejected
const decoder = new TextDecoder('utf-8', { fatal: false });

/**
 * Read the raw text of a PAR header
 */
export async function readHeaderFile(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new HeaderReadError(filePath, error);
  }

  if (buffer.includes(0)) {
    throw new HeaderReadError(filePath, 'file contains NUL bytes; is this the REC image instead of the PAR header?');
  }

  return decoder.decode(buffer);
}
