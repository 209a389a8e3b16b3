/**
 * Picks a uniformly random line from a file in a single pass.
 *
 * The file is read in fixed-size chunks; only the line being assembled and
 * the currently selected line are held in memory.
 *
 * @module random_line
 */

import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { EmptyDataError, InvalidInputError } from '../errors';
import { openInputFile, toFileOpsError } from '../file_access';
import { createLogger } from '../logger';
import { LineReservoir } from './line_reservoir';
import type { RandomLineOptions } from './random_line.types';

const logger = createLogger('[RandomLine] ');

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Fills `buffer` from the current position of `fd` and returns the byte count.
 */
function readChunk(fd: number, buffer: Buffer, filePath: string): number {
  try {
    return fs.readSync(fd, buffer, 0, buffer.length, null);
  } catch (error: unknown) {
    throw toFileOpsError(error, filePath, 'READ_ERROR');
  }
}

/**
 * Returns one line of `filePath`, each line having probability 1/N.
 * Lines are newline-separated; a trailing newline does not add an empty line.
 *
 * @throws InvalidInputError if the file does not exist
 * @throws EmptyDataError if the file contains no lines
 */
export function randomLine(filePath: string, options: RandomLineOptions = {}): string {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidInputError(
      `Chunk size must be a positive integer, got ${chunkSize}`,
      'INVALID_ARGUMENT',
      filePath
    );
  }

  const reservoir = new LineReservoir(options.random);
  const fd = openInputFile(filePath);
  try {
    const buffer = Buffer.alloc(chunkSize);
    const decoder = new StringDecoder('utf8');
    let pending = '';
    let bytesRead = readChunk(fd, buffer, filePath);

    while (bytesRead > 0) {
      // Only the new text is split; `pending` is never rescanned
      const pieces = decoder.write(buffer.subarray(0, bytesRead)).split('\n');
      const last = pieces.pop() ?? '';
      const first = pieces.shift();
      if (first === undefined) {
        pending += last;
      } else {
        reservoir.offer(pending + first);
        for (const piece of pieces) {
          reservoir.offer(piece);
        }
        pending = last;
      }
      bytesRead = readChunk(fd, buffer, filePath);
    }

    pending += decoder.end();
    if (pending.length > 0) {
      reservoir.offer(pending);
    }
  } finally {
    fs.closeSync(fd);
  }

  const line = reservoir.selected;
  if (line === null) {
    throw new EmptyDataError(filePath);
  }

  logger.debug(`Picked 1 of ${reservoir.count} lines from ${filePath}`);
  return line;
}
