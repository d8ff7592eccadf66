/**
 * Document Storage
 *
 * The core never touches storage directly; plugins and services go through a
 * DocumentStore. LocalFileStore is the only implementation: remote object
 * stores are out of scope.
 */

import fs from 'fs/promises';
import path from 'path';
import { ulid } from 'ulid';
import { logger } from './logger';

export interface StoreAck {
  identifier: string;
  bytes: number;
}

export interface DocumentStore {
  /** Read a document as UTF-8 text */
  fetch(identifier: string): Promise<string>;
  store(identifier: string, bytes: Buffer): Promise<StoreAck>;
}

/**
 * Filesystem-backed store. Relative identifiers resolve against baseDir.
 * Writes go to a temporary sibling file that is renamed into place, so a
 * reader never sees a half-written record.
 */
export class LocalFileStore implements DocumentStore {
  constructor(private readonly baseDir: string = process.cwd()) {}

  resolve(identifier: string): string {
    return path.resolve(this.baseDir, identifier);
  }

  async fetch(identifier: string): Promise<string> {
    const filePath = this.resolve(identifier);
    const text = await fs.readFile(filePath, 'utf-8');
    logger.debug('Read document', { path: filePath, chars: text.length });
    return text;
  }

  async store(identifier: string, bytes: Buffer): Promise<StoreAck> {
    const filePath = this.resolve(identifier);
    const tmpPath = `${filePath}.${ulid()}.tmp`;

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, bytes);
    try {
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }

    logger.info('Stored record', { path: filePath, bytes: bytes.length });
    return { identifier: filePath, bytes: bytes.length };
  }
}

/**
 * `<outputDir>/<input stem>.metadata.json`
 */
export function defaultOutputPath(inputIdentifier: string, outputDir: string): string {
  const stem = path.basename(inputIdentifier, path.extname(inputIdentifier));
  return path.join(outputDir, `${stem}.metadata.json`);
}
