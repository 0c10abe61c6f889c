/**
 * File access for the analyzers: path validation, UTF-8 → Latin-1 decoding,
 * and the sample-data lookup used by config (.hpp) files.
 */
import { existsSync, readFileSync, statSync } from 'node:fs';
import path from 'node:path';
import { FileNotFoundError, NotAFileError } from '../errors.js';
import { SCANNER_CONFIG } from './config.js';
import logger from './logger.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Extension without the dot, lower-cased ("" when there is none) */
export function getFileType(filePath: string): string {
  return path.extname(filePath).replace(/^\./, '').toLowerCase();
}

export function validateFile(filePath: string): void {
  if (!existsSync(filePath)) throw new FileNotFoundError(filePath);
  if (!statSync(filePath).isFile()) throw new NotAFileError(filePath);
}

/**
 * Decode a buffer as UTF-8, or as Latin-1 when it is not valid UTF-8.
 * Latin-1 maps every byte, so this never fails.
 */
export function decodeText(buf: Buffer, filePath: string): string {
  try {
    return utf8.decode(buf);
  } catch {
    logger.warn(`UTF-8 decode failed for ${filePath}, trying with 'latin-1'`, { module: 'reader' });
    return buf.toString('latin1');
  }
}

export function readFileContent(filePath: string): string {
  validateFile(filePath);
  return decodeText(readFileSync(filePath), filePath);
}

export function readFileLines(filePath: string): string[] {
  const content = readFileContent(filePath);
  return content === '' ? [] : content.split(/\r\n|\r|\n/);
}

/**
 * Return `filePath` when it exists, otherwise a file of the same name in the
 * sample-data directory.
 */
export function resolveSamplePath(filePath: string, sampleDir: string = SCANNER_CONFIG.sampleDataDir): string {
  if (existsSync(filePath)) return filePath;

  const samplePath = path.join(sampleDir, path.basename(filePath));
  if (existsSync(samplePath)) {
    logger.debug(`Resolved ${filePath} → ${samplePath}`, { module: 'reader' });
    return samplePath;
  }

  throw new FileNotFoundError(filePath, `Could not find file: ${filePath}`);
}
