import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import filenamify from 'filenamify';

import { ARCHIVE_EXTENSION, FILENAME_REPLACEMENT } from '../constants.js';
import { isErrnoException } from '../errors.js';

// Max filename length: 255 chars on most filesystems
const MAX_FILENAME_LENGTH = 255;
const HASH_LENGTH = 8; // 8 hex chars for the hash suffix (16^8 = 4.3B combinations)

let tempFileCounter = 0;

/**
 * Generates a hash from a string to use as a filename suffix
 * @param str The string to hash
 * @returns A hex hash string
 */
function generateHash(str: string): string {
  // shake256 supports outputLength directly; it is in bytes, hex is 2 chars per byte
  return crypto
    .createHash('shake256', { outputLength: HASH_LENGTH / 2 })
    .update(str)
    .digest('hex');
}

/**
 * Turns an interaction or archive name into a single safe path segment.
 * Path separators become double underscores so nested names stay readable,
 * other illegal characters become underscores, and over-long names are
 * truncated with a hash of the full name appended.
 * @param name The name to sanitize
 * @param reserved Characters to keep free for a suffix such as an extension
 */
export function sanitizeFileName(name: string, reserved = 0): string {
  const maxLength = MAX_FILENAME_LENGTH - reserved;
  let processed = name.replaceAll('/', '__').replaceAll('\\', '__');

  if (processed.length > maxLength) {
    const hash = generateHash(name);
    const maxBaseLength = maxLength - HASH_LENGTH - 1; // -1 for underscore
    processed = `${processed.slice(0, maxBaseLength)}_${hash}`;
  }

  return filenamify(processed, {
    replacement: FILENAME_REPLACEMENT,
    maxLength: MAX_FILENAME_LENGTH, // prevents filenamify's own truncation
  });
}

/**
 * Path of the archive holding an interaction. A name that already ends in
 * .har keeps its extension.
 */
export function getArchivePath(recordingsDir: string, interactionName: string): string {
  const baseName = interactionName.toLowerCase().endsWith(ARCHIVE_EXTENSION)
    ? interactionName.slice(0, -ARCHIVE_EXTENSION.length)
    : interactionName;

  return path.resolve(
    recordingsDir,
    `${sanitizeFileName(baseName, ARCHIVE_EXTENSION.length)}${ARCHIVE_EXTENSION}`,
  );
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Reads a file, or returns null when it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Writes to a sibling temp file, then renames it over the target, so readers
 * see either the previous content or the complete new content.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  tempFileCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${tempFileCounter}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
