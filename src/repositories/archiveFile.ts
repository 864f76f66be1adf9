import type { InteractionAnonymizer } from '../anonymizers/RulesAnonymizer.js';
import { HttpRecorderError, PersistenceIOError } from '../errors.js';
import {
  fromArchive,
  parseArchiveText,
  serializeArchive,
  spliceEntries,
  toArchive,
  toArchiveEntry,
} from '../har/archive.js';
import type { Interaction, InteractionMessage } from '../types.js';
import { readFileIfExists, writeFileAtomic } from '../utils/fileUtils.js';
import type { KeyedMutex } from '../utils/KeyedMutex.js';
import type { AppendStrategy } from './InteractionRepository.js';

export interface ArchiveFileOptions {
  anonymizer: InteractionAnonymizer;
  appendStrategy: AppendStrategy;
  locks: KeyedMutex;
}

async function withIOErrors<T>(message: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof HttpRecorderError) {
      throw error;
    }
    throw new PersistenceIOError(message, error);
  }
}

export async function readArchiveFile(filePath: string): Promise<InteractionMessage[] | null> {
  const text = await withIOErrors(`Error while reading file ${filePath}`, () =>
    readFileIfExists(filePath),
  );
  return text === null ? null : fromArchive(parseArchiveText(text, filePath), filePath);
}

/**
 * Adds the interaction's messages to the archive at filePath, creating it when
 * missing. Writers of one file are serialized through `locks`; the file on
 * disk is always a complete archive.
 * @returns The messages written by this call, anonymized
 */
export async function appendToArchiveFile(
  filePath: string,
  interaction: Interaction,
  options: ArchiveFileOptions,
): Promise<Interaction> {
  const { anonymizer, appendStrategy, locks } = options;
  const anonymized = await anonymizer.anonymize(interaction);

  return locks.runExclusive(filePath, () =>
    withIOErrors(`Error while writing file ${filePath}`, async () => {
      const existing = await readFileIfExists(filePath);

      if (existing === null) {
        await writeFileAtomic(filePath, serializeArchive(toArchive(anonymized)));
        return anonymized;
      }

      if (appendStrategy === 'splice') {
        const spliced = spliceEntries(existing, anonymized.messages.map(toArchiveEntry));
        if (spliced !== null) {
          await writeFileAtomic(filePath, spliced);
          return anonymized;
        }
      }

      const previous = fromArchive(parseArchiveText(existing, filePath), filePath);
      // Earlier entries go through the anonymizer again so rule changes reach them
      const merged = await anonymizer.anonymize({
        name: anonymized.name,
        messages: [...previous, ...anonymized.messages],
      });
      await writeFileAtomic(filePath, serializeArchive(toArchive(merged)));
      return anonymized;
    }),
  );
}
