import fs from 'node:fs/promises';
import path from 'node:path';

import {
  type InteractionAnonymizer,
  noopAnonymizer,
} from '../anonymizers/RulesAnonymizer.js';
import { ARCHIVE_EXTENSION, TRACE_DIR_NAME } from '../constants.js';
import {
  isErrnoException,
  PersistenceIOError,
  UnsupportedOperationError,
} from '../errors.js';
import { formatMessageTrace } from '../har/traceDump.js';
import type { RecorderLogger } from '../logger.js';
import type { Interaction, InteractionMessage } from '../types.js';
import { sanitizeFileName, writeFileAtomic } from '../utils/fileUtils.js';
import { archiveFileLocks, type KeyedMutex } from '../utils/KeyedMutex.js';
import { appendToArchiveFile } from './archiveFile.js';
import type {
  AppendStrategy,
  InteractionRepository,
} from './InteractionRepository.js';

export interface LoggerInteractionRepositoryOptions {
  logger: RecorderLogger;
  /** Root of the trace output; nothing is written when null. */
  logDirectory: string | null;
  /**
   * One archive shared by every interaction, written directly under the trace
   * root instead of one archive per interaction directory.
   */
  aggregateArchiveName?: string;
  anonymizer?: InteractionAnonymizer;
  appendStrategy?: AppendStrategy;
  locks?: KeyedMutex;
}

/**
 * Write-only repository that turns interactions into trace output: a text
 * dump per message plus a consolidated HAR file. It is a no-op unless the
 * logger is enabled at trace level, and never reports anything as stored.
 */
export class LoggerInteractionRepository implements InteractionRepository {
  readonly kind = 'logger';
  private readonly options: LoggerInteractionRepositoryOptions;

  constructor(options: LoggerInteractionRepositoryOptions) {
    this.options = options;
  }

  async exists(_interactionName: string): Promise<boolean> {
    return false;
  }

  async load(interactionName: string): Promise<Interaction> {
    throw new UnsupportedOperationError(
      `Error while loading ${interactionName}: the trace repository cannot replay interactions`,
    );
  }

  getTraceDirectory(interactionName: string): string | null {
    const { logDirectory } = this.options;
    if (!logDirectory) {
      return null;
    }
    return path.resolve(logDirectory, TRACE_DIR_NAME, sanitizeFileName(interactionName));
  }

  async store(interaction: Interaction): Promise<Interaction | null> {
    const { logger } = this.options;
    if (!logger.isEnabled('trace') || interaction.messages.length === 0) {
      return null;
    }

    const traceDir = this.getTraceDirectory(interaction.name);
    if (!traceDir) {
      return null;
    }

    const anonymizer = this.options.anonymizer ?? noopAnonymizer;
    const anonymized = await anonymizer.anonymize(interaction);

    const locks = this.options.locks ?? archiveFileLocks;
    await locks.runExclusive(traceDir, () => this.writeDumps(traceDir, anonymized.messages));

    const archivePath = this.getArchivePath(traceDir, interaction.name);
    await appendToArchiveFile(archivePath, anonymized, {
      anonymizer,
      appendStrategy: this.options.appendStrategy ?? 'rewrite',
      locks,
    });

    logger.trace(
      `[TRACE] ${anonymized.messages.length} message(s) of ${interaction.name} written to ${traceDir}`,
    );

    // Callers must not keep or re-store what went to the trace output
    return null;
  }

  private getArchivePath(traceDir: string, interactionName: string): string {
    const { logDirectory, aggregateArchiveName } = this.options;
    const fileName = (name: string) =>
      `${sanitizeFileName(name, ARCHIVE_EXTENSION.length)}${ARCHIVE_EXTENSION}`;

    if (aggregateArchiveName !== undefined && logDirectory) {
      return path.resolve(logDirectory, TRACE_DIR_NAME, fileName(aggregateArchiveName));
    }
    return path.join(traceDir, fileName(interactionName));
  }

  /**
   * Dump numbers continue after the highest one already in the directory.
   * Callers hold the lock for the directory.
   */
  private async writeDumps(traceDir: string, messages: InteractionMessage[]): Promise<void> {
    let sequence = await readLastDumpSequence(traceDir);

    for (const message of messages) {
      sequence += 1;
      const dumpPath = path.join(traceDir, dumpFileName(sequence, message));
      try {
        await writeFileAtomic(dumpPath, formatMessageTrace(message));
      } catch (error) {
        throw new PersistenceIOError(`Error while writing file ${dumpPath}`, error);
      }
    }
  }
}

const DUMP_SEQUENCE_PATTERN = /^(\d+)_/;

async function readLastDumpSequence(traceDir: string): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(traceDir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return 0;
    }
    throw new PersistenceIOError(`Error while reading directory ${traceDir}`, error);
  }

  return entries.reduce((last, entry) => {
    const match = DUMP_SEQUENCE_PATTERN.exec(entry);
    return match ? Math.max(last, Number(match[1])) : last;
  }, 0);
}

function dumpFileName(sequence: number, message: InteractionMessage): string {
  const { request, response } = message;
  const host = new URL(request.url).host;
  const logId = String(sequence).padStart(4, '0');
  return sanitizeFileName(`${logId}_${response.status} ${request.method} ${host}.txt`);
}
