import {
  type InteractionAnonymizer,
  noopAnonymizer,
} from '../anonymizers/RulesAnonymizer.js';
import { DEFAULT_RECORDINGS_DIR } from '../constants.js';
import { NoSuchInteractionError, PersistenceIOError } from '../errors.js';
import type { Interaction } from '../types.js';
import { fileExists, getArchivePath } from '../utils/fileUtils.js';
import { archiveFileLocks, type KeyedMutex } from '../utils/KeyedMutex.js';
import { appendToArchiveFile, readArchiveFile } from './archiveFile.js';
import type {
  AppendStrategy,
  InteractionRepository,
} from './InteractionRepository.js';

export interface HttpArchiveRepositoryOptions {
  recordingsDir?: string;
  anonymizer?: InteractionAnonymizer;
  appendStrategy?: AppendStrategy;
  locks?: KeyedMutex;
}

/**
 * Stores each interaction as one HAR file named after it.
 */
export class HttpArchiveRepository implements InteractionRepository {
  readonly kind = 'archive';
  private readonly recordingsDir: string;
  private readonly anonymizer: InteractionAnonymizer;
  private readonly appendStrategy: AppendStrategy;
  private readonly locks: KeyedMutex;

  constructor(options: HttpArchiveRepositoryOptions = {}) {
    this.recordingsDir = options.recordingsDir ?? DEFAULT_RECORDINGS_DIR;
    this.anonymizer = options.anonymizer ?? noopAnonymizer;
    this.appendStrategy = options.appendStrategy ?? 'rewrite';
    this.locks = options.locks ?? archiveFileLocks;
  }

  getArchivePath(interactionName: string): string {
    return getArchivePath(this.recordingsDir, interactionName);
  }

  async exists(interactionName: string): Promise<boolean> {
    const filePath = this.getArchivePath(interactionName);
    try {
      return await fileExists(filePath);
    } catch (error) {
      throw new PersistenceIOError(`Error while checking file ${filePath}`, error);
    }
  }

  async load(interactionName: string): Promise<Interaction> {
    const filePath = this.getArchivePath(interactionName);
    const messages = await readArchiveFile(filePath);
    if (messages === null) {
      throw new NoSuchInteractionError(interactionName, filePath);
    }
    return { name: interactionName, messages };
  }

  async store(interaction: Interaction): Promise<Interaction | null> {
    if (interaction.messages.length === 0) {
      return null;
    }

    return appendToArchiveFile(this.getArchivePath(interaction.name), interaction, {
      anonymizer: this.anonymizer,
      appendStrategy: this.appendStrategy,
      locks: this.locks,
    });
  }
}
