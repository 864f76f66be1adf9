import {
  type InteractionAnonymizer,
  RulesAnonymizer,
} from './anonymizers/RulesAnonymizer.js';
import { DEFAULT_RECORDINGS_DIR, OVERRIDE_MODE_ENV_VAR } from './constants.js';
import { createConsoleLogger, type RecorderLogger } from './logger.js';
import { type RequestMatcher, RulesMatcher } from './matchers/RulesMatcher.js';
import { HttpArchiveRepository } from './repositories/HttpArchiveRepository.js';
import type {
  AppendStrategy,
  InteractionRepository,
} from './repositories/InteractionRepository.js';
import { NullInteractionRepository } from './repositories/NullInteractionRepository.js';
import { isMode, type Mode, Modes } from './types.js';

export interface RecorderOptions {
  /** Name of the interaction; also the archive file name. */
  interactionName: string;
  mode: Mode;
  /** When false, nothing is persisted (the null repository is used). */
  enabled: boolean;
  recordingsDir: string;
  appendStrategy: AppendStrategy;
  matcher: RequestMatcher;
  anonymizer: InteractionAnonymizer;
  repository: InteractionRepository;
  logger: RecorderLogger;
  /** Where the HTTP_RECORDER_MODE override is read from. */
  env: NodeJS.ProcessEnv;
}

export type RecorderOptionsInput = Pick<RecorderOptions, 'interactionName'> &
  Partial<Omit<RecorderOptions, 'interactionName'>>;

export const DEFAULT_RECORDER_OPTIONS = {
  mode: Modes.auto,
  enabled: true,
  recordingsDir: DEFAULT_RECORDINGS_DIR,
  appendStrategy: 'rewrite',
} as const satisfies Partial<RecorderOptions>;

/**
 * Fills every option the caller left out. Matcher, anonymizer and logger get
 * fresh default instances. A disabled recorder always gets the null
 * repository, whatever repository was passed.
 */
export function resolveRecorderOptions(input: RecorderOptionsInput): RecorderOptions {
  const mode = input.mode ?? DEFAULT_RECORDER_OPTIONS.mode;
  const enabled = input.enabled ?? DEFAULT_RECORDER_OPTIONS.enabled;
  const recordingsDir = input.recordingsDir ?? DEFAULT_RECORDER_OPTIONS.recordingsDir;
  const appendStrategy = input.appendStrategy ?? DEFAULT_RECORDER_OPTIONS.appendStrategy;
  const anonymizer = input.anonymizer ?? RulesAnonymizer.default;

  const repository = enabled
    ? (input.repository ??
      new HttpArchiveRepository({ recordingsDir, anonymizer, appendStrategy }))
    : new NullInteractionRepository();

  return {
    interactionName: input.interactionName,
    mode,
    enabled,
    recordingsDir,
    appendStrategy,
    matcher: input.matcher ?? RulesMatcher.default,
    anonymizer,
    repository,
    logger: input.logger ?? createConsoleLogger(),
    env: input.env ?? process.env,
  };
}

/**
 * Reads the process-level mode override. Only an exact mode name counts.
 */
export function readModeOverride(env: NodeJS.ProcessEnv): Mode | null {
  const value = env[OVERRIDE_MODE_ENV_VAR]?.trim();
  return value && isMode(value) ? value : null;
}
