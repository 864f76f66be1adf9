export { OVERRIDE_MODE_ENV_VAR } from './constants.js';
export { RecorderInterceptor, normalizeResponse } from './RecorderInterceptor.js';
export type {
  HttpHeader,
  Interaction,
  InteractionMessage,
  MessageBody,
  MessageTimings,
  Mode,
  RecordedRequest,
  RecordedResponse,
  ResolvedMode,
  SendRequest,
} from './types.js';
export { Modes } from './types.js';

// Configuration and logging
export type { RecorderOptions, RecorderOptionsInput } from './config.js';
export { DEFAULT_RECORDER_OPTIONS, readModeOverride, resolveRecorderOptions } from './config.js';
export type { LogLevel, RecorderLogger } from './logger.js';
export { createConsoleLogger, silentLogger } from './logger.js';

// Errors
export type { ErrorKind } from './errors.js';
export {
  ErrorKinds,
  HttpRecorderError,
  MalformedArchiveError,
  MultipleActiveContextsError,
  NoMatchingInteractionError,
  NoSuchInteractionError,
  PersistenceIOError,
  UnsupportedOperationError,
} from './errors.js';

// Archive model
export type { HarArchive, HarEntry } from './har/schema.js';
export {
  fromArchive,
  parseArchiveText,
  serializeArchive,
  spliceEntries,
  toArchive,
} from './har/archive.js';

// Matching and anonymization
export type { MatchRule, RequestMatcher } from './matchers/RulesMatcher.js';
export { MatchRules, RulesMatcher } from './matchers/RulesMatcher.js';
export type { AnonymizeRule, InteractionAnonymizer } from './anonymizers/RulesAnonymizer.js';
export { noopAnonymizer, RulesAnonymizer } from './anonymizers/RulesAnonymizer.js';

// Repositories
export type {
  AppendStrategy,
  InteractionRepository,
  RepositoryKind,
} from './repositories/InteractionRepository.js';
export { HttpArchiveRepository } from './repositories/HttpArchiveRepository.js';
export { LoggerInteractionRepository } from './repositories/LoggerInteractionRepository.js';
export { NullInteractionRepository } from './repositories/NullInteractionRepository.js';

// Contexts and fetch integration
export {
  defaultSessionManager,
  RecorderContext,
  SessionManager,
  withRecorderContext,
} from './context/SessionManager.js';
export type { FetchFunction } from './fetch.js';
export { createContextFetch, createHarLoggingFetch, createRecorderFetch } from './fetch.js';
