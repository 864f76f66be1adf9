import type { InteractionAnonymizer } from './anonymizers/RulesAnonymizer.js';
import type { RecorderOptionsInput } from './config.js';
import { defaultSessionManager, type SessionManager } from './context/SessionManager.js';
import type { RecorderLogger } from './logger.js';
import { RecorderInterceptor } from './RecorderInterceptor.js';
import type { InteractionRepository } from './repositories/InteractionRepository.js';
import { LoggerInteractionRepository } from './repositories/LoggerInteractionRepository.js';
import { Modes, type SendRequest } from './types.js';

export type FetchFunction = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

function toSendRequest(fetchImpl: FetchFunction | undefined): SendRequest {
  // globalThis.fetch is looked up per call
  return (request) => (fetchImpl ?? globalThis.fetch)(request);
}

/**
 * Returns a fetch that goes through a single interceptor for its whole life.
 */
export function createRecorderFetch(
  options: RecorderOptionsInput & { fetch?: FetchFunction },
): FetchFunction {
  const { fetch: fetchImpl, ...recorderOptions } = options;
  const interceptor = new RecorderInterceptor(recorderOptions);
  const next = toSendRequest(fetchImpl);

  return (input, init) => interceptor.handle(new Request(input, init), next);
}

export interface ContextFetchOptions {
  sessionManager?: SessionManager;
  fetch?: FetchFunction;
}

/**
 * Returns a fetch that routes calls through whichever RecorderContext is
 * active at call time, and straight to the inner fetch when none is.
 */
export function createContextFetch(options: ContextFetchOptions = {}): FetchFunction {
  const manager = options.sessionManager ?? defaultSessionManager;
  const next = toSendRequest(options.fetch);

  return (input, init) => {
    const request = new Request(input, init);
    const context = manager.current;
    return context ? context.interceptor.handle(request, next) : next(request);
  };
}

export interface HarLoggingFetchOptions {
  name: string;
  logger: RecorderLogger;
  logDirectory: string | null;
  aggregateArchiveName?: string;
  anonymizer?: InteractionAnonymizer;
  /** Replaces the trace repository built from the options above. */
  repository?: InteractionRepository;
  fetch?: FetchFunction;
  /**
   * Install the recorder even when trace logging is off right now, so that
   * turning it on later starts producing output.
   */
  installEvenIfLoggingIsDisabled?: boolean;
}

/**
 * Trace-logging fetch: every call is recorded into the trace output while the
 * logger is enabled at trace level. Without that, the inner fetch is returned
 * untouched. It always records: the mode override in the environment does not
 * apply here.
 */
export function createHarLoggingFetch(options: HarLoggingFetchOptions): FetchFunction {
  const { logger, fetch: fetchImpl } = options;

  if (!options.installEvenIfLoggingIsDisabled && !logger.isEnabled('trace')) {
    return fetchImpl ?? ((input, init) => globalThis.fetch(input, init));
  }

  const repository =
    options.repository ??
    new LoggerInteractionRepository({
      logger,
      logDirectory: options.logDirectory,
      aggregateArchiveName: options.aggregateArchiveName,
      anonymizer: options.anonymizer,
    });

  return createRecorderFetch({
    interactionName: options.name,
    mode: Modes.record,
    repository,
    logger,
    anonymizer: options.anonymizer,
    env: {},
    fetch: fetchImpl,
  });
}
