import {
  readModeOverride,
  type RecorderOptions,
  type RecorderOptionsInput,
  resolveRecorderOptions,
} from './config.js';
import { NoMatchingInteractionError } from './errors.js';
import {
  type Interaction,
  type InteractionMessage,
  Modes,
  type RecordedRequest,
  type RecordedResponse,
  type ResolvedMode,
  type SendRequest,
} from './types.js';
import {
  bodyToBytes,
  headersToList,
  isEventStream,
  isNullBodyStatus,
  listToHeaders,
  toMessageBody,
} from './utils/httpHelpers.js';
import { Mutex } from './utils/KeyedMutex.js';

async function captureRequest(request: Request): Promise<RecordedRequest> {
  // Read from a clone so the original body can still be sent
  const bytes = request.body
    ? new Uint8Array(await request.clone().arrayBuffer())
    : new Uint8Array(0);

  return {
    method: request.method,
    url: request.url,
    headers: headersToList(request.headers),
    body: toMessageBody(bytes, request.headers.get('content-type')),
  };
}

function buildResponse(
  status: number,
  statusText: string,
  headers: Headers,
  bytes: Uint8Array,
  method: string,
): Response {
  const hasBody = !isNullBodyStatus(status);
  const responseHeaders = new Headers(headers);

  // content-length always describes the buffered body
  if (hasBody && method.toUpperCase() !== 'HEAD') {
    responseHeaders.set('content-length', String(bytes.byteLength));
  }

  return new Response(hasBody ? bytes : null, {
    status,
    statusText,
    headers: responseHeaders,
  });
}

/**
 * Buffers the response body and returns an equivalent response whose
 * content-length matches the body and whose body can be read from the start.
 */
export async function normalizeResponse(response: Response, method: string): Promise<Response> {
  const bytes = new Uint8Array(await response.arrayBuffer());
  return buildResponse(response.status, response.statusText, response.headers, bytes, method);
}

export function createReplayResponse(recorded: RecordedResponse, method: string): Response {
  return buildResponse(
    recorded.status,
    recorded.statusText,
    listToHeaders(recorded.headers),
    bodyToBytes(recorded.body),
    method,
  );
}

/**
 * Sits in front of the real transport and passes calls through, records them,
 * or answers them from a recorded interaction, depending on the mode.
 */
export class RecorderInterceptor {
  readonly options: RecorderOptions;
  private resolvedMode: ResolvedMode | null = null;
  private readonly modeLock = new Mutex();
  private replayInteraction: Promise<Interaction> | null = null;

  constructor(options: RecorderOptionsInput) {
    this.options = resolveRecorderOptions(options);
  }

  get interactionName(): string {
    return this.options.interactionName;
  }

  async handle(request: Request, next: SendRequest): Promise<Response> {
    const mode = await this.resolveExecutionMode();

    switch (mode) {
      case Modes.passthrough: {
        const response = await next(request);
        // event streams are handed over unbuffered
        return isEventStream(response.headers.get('content-type'))
          ? response
          : normalizeResponse(response, request.method);
      }
      case Modes.record: {
        return this.recordRequest(request, next);
      }
      case Modes.replay: {
        return this.replayRequest(request);
      }
    }
  }

  /**
   * Resolves the mode once per interceptor: the HTTP_RECORDER_MODE override
   * first, then Auto (replay when the interaction exists), then the
   * configured mode.
   */
  async resolveExecutionMode(): Promise<ResolvedMode> {
    if (this.resolvedMode !== null) {
      return this.resolvedMode;
    }

    return this.modeLock.runExclusive(async () => {
      const resolved = this.resolvedMode ?? (await this.computeExecutionMode());
      this.resolvedMode = resolved;
      return resolved;
    });
  }

  private async computeExecutionMode(): Promise<ResolvedMode> {
    const { env, mode: configuredMode, repository, interactionName, logger } = this.options;
    const override = readModeOverride(env);
    const mode = override ?? configuredMode;

    if (mode !== Modes.auto) {
      logger.debug(
        `Mode for ${interactionName}: ${mode}${override ? ' (environment override)' : ''}`,
      );
      return mode;
    }

    const resolved = (await repository.exists(interactionName)) ? Modes.replay : Modes.record;
    logger.debug(`Mode for ${interactionName}: Auto resolved to ${resolved}`);
    return resolved;
  }

  private async recordRequest(request: Request, next: SendRequest): Promise<Response> {
    const { anonymizer, repository, interactionName, logger } = this.options;

    const recordedRequest = await captureRequest(request);
    const startedAt = new Date();
    const start = performance.now();

    // Transport failures and aborts propagate as-is; nothing is stored for them
    const response = await next(request);
    const bytes = new Uint8Array(await response.arrayBuffer());
    const elapsed = performance.now() - start;

    const message: InteractionMessage = {
      request: recordedRequest,
      response: {
        status: response.status,
        statusText: response.statusText,
        headers: headersToList(response.headers),
        body: toMessageBody(bytes, response.headers.get('content-type')),
        contentLength: bytes.byteLength,
      },
      timings: { startedAt, elapsed },
    };

    const interaction = await anonymizer.anonymize({
      name: interactionName,
      messages: [message],
    });
    const stored = await repository.store(interaction);

    logger.debug(
      `[RECORD] ${request.method} ${request.url} -> ${response.status} (${elapsed.toFixed(1)} ms, ${stored ? 'stored' : 'not stored'})`,
    );

    return buildResponse(
      response.status,
      response.statusText,
      response.headers,
      bytes,
      request.method,
    );
  }

  private loadReplayInteraction(): Promise<Interaction> {
    if (!this.replayInteraction) {
      const { repository, interactionName, logger } = this.options;
      this.replayInteraction = repository.load(interactionName).then((interaction) => {
        logger.debug(
          `[REPLAY] Loaded ${interaction.messages.length} message(s) for ${interactionName}`,
        );
        return interaction;
      });
    }
    return this.replayInteraction;
  }

  private async replayRequest(request: Request): Promise<Response> {
    const { matcher, interactionName, logger } = this.options;
    request.signal.throwIfAborted();

    const interaction = await this.loadReplayInteraction();
    const liveRequest = await captureRequest(request);
    const message = matcher.match(liveRequest, interaction);

    if (!message) {
      logger.error(
        `[REPLAY ERROR] No recording found for ${request.method} ${request.url} in ${interactionName}`,
      );
      throw new NoMatchingInteractionError(interactionName, request.method, request.url);
    }

    logger.debug(
      `[REPLAY] ${request.method} ${request.url} -> ${message.response.status} (${interactionName})`,
    );
    return createReplayResponse(message.response, request.method);
  }
}
