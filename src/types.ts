export const Modes = {
  passthrough: 'Passthrough',
  record: 'Record',
  replay: 'Replay',
  auto: 'Auto',
} as const;

export type Mode = (typeof Modes)[keyof typeof Modes];

/** A mode after `Auto` has been decided. */
export type ResolvedMode = Exclude<Mode, 'Auto'>;

const MODE_NAMES: readonly string[] = Object.values(Modes);

export function isMode(value: string): value is Mode {
  return MODE_NAMES.includes(value);
}

export interface HttpHeader {
  name: string;
  value: string;
}

/** Text bodies are kept as strings, anything else as raw bytes. */
export type MessageBody = string | Buffer;

export interface RecordedRequest {
  method: string;
  url: string;
  headers: HttpHeader[];
  body: MessageBody | null;
}

export interface RecordedResponse {
  status: number;
  statusText: string;
  headers: HttpHeader[];
  body: MessageBody | null;
  contentLength: number;
}

export interface MessageTimings {
  startedAt: Date;
  elapsed: number; // milliseconds
}

export interface InteractionMessage {
  request: RecordedRequest;
  response: RecordedResponse;
  timings: MessageTimings;
}

export interface Interaction {
  name: string;
  messages: InteractionMessage[];
}

/** The host pipeline's next step: the real network, or whatever sits behind us. */
export type SendRequest = (request: Request) => Promise<Response>;
