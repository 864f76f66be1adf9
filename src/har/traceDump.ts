import type { HttpHeader, InteractionMessage, MessageBody } from '../types.js';

function formatHeaders(headers: HttpHeader[]): string[] {
  return headers.map(({ name, value }) => `${name}: ${value}`);
}

function formatBody(body: MessageBody | null): string[] {
  if (body === null) {
    return [];
  }
  if (typeof body !== 'string') {
    return ['', `<${body.byteLength} bytes of binary content>`];
  }
  return ['', body];
}

/**
 * Human readable dump of one exchange, written next to the trace archive.
 */
export function formatMessageTrace(message: InteractionMessage): string {
  const { request, response, timings } = message;

  return [
    `# ${timings.startedAt.toISOString()} (${timings.elapsed.toFixed(1)} ms)`,
    '',
    `${request.method} ${request.url}`,
    ...formatHeaders(request.headers),
    ...formatBody(request.body),
    '',
    `HTTP ${response.status} ${response.statusText}`.trimEnd(),
    ...formatHeaders(response.headers),
    ...formatBody(response.body),
    '',
  ].join('\n');
}
