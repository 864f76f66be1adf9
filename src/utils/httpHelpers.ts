import type { HttpHeader, MessageBody } from '../types.js';

const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

const TEXTUAL_CONTENT_TYPE =
  /^(text\/|application\/(?:[\w.+-]+\+)?(?:json|xml|javascript|ecmascript|graphql|x-www-form-urlencoded)\b)/i;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export function isNullBodyStatus(status: number): boolean {
  return NULL_BODY_STATUSES.has(status);
}

export function isTextualContentType(contentType: string | null): boolean {
  return contentType !== null && TEXTUAL_CONTENT_TYPE.test(contentType.trim());
}

/** Server-sent events: the body stays open and is never complete. */
export function isEventStream(contentType: string | null): boolean {
  return contentType?.split(';')[0]?.trim().toLowerCase() === 'text/event-stream';
}

/**
 * Turns raw bytes into a message body: text when the content type allows it
 * and the bytes are valid UTF-8, otherwise a Buffer.
 */
export function toMessageBody(
  bytes: Uint8Array,
  contentType: string | null,
): MessageBody | null {
  if (bytes.byteLength === 0) {
    return null;
  }

  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (contentType !== null && !isTextualContentType(contentType)) {
    return Buffer.from(buffer);
  }

  try {
    const text = utf8Decoder.decode(buffer);
    return text.includes('\u0000') ? Buffer.from(buffer) : text;
  } catch {
    return Buffer.from(buffer);
  }
}

export function bodyToBytes(body: MessageBody | null): Buffer {
  if (body === null) {
    return Buffer.alloc(0);
  }
  return typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
}

export function bodyByteLength(body: MessageBody | null): number {
  if (body === null) {
    return 0;
  }
  return typeof body === 'string' ? Buffer.byteLength(body, 'utf8') : body.byteLength;
}

export function bodiesEqual(
  a: MessageBody | null,
  b: MessageBody | null,
): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b;
  }
  return bodyToBytes(a).equals(bodyToBytes(b));
}

/**
 * Flattens fetch Headers into a list. Headers already lower-cases and sorts
 * the names and joins repeated values with ", ", so the wire order and
 * separate lines of other headers are gone. Set-Cookie is kept as one entry
 * per cookie, after the rest.
 */
export function headersToList(headers: Headers): HttpHeader[] {
  const list: HttpHeader[] = [];
  for (const [name, value] of headers) {
    if (name !== 'set-cookie') {
      list.push({ name, value });
    }
  }
  for (const cookie of headers.getSetCookie()) {
    list.push({ name: 'set-cookie', value: cookie });
  }
  return list;
}

export function listToHeaders(list: HttpHeader[]): Headers {
  const headers = new Headers();
  for (const { name, value } of list) {
    headers.append(name, value);
  }
  return headers;
}

export function getHeaderValues(list: HttpHeader[], name: string): string[] {
  const lowerName = name.toLowerCase();
  return list
    .filter((header) => header.name.toLowerCase() === lowerName)
    .map((header) => header.value);
}

export function getHeader(list: HttpHeader[], name: string): string | null {
  const values = getHeaderValues(list, name);
  return values.length > 0 ? values.join(', ') : null;
}
