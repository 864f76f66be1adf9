import {
  HAR_CREATOR_NAME,
  HAR_CREATOR_VERSION,
  HAR_VERSION,
  HTTP_VERSION,
} from '../constants.js';
import { MalformedArchiveError, PersistenceIOError } from '../errors.js';
import type {
  HttpHeader,
  Interaction,
  InteractionMessage,
  MessageBody,
  RecordedRequest,
} from '../types.js';
import { bodyByteLength, getHeader } from '../utils/httpHelpers.js';
import {
  type HarArchive,
  HarArchiveSchema,
  type HarEntry,
  type HarNameValue,
  type HarPostData,
} from './schema.js';

const JSON_INDENT_SPACES = 2;
const ENTRY_INDENT = ' '.repeat(JSON_INDENT_SPACES * 3);
const LOG_KEY_INDENT = `\n${' '.repeat(JSON_INDENT_SPACES * 2)}"`;
const ENTRIES_OPENING = `${LOG_KEY_INDENT}entries": [\n`;
// What serializeArchive writes after the last entry of a non-empty entries array
const LAST_ENTRY_CLOSING = `\n${ENTRY_INDENT}}`;
const ARCHIVE_CLOSING = '\n    ]\n  }\n}';
const FORM_URLENCODED = 'application/x-www-form-urlencoded';

function toNameValues(headers: HttpHeader[]): HarNameValue[] {
  return headers.map(({ name, value }) => ({ name, value }));
}

function queryStringOf(url: string): HarNameValue[] {
  return [...new URL(url).searchParams].map(([name, value]) => ({
    name,
    value,
  }));
}

function postDataOf(request: RecordedRequest): HarPostData | undefined {
  const { body } = request;
  if (body === null) {
    return undefined;
  }

  const mimeType = getHeader(request.headers, 'content-type') ?? '';
  if (typeof body !== 'string') {
    return { mimeType, text: body.toString('base64'), _encoding: 'base64' };
  }

  if (mimeType.toLowerCase().startsWith(FORM_URLENCODED)) {
    const params = [...new URLSearchParams(body)].map(([name, value]) => ({
      name,
      value,
    }));
    return { mimeType, text: body, params };
  }

  return { mimeType, text: body };
}

function bodyFromArchive(
  text: string | undefined,
  encoding: string | undefined,
): MessageBody | null {
  if (text === undefined) {
    return null;
  }
  if (encoding === 'base64') {
    return Buffer.from(text, 'base64');
  }
  return text.length > 0 ? text : null;
}

export function toArchiveEntry(message: InteractionMessage): HarEntry {
  const { request, response, timings } = message;
  const postData = postDataOf(request);
  const responseBody = response.body;

  return {
    startedDateTime: timings.startedAt.toISOString(),
    time: timings.elapsed,
    request: {
      method: request.method,
      url: request.url,
      httpVersion: HTTP_VERSION,
      cookies: [],
      headers: toNameValues(request.headers),
      queryString: queryStringOf(request.url),
      ...(postData && { postData }),
      headersSize: -1,
      bodySize: bodyByteLength(request.body),
    },
    response: {
      status: response.status,
      statusText: response.statusText,
      httpVersion: HTTP_VERSION,
      cookies: [],
      headers: toNameValues(response.headers),
      content: {
        size: response.contentLength,
        mimeType: getHeader(response.headers, 'content-type') ?? '',
        ...(responseBody !== null &&
          (typeof responseBody === 'string'
            ? { text: responseBody }
            : { text: responseBody.toString('base64'), encoding: 'base64' })),
      },
      redirectURL: getHeader(response.headers, 'location') ?? '',
      headersSize: -1,
      bodySize: bodyByteLength(responseBody),
    },
    cache: {},
    timings: {
      send: 0,
      wait: timings.elapsed,
      receive: 0,
    },
  };
}

/**
 * Projects an interaction onto the HAR schema. Every message becomes exactly
 * one entry, in order.
 */
export function toArchive(interaction: Interaction): HarArchive {
  return {
    log: {
      version: HAR_VERSION,
      creator: { name: HAR_CREATOR_NAME, version: HAR_CREATOR_VERSION },
      entries: interaction.messages.map(toArchiveEntry),
    },
  };
}

export function fromArchiveEntry(entry: HarEntry): InteractionMessage {
  const { request, response } = entry;
  return {
    request: {
      method: request.method,
      url: request.url,
      headers: toNameValues(request.headers),
      body: bodyFromArchive(request.postData?.text, request.postData?._encoding),
    },
    response: {
      status: response.status,
      statusText: response.statusText,
      headers: toNameValues(response.headers),
      body: bodyFromArchive(response.content.text, response.content.encoding),
      contentLength: response.content.size,
    },
    timings: {
      startedAt: new Date(entry.startedDateTime),
      elapsed: entry.time,
    },
  };
}

/**
 * Validates anything that claims to be a HAR document and returns it typed.
 * @param source Used in the error message, usually the file path
 */
export function validateArchive(
  archive: unknown,
  source = 'archive',
): HarArchive {
  const result = HarArchiveSchema.safeParse(archive);
  if (!result.success) {
    throw new MalformedArchiveError(
      source,
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

export function fromArchive(
  archive: unknown,
  source = 'archive',
): InteractionMessage[] {
  return validateArchive(archive, source).log.entries.map(fromArchiveEntry);
}

export function serializeArchive(archive: HarArchive): string {
  return JSON.stringify(archive, null, JSON_INDENT_SPACES);
}

export function parseArchiveText(text: string, source = 'archive'): HarArchive {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new PersistenceIOError(`Unable to decode ${source}`, error);
  }
  return validateArchive(json, source);
}

/**
 * Appends entries to an archive previously written by serializeArchive
 * without parsing it. Returns null when the text does not end the way
 * serializeArchive ends a non-empty archive, in which case the caller must
 * fall back to a full rewrite.
 */
export function spliceEntries(
  serialized: string,
  entries: HarEntry[],
): string | null {
  if (entries.length === 0) {
    return serialized;
  }
  if (!serialized.endsWith(LAST_ENTRY_CLOSING + ARCHIVE_CLOSING)) {
    return null;
  }

  // entries must be the last key of log, otherwise the closing bracket belongs to something else
  const entriesStart = serialized.lastIndexOf(ENTRIES_OPENING);
  if (
    entriesStart === -1 ||
    serialized.indexOf(LOG_KEY_INDENT, entriesStart + 1) !== -1
  ) {
    return null;
  }

  const addition = entries
    .map((entry) =>
      JSON.stringify(entry, null, JSON_INDENT_SPACES)
        .split('\n')
        .map((line) => ENTRY_INDENT + line)
        .join('\n'),
    )
    .join(',\n');

  return `${serialized.slice(0, -ARCHIVE_CLOSING.length)},\n${addition}${ARCHIVE_CLOSING}`;
}
