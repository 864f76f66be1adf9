import { ANONYMIZED_VALUE, MASK_CHAR } from '../constants.js';
import type {
  HttpHeader,
  Interaction,
  InteractionMessage,
  MessageBody,
} from '../types.js';

export interface InteractionAnonymizer {
  anonymize(interaction: Interaction): Promise<Interaction>;
}

export type AnonymizeRule = (message: InteractionMessage) => InteractionMessage;

export const DEFAULT_PASSWORD_PATTERN =
  /(?:^|[\s"'&?{,;])(?:password|passwd|pwd)"?\s*[:=]\s*"?([^\s"&,;}]*)/gi;

function replaceHeader(
  headers: HttpHeader[],
  name: string,
  replacement: string,
): HttpHeader[] {
  const lowerName = name.toLowerCase();
  return headers.map((header) =>
    header.name.toLowerCase() === lowerName
      ? { name: header.name, value: replacement }
      : header,
  );
}

function withIndices(pattern: RegExp): RegExp {
  const flags = new Set(pattern.flags);
  flags.add('g');
  flags.add('d');
  return new RegExp(pattern.source, [...flags].join(''));
}

/**
 * Replaces every match (or its first capture group) with one mask character
 * per UTF-8 byte of the masked text. The encoded body keeps its byte length,
 * not its character count.
 */
export function maskText(text: string, pattern: RegExp): string {
  let result = '';
  let cursor = 0;

  for (const match of text.matchAll(withIndices(pattern))) {
    const span = match.indices?.[1] ?? match.indices?.[0];
    if (!span) {
      continue;
    }
    const [start, end] = span;
    const maskLength = Buffer.byteLength(text.slice(start, end), 'utf8');
    result += text.slice(cursor, start) + MASK_CHAR.repeat(maskLength);
    cursor = end;
  }

  return result + text.slice(cursor);
}

function maskBody(body: MessageBody | null, pattern: RegExp): MessageBody | null {
  // binary bodies are never masked
  return typeof body === 'string' ? maskText(body, pattern) : body;
}

function replaceQueryParameter(
  url: string,
  name: string,
  replacement: string,
): string {
  const parsed = new URL(url);
  if (!parsed.searchParams.has(name)) {
    return url;
  }
  const values = parsed.searchParams.getAll(name);
  if (values.every((value) => value === replacement)) {
    return url;
  }
  parsed.search = new URLSearchParams(
    [...parsed.searchParams].map(([key, value]): [string, string] => [key, key === name ? replacement : value]),
  ).toString();
  return parsed.toString();
}

/**
 * Anonymizes interactions by applying a list of rules to every message.
 * Each rule is idempotent, so anonymizing twice yields the same interaction.
 */
export class RulesAnonymizer implements InteractionAnonymizer {
  private readonly rules: readonly AnonymizeRule[];

  private constructor(rules: readonly AnonymizeRule[]) {
    this.rules = rules;
  }

  static get empty(): RulesAnonymizer {
    return new RulesAnonymizer([]);
  }

  static get default(): RulesAnonymizer {
    return RulesAnonymizer.empty
      .anonymizeRequestHeader('authorization')
      .maskRequestBody(DEFAULT_PASSWORD_PATTERN);
  }

  with(rule: AnonymizeRule): RulesAnonymizer {
    return new RulesAnonymizer([...this.rules, rule]);
  }

  anonymizeRequestHeader(name: string, replacement = ANONYMIZED_VALUE): RulesAnonymizer {
    return this.with((message) => ({
      ...message,
      request: {
        ...message.request,
        headers: replaceHeader(message.request.headers, name, replacement),
      },
    }));
  }

  anonymizeResponseHeader(name: string, replacement = ANONYMIZED_VALUE): RulesAnonymizer {
    return this.with((message) => ({
      ...message,
      response: {
        ...message.response,
        headers: replaceHeader(message.response.headers, name, replacement),
      },
    }));
  }

  anonymizeRequestQueryStringParameter(
    name: string,
    replacement = ANONYMIZED_VALUE,
  ): RulesAnonymizer {
    return this.with((message) => ({
      ...message,
      request: {
        ...message.request,
        url: replaceQueryParameter(message.request.url, name, replacement),
      },
    }));
  }

  maskRequestBody(pattern: RegExp): RulesAnonymizer {
    return this.with((message) => ({
      ...message,
      request: { ...message.request, body: maskBody(message.request.body, pattern) },
    }));
  }

  maskResponseBody(pattern: RegExp): RulesAnonymizer {
    return this.with((message) => ({
      ...message,
      response: { ...message.response, body: maskBody(message.response.body, pattern) },
    }));
  }

  async anonymize(interaction: Interaction): Promise<Interaction> {
    return {
      ...interaction,
      messages: interaction.messages.map((message) =>
        this.rules.reduce((current, rule) => rule(current), message),
      ),
    };
  }
}

export const noopAnonymizer: InteractionAnonymizer = {
  anonymize: async (interaction) => interaction,
};
