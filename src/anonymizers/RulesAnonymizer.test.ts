import { describe, expect, it } from 'vitest';

import type { Interaction, InteractionMessage } from '../types.js';
import { maskText, RulesAnonymizer } from './RulesAnonymizer.js';

const createMessage = (
  overrides: Partial<InteractionMessage['request']> = {},
): InteractionMessage => ({
  request: {
    method: 'POST',
    url: 'https://api.example.com/login',
    headers: [
      { name: 'Authorization', value: 'Bearer test-secret' },
      { name: 'content-type', value: 'application/x-www-form-urlencoded' },
    ],
    body: 'user=alice&password=secret123',
    ...overrides,
  },
  response: {
    status: 200,
    statusText: 'OK',
    headers: [{ name: 'set-cookie', value: 'session=test-session' }],
    body: '{"token":"test-token"}',
    contentLength: 22,
  },
  timings: { startedAt: new Date('2024-01-01T00:00:00.000Z'), elapsed: 3 },
});

const interactionOf = (...messages: InteractionMessage[]): Interaction => ({
  name: 'login',
  messages,
});

describe('RulesAnonymizer', () => {
  describe('default', () => {
    it('should replace the authorization header value and keep its name', async () => {
      const result = await RulesAnonymizer.default.anonymize(interactionOf(createMessage()));

      expect(result.messages[0].request.headers).toEqual([
        { name: 'Authorization', value: '********' },
        { name: 'content-type', value: 'application/x-www-form-urlencoded' },
      ]);
    });

    it('should mask form passwords with a same-length mask', async () => {
      const result = await RulesAnonymizer.default.anonymize(interactionOf(createMessage()));

      expect(result.messages[0].request.body).toBe('user=alice&password=*********');
    });

    it('should mask JSON passwords', async () => {
      const result = await RulesAnonymizer.default.anonymize(
        interactionOf(createMessage({ body: '{"username":"alice","password":"hunter2"}' })),
      );

      expect(result.messages[0].request.body).toBe('{"username":"alice","password":"*******"}');
    });

    it('should leave responses untouched', async () => {
      const message = createMessage();
      const result = await RulesAnonymizer.default.anonymize(interactionOf(message));

      expect(result.messages[0].response).toEqual(message.response);
    });

    it('should give the same result when applied twice', async () => {
      const once = await RulesAnonymizer.default.anonymize(interactionOf(createMessage()));
      const twice = await RulesAnonymizer.default.anonymize(once);

      expect(twice).toEqual(once);
    });

    it('should not modify the given interaction', async () => {
      const interaction = interactionOf(createMessage());

      await RulesAnonymizer.default.anonymize(interaction);

      expect(interaction.messages[0].request.body).toBe('user=alice&password=secret123');
      expect(interaction.messages[0].request.headers[0].value).toBe('Bearer test-secret');
    });

    it('should leave binary and absent bodies alone', async () => {
      const binary = Buffer.from('password=secret123');
      const result = await RulesAnonymizer.default.anonymize(
        interactionOf(createMessage({ body: binary }), createMessage({ body: null })),
      );

      expect(result.messages[0].request.body).toBe(binary);
      expect(result.messages[1].request.body).toBeNull();
    });
  });

  it('should do nothing when empty', async () => {
    const interaction = interactionOf(createMessage());

    expect(await RulesAnonymizer.empty.anonymize(interaction)).toEqual(interaction);
  });

  it('should replace response headers', async () => {
    const result = await RulesAnonymizer.empty
      .anonymizeResponseHeader('Set-Cookie', 'redacted')
      .anonymize(interactionOf(createMessage()));

    expect(result.messages[0].response.headers).toEqual([
      { name: 'set-cookie', value: 'redacted' },
    ]);
  });

  it('should replace query parameters in place', async () => {
    const anonymizer = RulesAnonymizer.empty.anonymizeRequestQueryStringParameter('token');
    const result = await anonymizer.anonymize(
      interactionOf(createMessage({ url: 'https://api.example.com/items?token=abc&page=1' })),
    );

    expect(result.messages[0].request.url).toBe(
      'https://api.example.com/items?token=********&page=1',
    );
    expect(await anonymizer.anonymize(result)).toEqual(result);
  });

  it('should keep URLs without the parameter as they are', async () => {
    const result = await RulesAnonymizer.empty
      .anonymizeRequestQueryStringParameter('token')
      .anonymize(interactionOf(createMessage({ url: 'https://api.example.com/items?page=1' })));

    expect(result.messages[0].request.url).toBe('https://api.example.com/items?page=1');
  });

  it('should mask response bodies by pattern', async () => {
    const result = await RulesAnonymizer.empty
      .maskResponseBody(/"token":"([^"]*)"/)
      .anonymize(interactionOf(createMessage()));

    expect(result.messages[0].response.body).toBe('{"token":"**********"}');
  });

  it('should apply custom rules after the built-in ones', async () => {
    const result = await RulesAnonymizer.default
      .with((message) => ({
        ...message,
        request: { ...message.request, method: message.request.method.toLowerCase() },
      }))
      .anonymize(interactionOf(createMessage()));

    expect(result.messages[0].request.method).toBe('post');
    expect(result.messages[0].request.headers[0].value).toBe('********');
  });
});

describe('maskText', () => {
  it('should mask every match of the whole pattern without a group', () => {
    expect(maskText('id=1 id=22', /id=\d+/)).toBe('**** *****');
  });

  it('should use one mask character per UTF-8 byte', () => {
    const text = 'password=pässwörd';

    const masked = maskText(text, /password=(\S+)/);

    expect(masked).toBe('password=**********');
    expect(Buffer.byteLength(masked, 'utf8')).toBe(Buffer.byteLength(text, 'utf8'));
  });

  it('should return text without matches as it is', () => {
    expect(maskText('nothing here', /secret/)).toBe('nothing here');
  });
});
