import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RulesAnonymizer } from '../anonymizers/RulesAnonymizer.js';
import {
  ErrorKinds,
  MalformedArchiveError,
  NoSuchInteractionError,
  PersistenceIOError,
} from '../errors.js';
import type { Interaction, InteractionMessage } from '../types.js';
import { HttpArchiveRepository } from './HttpArchiveRepository.js';

const TEST_RECORDINGS_DIR = path.join(process.cwd(), 'test-archive-repository');

const createMessage = (pathname: string, authorization = 'Bearer test-secret'): InteractionMessage => ({
  request: {
    method: 'GET',
    url: `https://api.example.com${pathname}`,
    headers: [{ name: 'authorization', value: authorization }],
    body: null,
  },
  response: {
    status: 200,
    statusText: 'OK',
    headers: [{ name: 'content-type', value: 'text/plain' }],
    body: `body of ${pathname}`,
    contentLength: Buffer.byteLength(`body of ${pathname}`),
  },
  timings: { startedAt: new Date('2024-01-01T00:00:00.000Z'), elapsed: 5 },
});

const interactionOf = (name: string, ...messages: InteractionMessage[]): Interaction => ({
  name,
  messages,
});

describe('HttpArchiveRepository', () => {
  beforeEach(async () => {
    await fs.rm(TEST_RECORDINGS_DIR, { recursive: true, force: true });
  });

  afterEach(async () => {
    await fs.rm(TEST_RECORDINGS_DIR, { recursive: true, force: true });
  });

  it('should name archives after the interaction', () => {
    const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

    expect(repository.kind).toBe('archive');
    expect(repository.getArchivePath('users/list')).toBe(
      path.join(TEST_RECORDINGS_DIR, 'users__list.har'),
    );
  });

  it('should store, find and load an interaction', async () => {
    const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });
    const interaction = interactionOf('users', createMessage('/users'));

    expect(await repository.exists('users')).toBe(false);
    expect(await repository.store(interaction)).toEqual(interaction);
    expect(await repository.exists('users')).toBe(true);
    expect(await repository.load('users')).toEqual(interaction);
  });

  it('should create the recordings directory when needed', async () => {
    const recordingsDir = path.join(TEST_RECORDINGS_DIR, 'nested', 'dir');
    const repository = new HttpArchiveRepository({ recordingsDir });

    await repository.store(interactionOf('users', createMessage('/users')));

    expect(await fs.readdir(recordingsDir)).toEqual(['users.har']);
  });

  it('should append to an existing archive', async () => {
    const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

    await repository.store(interactionOf('flow', createMessage('/first')));
    await repository.store(interactionOf('flow', createMessage('/second'), createMessage('/third')));

    const loaded = await repository.load('flow');
    expect(loaded.messages.map((message) => message.request.url)).toEqual([
      'https://api.example.com/first',
      'https://api.example.com/second',
      'https://api.example.com/third',
    ]);
  });

  it('should not write anything for an empty interaction', async () => {
    const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

    expect(await repository.store(interactionOf('empty'))).toBeNull();
    expect(await repository.exists('empty')).toBe(false);
  });

  it('should throw NoSuchInteraction when loading a missing archive', async () => {
    const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

    await expect(repository.load('missing')).rejects.toBeInstanceOf(NoSuchInteractionError);
    await expect(repository.load('missing')).rejects.toMatchObject({
      kind: ErrorKinds.noSuchInteraction,
      interactionName: 'missing',
    });
  });

  it('should anonymize what it stores and return the anonymized messages', async () => {
    const repository = new HttpArchiveRepository({
      recordingsDir: TEST_RECORDINGS_DIR,
      anonymizer: RulesAnonymizer.default,
    });

    const stored = await repository.store(interactionOf('auth', createMessage('/me')));

    expect(stored?.messages[0].request.headers).toEqual([
      { name: 'authorization', value: '********' },
    ]);
    const text = await fs.readFile(repository.getArchivePath('auth'), 'utf8');
    expect(text).not.toContain('test-secret');
  });

  it('should re-anonymize earlier entries when rewriting the archive', async () => {
    const plain = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });
    const anonymizing = new HttpArchiveRepository({
      recordingsDir: TEST_RECORDINGS_DIR,
      anonymizer: RulesAnonymizer.default,
    });

    await plain.store(interactionOf('auth', createMessage('/before')));
    await anonymizing.store(interactionOf('auth', createMessage('/after')));

    const loaded = await plain.load('auth');
    expect(loaded.messages.map((message) => message.request.headers[0].value)).toEqual([
      '********',
      '********',
    ]);
  });

  it('should write the same bytes with the splice strategy as with a rewrite', async () => {
    const rewriteDir = path.join(TEST_RECORDINGS_DIR, 'rewrite');
    const spliceDir = path.join(TEST_RECORDINGS_DIR, 'splice');
    const rewrite = new HttpArchiveRepository({ recordingsDir: rewriteDir });
    const splice = new HttpArchiveRepository({
      recordingsDir: spliceDir,
      appendStrategy: 'splice',
    });

    for (const pathname of ['/one', '/two', '/three']) {
      await rewrite.store(interactionOf('flow', createMessage(pathname)));
      await splice.store(interactionOf('flow', createMessage(pathname)));
    }

    expect(await fs.readFile(splice.getArchivePath('flow'), 'utf8')).toBe(
      await fs.readFile(rewrite.getArchivePath('flow'), 'utf8'),
    );
  });

  it('should keep every entry when many stores run concurrently', async () => {
    const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });
    const paths = Array.from({ length: 20 }, (_, i) => `/item/${i}`);

    await Promise.all(
      paths.map((pathname) => repository.store(interactionOf('parallel', createMessage(pathname)))),
    );

    const loaded = await repository.load('parallel');
    expect(loaded.messages).toHaveLength(20);
    expect(new Set(loaded.messages.map((message) => new URL(message.request.url).pathname))).toEqual(
      new Set(paths),
    );
    expect(await fs.readdir(TEST_RECORDINGS_DIR)).toEqual(['parallel.har']);
  });

  it('should share locks between repositories writing the same file', async () => {
    const first = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });
    const second = new HttpArchiveRepository({
      recordingsDir: TEST_RECORDINGS_DIR,
      appendStrategy: 'splice',
    });

    await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        (i % 2 === 0 ? first : second).store(interactionOf('shared', createMessage(`/n/${i}`))),
      ),
    );

    expect((await first.load('shared')).messages).toHaveLength(10);
  });

  describe('with a malformed archive on disk', () => {
    const writeArchive = async (content: string) => {
      await fs.mkdir(TEST_RECORDINGS_DIR, { recursive: true });
      await fs.writeFile(path.join(TEST_RECORDINGS_DIR, 'broken.har'), content, 'utf8');
    };

    it('should throw MalformedArchive on load when the schema does not match', async () => {
      await writeArchive('{"log":{"version":"1.2","entries":[]}}');
      const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

      await expect(repository.load('broken')).rejects.toBeInstanceOf(MalformedArchiveError);
      await expect(repository.load('broken')).rejects.toThrow('log.creator: Required');
    });

    it('should throw PersistenceIOFailure on load when the JSON cannot be decoded', async () => {
      await writeArchive('{"log":');
      const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

      await expect(repository.load('broken')).rejects.toBeInstanceOf(PersistenceIOError);
    });

    it('should refuse to append and leave the file unchanged', async () => {
      const content = '{"log":{"version":"1.2","entries":[]}}';
      await writeArchive(content);
      const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

      await expect(
        repository.store(interactionOf('broken', createMessage('/x'))),
      ).rejects.toBeInstanceOf(MalformedArchiveError);
      expect(await fs.readFile(repository.getArchivePath('broken'), 'utf8')).toBe(content);
    });
  });

  it('should report unreadable archives as persistence failures', async () => {
    // A directory where the archive should be cannot be read as a file
    await fs.mkdir(path.join(TEST_RECORDINGS_DIR, 'dir.har'), { recursive: true });
    const repository = new HttpArchiveRepository({ recordingsDir: TEST_RECORDINGS_DIR });

    await expect(repository.load('dir')).rejects.toMatchObject({
      kind: ErrorKinds.persistenceIOFailure,
    });
  });
});
