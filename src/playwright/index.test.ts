import { afterEach, describe, expect, it } from 'vitest';

import { SessionManager } from '../context/SessionManager.js';
import { MultipleActiveContextsError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { PlaywrightTestInfo } from './index.js';
import { generateInteractionName, playwrightRecorder } from './index.js';

const testInfo = (titlePath: string[], title = titlePath.at(-1) ?? ''): PlaywrightTestInfo => ({
  title,
  titlePath,
});

describe('generateInteractionName', () => {
  it('should combine folder, spec file and test title', () => {
    expect(generateInteractionName(testInfo(['jobs/Create.spec.ts', 'create a job']))).toBe(
      'jobs/Create__create-a-job',
    );
  });

  it('should support .test.ts files without a folder', () => {
    expect(generateInteractionName(testInfo(['Login.test.ts', 'logs in']))).toBe(
      'Login__logs-in',
    );
  });

  it('should use the innermost title for nested describe blocks', () => {
    expect(
      generateInteractionName(
        testInfo(['users/profile/Update.spec.ts', 'profile', 'updates   the name']),
      ),
    ).toBe('users/profile/Update__updates-the-name');
  });

  it('should fall back to the test title for other files', () => {
    expect(generateInteractionName(testInfo(['scenario.ts', 'Plain Test']))).toBe('plain-test');
    expect(generateInteractionName(testInfo([], 'Only Title'))).toBe('only-title');
  });
});

describe('playwrightRecorder', () => {
  const sessionManager = new SessionManager();
  const options = {
    sessionManager,
    recordingsDir: 'unused-recordings',
    logger: silentLogger,
    env: {},
  };

  afterEach(() => {
    playwrightRecorder.after();
  });

  it('should open a context named after the test', () => {
    const context = playwrightRecorder.before(
      testInfo(['jobs/Create.spec.ts', 'create a job']),
      options,
    );

    expect(context.interactionName).toBe('jobs/Create__create-a-job');
    expect(sessionManager.current).toBe(context);
  });

  it('should release the context in after()', () => {
    const context = playwrightRecorder.before(testInfo(['a.spec.ts', 'first']), options);

    playwrightRecorder.after();

    expect(context.isActive).toBe(false);
    expect(sessionManager.current).toBeNull();
  });

  it('should refuse a second before() without after()', () => {
    playwrightRecorder.before(testInfo(['a.spec.ts', 'first']), options);

    expect(() => playwrightRecorder.before(testInfo(['a.spec.ts', 'second']), options)).toThrow(
      MultipleActiveContextsError,
    );
  });

  it('should do nothing on after() without before()', () => {
    expect(() => playwrightRecorder.after()).not.toThrow();
    expect(sessionManager.current).toBeNull();
  });
});
