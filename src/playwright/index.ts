import type { TestInfo } from '@playwright/test';

import type { RecorderOptionsInput } from '../config.js';
import {
  defaultSessionManager,
  type RecorderContext,
  type SessionManager,
} from '../context/SessionManager.js';

export type PlaywrightTestInfo = Pick<TestInfo, 'title' | 'titlePath'>;

interface ParsedPath {
  folder: string | null;
  fileName: string | null;
}

function parseSpecFilePath(specPath: string): ParsedPath {
  // Try to match 'folder/FileName.(spec|test).ts' pattern
  const folderMatch = specPath.match(/^(.+?)\/([^/]+)\.(spec|test)\.ts$/);
  if (folderMatch) {
    return { folder: folderMatch[1], fileName: folderMatch[2] };
  }

  // Try to match 'FileName.(spec|test).ts' pattern (no folder)
  const fileMatch = specPath.match(/^([^/]+)\.(spec|test)\.ts$/);
  if (fileMatch) {
    return { folder: null, fileName: fileMatch[1] };
  }

  return { folder: null, fileName: null };
}

function toSlug(title: string): string {
  return title.toLowerCase().replaceAll(/\s+/g, '-');
}

/**
 * Generate an interaction name from test info
 * Supports both .spec.ts and .test.ts extensions
 * Example: ['jobs/Create.spec.ts', 'create a job'] becomes 'jobs/Create__create-a-job'
 * @param testInfo - Playwright test info object
 */
export function generateInteractionName(testInfo: PlaywrightTestInfo): string {
  const { titlePath } = testInfo;
  const testName = titlePath.at(-1);

  if (titlePath.length === 0 || testName === undefined) {
    return toSlug(testInfo.title);
  }

  const { folder, fileName } = parseSpecFilePath(titlePath[0]);
  const slug = toSlug(testName);

  if (folder && fileName) {
    return `${folder}/${fileName}__${slug}`;
  }
  if (fileName) {
    return `${fileName}__${slug}`;
  }
  return slug;
}

export type PlaywrightRecorderOptions = Omit<RecorderOptionsInput, 'interactionName'> & {
  sessionManager?: SessionManager;
};

let activeContext: RecorderContext | null = null;

export const playwrightRecorder = {
  /**
   * Opens a recorder context named after the running test. Pair with after()
   * in afterEach so the next test can open its own.
   */
  before(
    testInfo: PlaywrightTestInfo,
    options: PlaywrightRecorderOptions = {},
  ): RecorderContext {
    const { sessionManager = defaultSessionManager, ...recorderOptions } = options;
    const interactionName = generateInteractionName(testInfo);

    activeContext = sessionManager.acquire({ ...recorderOptions, interactionName });
    recorderOptions.logger?.debug(`[Setup] Recorder context opened: ${interactionName}`);
    return activeContext;
  },

  /** Releases the context opened by before(), if any. */
  after(): void {
    activeContext?.release();
    activeContext = null;
  },
};
