import type { RecorderOptionsInput } from '../config.js';
import { MultipleActiveContextsError } from '../errors.js';
import { RecorderInterceptor } from '../RecorderInterceptor.js';
import type { ResolvedMode } from '../types.js';

/**
 * Handle on the active recording/replay session. Calls routed through a
 * context share one interceptor, so the mode is resolved once and recorded
 * messages are consumed from one replay pool.
 */
export class RecorderContext {
  readonly interceptor: RecorderInterceptor;
  private readonly manager: SessionManager;
  private released = false;

  constructor(manager: SessionManager, options: RecorderOptionsInput) {
    this.manager = manager;
    this.interceptor = new RecorderInterceptor(options);
  }

  get interactionName(): string {
    return this.interceptor.interactionName;
  }

  get isActive(): boolean {
    return !this.released && this.manager.current === this;
  }

  resolveExecutionMode(): Promise<ResolvedMode> {
    return this.interceptor.resolveExecutionMode();
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.manager.release(this);
  }
}

/**
 * Tracks the single active RecorderContext. JavaScript runs the
 * check-and-set in acquire() without interleaving, so no lock is needed.
 */
export class SessionManager {
  private active: RecorderContext | null = null;

  get current(): RecorderContext | null {
    return this.active;
  }

  acquire(options: RecorderOptionsInput): RecorderContext {
    if (this.active) {
      throw new MultipleActiveContextsError(this.active.interactionName);
    }
    const context = new RecorderContext(this, options);
    this.active = context;
    return context;
  }

  release(context: RecorderContext): void {
    if (this.active === context) {
      this.active = null;
    }
  }

  /**
   * Runs `task` inside a fresh context and releases it however `task` ends.
   */
  async withContext<T>(
    options: RecorderOptionsInput,
    task: (context: RecorderContext) => Promise<T>,
  ): Promise<T> {
    const context = this.acquire(options);
    try {
      return await task(context);
    } finally {
      context.release();
    }
  }
}

export const defaultSessionManager = new SessionManager();

export function withRecorderContext<T>(
  options: RecorderOptionsInput,
  task: (context: RecorderContext) => Promise<T>,
  manager: SessionManager = defaultSessionManager,
): Promise<T> {
  return manager.withContext(options, task);
}
