import type { Interaction } from '../types.js';

export type RepositoryKind = 'archive' | 'logger' | 'null';

/**
 * Persistence boundary for interactions. Implementations are selected when the
 * recorder is configured and share no state.
 */
export interface InteractionRepository {
  readonly kind: RepositoryKind;

  exists(interactionName: string): Promise<boolean>;

  load(interactionName: string): Promise<Interaction>;

  /**
   * Persists the interaction and resolves to what was stored, or to null when
   * nothing was stored (disabled or write-only sinks). Null is not a failure.
   */
  store(interaction: Interaction): Promise<Interaction | null>;
}

/** How new entries reach an archive file that already exists. */
export type AppendStrategy = 'rewrite' | 'splice';
