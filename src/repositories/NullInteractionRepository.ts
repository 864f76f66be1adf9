import { NoSuchInteractionError } from '../errors.js';
import type { Interaction } from '../types.js';
import type { InteractionRepository } from './InteractionRepository.js';

/** Used when recording is disabled: nothing exists and nothing is kept. */
export class NullInteractionRepository implements InteractionRepository {
  readonly kind = 'null';

  async exists(_interactionName: string): Promise<boolean> {
    return false;
  }

  async load(interactionName: string): Promise<Interaction> {
    throw new NoSuchInteractionError(interactionName);
  }

  async store(_interaction: Interaction): Promise<Interaction | null> {
    return null;
  }
}
