import type {
  Interaction,
  InteractionMessage,
  RecordedRequest,
} from '../types.js';
import { bodiesEqual, getHeaderValues } from '../utils/httpHelpers.js';

export interface RequestMatcher {
  /**
   * Finds the recorded message answering `request`, or null when none does.
   */
  match(
    request: RecordedRequest,
    interaction: Interaction,
  ): InteractionMessage | null;
}

export type MatchRule = (
  request: RecordedRequest,
  message: InteractionMessage,
) => boolean;

function canonicalUrl(url: string): string {
  const parsed = new URL(url);
  const params = [...parsed.searchParams].sort(([aName, aValue], [bName, bValue]) =>
    aName === bName ? aValue.localeCompare(bValue) : aName.localeCompare(bName),
  );
  const query = new URLSearchParams(params).toString();
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}${query ? `?${query}` : ''}`;
}

export const MatchRules = {
  byHttpMethod: (): MatchRule => (request, message) =>
    request.method.toUpperCase() === message.request.method.toUpperCase(),

  byRequestUrl: (): MatchRule => (request, message) =>
    canonicalUrl(request.url) === canonicalUrl(message.request.url),

  byHeader:
    (name: string): MatchRule =>
    (request, message) => {
      const live = getHeaderValues(request.headers, name);
      const recorded = getHeaderValues(message.request.headers, name);
      return (
        live.length === recorded.length &&
        live.every((value, index) => value === recorded[index])
      );
    },

  byContent: (): MatchRule => (request, message) =>
    bodiesEqual(request.body, message.request.body),
};

/**
 * Matches requests against recorded messages by a set of rules that must all
 * agree. In match-once mode every recorded message answers a single request
 * per loaded interaction, so N identical calls replay N recordings in order.
 */
export class RulesMatcher implements RequestMatcher {
  private readonly rules: readonly MatchRule[];
  private readonly once: boolean;
  // Keyed by the loaded Interaction object: a fresh load starts a fresh pool
  private readonly consumed = new WeakMap<Interaction, Set<number>>();

  private constructor(once: boolean, rules: readonly MatchRule[]) {
    this.once = once;
    this.rules = rules;
  }

  static get matchOnce(): RulesMatcher {
    return new RulesMatcher(true, []);
  }

  static get matchMultiple(): RulesMatcher {
    return new RulesMatcher(false, []);
  }

  static get default(): RulesMatcher {
    return RulesMatcher.matchOnce.byHttpMethod().byRequestUrl();
  }

  by(rule: MatchRule): RulesMatcher {
    return new RulesMatcher(this.once, [...this.rules, rule]);
  }

  byHttpMethod(): RulesMatcher {
    return this.by(MatchRules.byHttpMethod());
  }

  byRequestUrl(): RulesMatcher {
    return this.by(MatchRules.byRequestUrl());
  }

  byHeader(name: string): RulesMatcher {
    return this.by(MatchRules.byHeader(name));
  }

  byContent(): RulesMatcher {
    return this.by(MatchRules.byContent());
  }

  match(
    request: RecordedRequest,
    interaction: Interaction,
  ): InteractionMessage | null {
    const served = this.getServedTracker(interaction);

    const index = interaction.messages.findIndex(
      (message, messageIndex) =>
        !served.has(messageIndex) &&
        this.rules.every((rule) => rule(request, message)),
    );
    if (index === -1) {
      return null;
    }

    if (this.once) {
      served.add(index);
    }
    return interaction.messages[index];
  }

  private getServedTracker(interaction: Interaction): Set<number> {
    let served = this.consumed.get(interaction);
    if (!served) {
      served = new Set();
      this.consumed.set(interaction, served);
    }
    return served;
  }
}
