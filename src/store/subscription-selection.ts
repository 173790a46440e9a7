import type { ErrorInfo } from '../types/report.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { isWildcard, matchesAny, matchesWildcard } from '../utils/wildcard.js';
import type { SubscriptionStore } from './subscription-store.js';

export type SubscriptionSelection = {
  /** Matching subscriptions, sorted by name */
  subscriptions: Subscription[];
  /** Plain names that match no subscription */
  missing: string[];
  /** Selected definitions that could not be read */
  errors: { name: string; error: ErrorInfo }[];
};

/**
 * Resolve command-line name patterns against the store
 *
 * No patterns select every subscription. Wildcard patterns and the
 * select-all case leave out names matching `ignore`; a plain name is
 * always honoured.
 */
export async function selectSubscriptions(
  store: SubscriptionStore,
  patterns: readonly string[],
  ignore: readonly string[] = [],
): Promise<SubscriptionSelection> {
  const listing = await store.listAll();
  const known = [...listing.subscriptions.map((subscription) => subscription.name), ...listing.errors.map((e) => e.name)];

  const explicit = new Set<string>();
  const wildcards: string[] = [];
  const missing: string[] = [];
  for (const pattern of patterns) {
    if (isWildcard(pattern)) {
      wildcards.push(pattern);
    } else if (known.includes(pattern)) {
      explicit.add(pattern);
    } else if (!missing.includes(pattern)) {
      missing.push(pattern);
    }
  }

  const selected = (name: string): boolean => {
    if (explicit.has(name)) return true;
    if (matchesAny(name, ignore)) return false;
    if (patterns.length === 0) return true;
    return wildcards.some((pattern) => matchesWildcard(name, pattern));
  };

  return {
    subscriptions: listing.subscriptions.filter((subscription) => selected(subscription.name)),
    missing,
    errors: listing.errors.filter((failure) => selected(failure.name)),
  };
}
