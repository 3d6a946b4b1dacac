/**
 * Merchant Resolver
 *
 * Maps merchant free text onto the merchant catalog.
 *
 * - resolve(): exact, case-insensitive match. Canonical-name matches rank
 *   above alias-only matches.
 * - search(): resolve() first, then merchants whose name or an alias
 *   contains the text. Backs the merchant lookup endpoint.
 * - suggest(): "did you mean" candidates by name similarity.
 *
 * scoreMerchant() applies the same exact-or-contained rule to one merchant
 * for the scoring dimension.
 */

import { normalizeMerchantName } from './normalizeName';
import { calculateNameSimilarity } from './nameSimilarity';
import { MAX_SUGGESTIONS, SUGGESTION_MIN_SIMILARITY } from './constants';
import type { Merchant } from './types';

export interface MerchantSuggestion {
  merchant: Merchant;
  similarity: number;
}

interface IndexedMerchant {
  merchant: Merchant;
  name: string;
  aliases: string[];
}

export class MerchantResolver {
  private readonly entries: IndexedMerchant[];
  private readonly byId: Map<string, Merchant>;

  constructor(merchants: readonly Merchant[]) {
    this.entries = merchants.map((merchant) => ({
      merchant,
      name: normalizeMerchantName(merchant.canonicalName),
      aliases: merchant.aliases.map(normalizeMerchantName),
    }));
    this.byId = new Map(merchants.map((merchant) => [merchant.id, merchant]));
  }

  get size(): number {
    return this.entries.length;
  }

  getById(merchantId: string): Merchant | undefined {
    return this.byId.get(merchantId);
  }

  list(): Merchant[] {
    return this.entries.map((entry) => entry.merchant);
  }

  /**
   * Exact matches, canonical name first. No match returns an empty array.
   */
  resolve(text: string): Merchant[] {
    const needle = normalizeMerchantName(text);
    if (!needle) {
      return [];
    }

    const byName = this.entries.filter((entry) => entry.name === needle);
    const byAlias = this.entries.filter(
      (entry) => entry.name !== needle && entry.aliases.includes(needle)
    );

    return [...byName, ...byAlias].map((entry) => entry.merchant);
  }

  /**
   * Exact matches followed by substring matches on name or alias
   */
  search(text: string): Merchant[] {
    const needle = normalizeMerchantName(text);
    if (!needle) {
      return [];
    }

    const exact = this.resolve(text);
    const seen = new Set(exact.map((merchant) => merchant.id));

    const partial = this.entries
      .filter(
        (entry) =>
          !seen.has(entry.merchant.id) &&
          (entry.name.includes(needle) || entry.aliases.some((alias) => alias.includes(needle)))
      )
      .map((entry) => entry.merchant);

    return [...exact, ...partial];
  }

  /**
   * Merchants whose name or an alias is close to the text, most similar first
   */
  suggest(text: string, limit = MAX_SUGGESTIONS): MerchantSuggestion[] {
    if (!normalizeMerchantName(text)) {
      return [];
    }

    return this.entries
      .map((entry) => ({
        merchant: entry.merchant,
        similarity: Math.max(
          calculateNameSimilarity(text, entry.name),
          ...entry.aliases.map((alias) => calculateNameSimilarity(text, alias))
        ),
      }))
      .filter((suggestion) => suggestion.similarity >= SUGGESTION_MIN_SIMILARITY)
      .sort((a, b) => b.similarity - a.similarity || a.merchant.id.localeCompare(b.merchant.id))
      .slice(0, limit);
  }
}

/**
 * Scores the merchant dimension for one merchant.
 *
 * @returns 1 when the text equals or is contained in the canonical name or an
 *          alias (case-insensitive), 0 otherwise, and a neutral 1 when the query
 *          has no merchant text
 *
 * @example
 * scoreMerchant('coffee', coffeePalace)      // 1
 * scoreMerchant('tea house', coffeePalace)   // 0
 */
export function scoreMerchant(queryText: string | undefined, merchant: Merchant | undefined): number {
  if (queryText === undefined) {
    return 1;
  }
  if (!merchant) {
    return 0;
  }

  const needle = normalizeMerchantName(queryText);
  const names = [merchant.canonicalName, ...merchant.aliases].map(normalizeMerchantName);

  if (needle.length === 0) {
    return 0;
  }

  return names.some((name) => name.includes(needle)) ? 1 : 0;
}

export default MerchantResolver;
