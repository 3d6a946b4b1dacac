/**
 * Merchant Service
 *
 * Merchant catalog access for scoring and the "who is this merchant" lookup.
 * Catalog reads go through the storage provider's resilience stack and the
 * snapshot cache.
 */

import { getDatabase, MerchantRepository } from '../database';
import { getMerchantsWithCache } from '../redis';
import { resilienceGateway, PROVIDERS } from '../resilience';
import { MerchantResolver, type MerchantSuggestion } from '../matching/merchantResolver';
import type { Merchant } from '../matching/types';
import { AppError } from '../utils';

// ============================================
// Types
// ============================================

export interface MerchantSearchResult {
  found: boolean;
  count: number;
  merchants: Merchant[];
  suggestions: MerchantSuggestion[];
  message: string;
}

const repository = (): MerchantRepository => new MerchantRepository(getDatabase());

// ============================================
// Catalog
// ============================================

export function getMerchantCatalog(signal?: AbortSignal): Promise<Merchant[]> {
  return resilienceGateway.execute(
    PROVIDERS.STORAGE,
    () => getMerchantsWithCache(() => repository().findAll()),
    { signal }
  );
}

/**
 * Builds a resolver over the current catalog
 */
export async function getMerchantResolver(signal?: AbortSignal): Promise<MerchantResolver> {
  return new MerchantResolver(await getMerchantCatalog(signal));
}

// ============================================
// Lookups
// ============================================

/**
 * @throws AppError 404 when the merchant does not exist
 */
export async function getMerchant(merchantId: string): Promise<Merchant> {
  const merchant = await resilienceGateway.execute(PROVIDERS.STORAGE, () =>
    repository().findById(merchantId)
  );

  if (!merchant) {
    throw AppError.notFound(`Merchant not found: ${merchantId}`);
  }

  return merchant;
}

/**
 * Searches by name or alias, offering close names when nothing matches
 */
export async function searchMerchants(name: string): Promise<MerchantSearchResult> {
  const resolver = await getMerchantResolver();
  const merchants = resolver.search(name);

  if (merchants.length > 0) {
    return {
      found: true,
      count: merchants.length,
      merchants,
      suggestions: [],
      message: `Found ${merchants.length} merchant${merchants.length === 1 ? '' : 's'} matching '${name}'.`,
    };
  }

  const suggestions = resolver.suggest(name);

  return {
    found: false,
    count: 0,
    merchants: [],
    suggestions,
    message:
      suggestions.length > 0
        ? `No merchant found matching '${name}'. Did you mean ${suggestions
            .map((suggestion) => `'${suggestion.merchant.canonicalName}'`)
            .join(' or ')}?`
        : `No merchant found matching '${name}'. Try a different spelling or check how the name appears on the statement.`,
  };
}

export const merchantService = {
  getMerchantCatalog,
  getMerchantResolver,
  getMerchant,
  searchMerchants,
};

export default merchantService;
