/**
 * Merchant Name Normalization
 *
 * Merchant comparison is case-insensitive and ignores surrounding or repeated
 * whitespace. Punctuation is kept: "AT&T" and "ATT" are different names.
 *
 * Example transformations:
 * - "  Coffee   Palace " → "coffee palace"
 * - "SQ *COFFEE PALACE" → "sq *coffee palace"
 */

/**
 * Normalizes merchant text for exact comparison.
 *
 * @param input - Merchant name, alias or user-supplied text
 * @returns Lowercased, trimmed, whitespace-collapsed string
 *
 * @example
 * normalizeMerchantName("Coffee  Palace") // Returns: "coffee palace"
 */
export function normalizeMerchantName(input: string): string {
  return input.toLowerCase().trim().replace(/\s+/g, ' ');
}

export default normalizeMerchantName;
