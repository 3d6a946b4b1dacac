/**
 * Merchant Name Similarity
 *
 * Used only to suggest merchants when a search finds nothing.
 * Scoring never uses it: the merchant dimension is an exact or substring match.
 *
 * Jaro-Winkler, which weights a shared prefix more heavily.
 */

import natural from 'natural';
import { normalizeMerchantName } from './normalizeName';

/**
 * Calculates the similarity between two merchant names.
 *
 * @returns Similarity from 0 to 1
 *
 * @example
 * calculateNameSimilarity("Coffee Palace", "coffee palace") // 1
 * calculateNameSimilarity("Cofee Palace", "Coffee Palace")  // ~0.97
 */
export function calculateNameSimilarity(a: string, b: string): number {
  const left = normalizeMerchantName(a);
  const right = normalizeMerchantName(b);

  if (!left || !right) {
    return 0;
  }

  if (left === right) {
    return 1;
  }

  return natural.JaroWinklerDistance(left, right, {});
}

export default calculateNameSimilarity;
