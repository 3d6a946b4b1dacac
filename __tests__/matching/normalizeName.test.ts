import { normalizeMerchantName } from '../../src/matching/normalizeName';

describe('normalizeMerchantName', () => {
  it('should lowercase', () => {
    expect(normalizeMerchantName('COFFEE PALACE')).toBe('coffee palace');
  });

  it('should trim and collapse whitespace', () => {
    expect(normalizeMerchantName('  Coffee \t  Palace  ')).toBe('coffee palace');
  });

  it('should keep punctuation', () => {
    expect(normalizeMerchantName('CP*Coffee Palace')).toBe('cp*coffee palace');
    expect(normalizeMerchantName('AT&T')).not.toBe(normalizeMerchantName('ATT'));
  });

  it('should return an empty string for blank input', () => {
    expect(normalizeMerchantName('   ')).toBe('');
  });
});
