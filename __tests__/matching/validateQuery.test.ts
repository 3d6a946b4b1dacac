/**
 * Tests for Match Query Validation
 */

import { fingerprintQuery, validateMatchQuery } from '../../src/matching/validateQuery';

describe('validateMatchQuery', () => {
  it('should accept a partial query and coerce numeric strings', () => {
    const result = validateMatchQuery({ amount: '50.00', merchantText: ' Coffee Palace ' });

    expect(result).toEqual({ success: true, data: { amount: 50, merchantText: 'Coffee Palace' } });
  });

  it('should parse the date as a UTC calendar day', () => {
    const result = validateMatchQuery({ date: '2024-11-02' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.date?.toISOString()).toBe('2024-11-02T00:00:00.000Z');
    }
  });

  it('should reject an empty query', () => {
    const result = validateMatchQuery({});

    expect(result).toEqual({
      success: false,
      error: {
        kind: 'InvalidQuery',
        issues: [
          {
            field: 'query',
            message: 'At least one of amount, date, merchantText or transactionId is required',
          },
        ],
      },
    });
  });

  it('should treat a missing body as an empty query', () => {
    expect(validateMatchQuery(undefined).success).toBe(false);
  });

  it('should reject a negative amount', () => {
    const result = validateMatchQuery({ amount: -5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toContainEqual({ field: 'amount', message: 'amount cannot be negative' });
    }
  });

  it('should reject a non-numeric amount', () => {
    const result = validateMatchQuery({ amount: 'fifty' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toContainEqual({ field: 'amount', message: 'amount must be a number' });
    }
  });

  it('should reject an impossible date', () => {
    const result = validateMatchQuery({ date: '2024-02-30' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toContainEqual({
        field: 'date',
        message: 'date must be a valid YYYY-MM-DD date',
      });
    }
  });

  it('should reject blank merchant text', () => {
    const result = validateMatchQuery({ merchantText: '   ' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toContainEqual({
        field: 'merchantText',
        message: 'merchantText cannot be empty',
      });
    }
  });

  it('should reject unknown fields', () => {
    const result = validateMatchQuery({ amount: 10, merchant: 'Coffee Palace' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].field).toBe('query');
    }
  });
});

describe('fingerprintQuery', () => {
  it('should ignore merchant text case', () => {
    expect(fingerprintQuery({ merchantText: 'Coffee Palace' })).toBe(
      fingerprintQuery({ merchantText: 'coffee palace' })
    );
  });

  it('should differ when a field differs', () => {
    expect(fingerprintQuery({ amount: 50 })).not.toBe(fingerprintQuery({ amount: 51 }));
  });
});
