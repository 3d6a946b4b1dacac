import { flagDispute, getDispute, listDisputes } from '../../src/services/dispute.service';
import { getEventsForUser, recordEvent } from '../../src/services/audit.service';
import { AuditRepository } from '../../src/database';
import { seedDemoData } from '../helpers/fixtures';

describe('Dispute Service', () => {
  beforeAll(async () => {
    await seedDemoData();
  });

  describe('flagDispute', () => {
    it('should flag one of the user\'s transactions', async () => {
      const result = await flagDispute('user_001', {
        transactionId: 'txn_1010',
        complaint: 'Headphones never arrived',
      });

      expect(result.dispute).toMatchObject({
        transactionId: 'txn_1010',
        userId: 'user_001',
        complaint: 'Headphones never arrived',
        status: 'flagged',
        resolutionNotes: null,
      });
      expect(result.dispute.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(result.transaction.merchantName).toBe('GadgetHub');
      expect(result.message).toBe('Dispute flagged for GadgetHub USD 249.99 on 2024-11-12.');
      expect(result.nextSteps).toHaveLength(3);

      const events = await getEventsForUser('user_001');
      expect(events.find((event) => event.event === 'dispute_flagged')).toMatchObject({
        entityId: result.dispute.id,
        details: { transactionId: 'txn_1010', complaint: 'Headphones never arrived' },
      });
    });

    it('should refuse a second open dispute for the same transaction', async () => {
      await expect(
        flagDispute('user_001', { transactionId: 'txn_1010', complaint: 'Still waiting' })
      ).rejects.toMatchObject({
        statusCode: 409,
        message: expect.stringMatching(/^Transaction txn_1010 already has an open dispute \(.+, flagged\)$/),
      });
    });

    it('should keep one open dispute when two flags race', async () => {
      const results = await Promise.allSettled([
        flagDispute('user_001', { transactionId: 'txn_1013', complaint: 'Charged twice' }),
        flagDispute('user_001', { transactionId: 'txn_1013', complaint: 'Charged twice' }),
      ]);

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected'
      );

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toMatchObject({
        statusCode: 409,
        message: expect.stringMatching(/^Transaction txn_1013 already has an open dispute/),
      });

      const disputes = await listDisputes('user_001');
      expect(disputes.filter((dispute) => dispute.transactionId === 'txn_1013')).toHaveLength(1);
    });

    it('should hide transactions that belong to another user', async () => {
      await expect(
        flagDispute('user_002', { transactionId: 'txn_1001', complaint: 'Not mine' })
      ).rejects.toMatchObject({
        statusCode: 404,
        message: 'Transaction txn_1001 not found for this user',
      });
    });

    it('should reject an unknown transaction', async () => {
      await expect(
        flagDispute('user_001', { transactionId: 'txn_missing', complaint: 'Unknown' })
      ).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  describe('getDispute', () => {
    it('should return the dispute with its transaction', async () => {
      const { dispute } = await flagDispute('user_002', {
        transactionId: 'txn_2003',
        complaint: 'Pump charged twice',
      });

      const result = await getDispute('user_002', dispute.id);

      expect(result.dispute).toEqual(dispute);
      expect(result.transaction).toMatchObject({ id: 'txn_2003', formattedAmount: 'USD 73.20' });
    });

    it('should not show a dispute to another user', async () => {
      const [dispute] = await listDisputes('user_002');

      await expect(getDispute('user_001', dispute.id)).rejects.toMatchObject({
        statusCode: 404,
        message: `Dispute not found: ${dispute.id}`,
      });
    });
  });

  describe('listDisputes', () => {
    it('should list the user\'s disputes newest first', async () => {
      await flagDispute('user_002', { transactionId: 'txn_2004', complaint: 'Wrong edition' });

      const disputes = await listDisputes('user_002');

      expect(disputes.map((dispute) => dispute.transactionId).sort()).toEqual(['txn_2003', 'txn_2004']);
      expect(disputes[0].createdAt >= disputes[1].createdAt).toBe(true);
    });

    it('should return nothing for a user without disputes', async () => {
      await expect(listDisputes('user_003')).resolves.toEqual([]);
    });
  });
});

describe('Audit Service', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the new event id', async () => {
    const id = await recordEvent({ userId: 'user_009', event: 'dispute_flagged', entityId: 'd-1' });

    expect(typeof id).toBe('number');
    const [event] = await getEventsForUser('user_009');
    expect(event).toMatchObject({ id, event: 'dispute_flagged', entityId: 'd-1', details: {} });
  });

  it('should swallow a failed write', async () => {
    jest.spyOn(AuditRepository.prototype, 'create').mockRejectedValue({ status: 400 });

    await expect(
      recordEvent({ userId: 'user_009', event: 'transaction_resolved', entityId: 'txn_1001' })
    ).resolves.toBeNull();
  });
});
