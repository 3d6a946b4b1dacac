import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { seedDemoData } from './helpers/fixtures';

describe('Dispute Endpoints', () => {
  let app: Application;
  let disputeId: string;

  beforeAll(async () => {
    await seedDemoData();
    app = createApp();
  });

  describe('POST /api/v1/users/:userId/disputes', () => {
    it('should flag a transaction', async () => {
      const response = await request(app)
        .post('/api/v1/users/user_001/disputes')
        .send({ transactionId: 'txn_1005', complaint: '  Charged for items I returned  ' });

      expect(response.status).toBe(201);
      expect(response.body.data.dispute).toMatchObject({
        transactionId: 'txn_1005',
        complaint: 'Charged for items I returned',
        status: 'flagged',
      });
      expect(response.body.message).toBe('Dispute flagged for GreenLeaf Grocers USD 86.30 on 2024-11-07.');
      disputeId = response.body.data.dispute.id;
    });

    it('should answer 409 for a duplicate open dispute', async () => {
      const response = await request(app)
        .post('/api/v1/users/user_001/disputes')
        .send({ transactionId: 'txn_1005', complaint: 'Again' });

      expect(response.status).toBe(409);
      expect(response.body.success).toBe(false);
    });

    it('should answer 404 for another user\'s transaction', async () => {
      const response = await request(app)
        .post('/api/v1/users/user_002/disputes')
        .send({ transactionId: 'txn_1005', complaint: 'Not mine' });

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Transaction txn_1005 not found for this user');
    });

    it('should require a complaint', async () => {
      const response = await request(app)
        .post('/api/v1/users/user_001/disputes')
        .send({ transactionId: 'txn_1006', complaint: '   ' });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/complaint cannot be empty/);
    });
  });

  describe('GET /api/v1/users/:userId/disputes', () => {
    it('should list the user\'s disputes', async () => {
      const response = await request(app).get('/api/v1/users/user_001/disputes');

      expect(response.status).toBe(200);
      expect(response.body.data.count).toBe(1);
      expect(response.body.data.disputes[0].id).toBe(disputeId);
      expect(response.body.message).toBe('Found 1 disputes');
    });
  });

  describe('GET /api/v1/users/:userId/disputes/:disputeId', () => {
    it('should return the dispute with its transaction', async () => {
      const response = await request(app).get(`/api/v1/users/user_001/disputes/${disputeId}`);

      expect(response.status).toBe(200);
      expect(response.body.data.dispute.id).toBe(disputeId);
      expect(response.body.data.transaction.merchantName).toBe('GreenLeaf Grocers');
    });

    it('should answer 404 to another user', async () => {
      const response = await request(app).get(`/api/v1/users/user_002/disputes/${disputeId}`);

      expect(response.status).toBe(404);
    });

    it('should reject an invalid dispute id', async () => {
      const response = await request(app).get('/api/v1/users/user_001/disputes/not-a-uuid');

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/Invalid dispute ID format/);
    });
  });
});
