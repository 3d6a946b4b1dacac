/**
 * Merchant repository - merchant catalog with aliases
 */

import type { AppDatabase } from '../client';
import type { Merchant } from '../../matching/types';

interface MerchantRow {
  id: string;
  canonical_name: string;
  category: string;
  description: string | null;
  website: string | null;
}

const toMerchant = (row: MerchantRow, aliases: string[]): Merchant => ({
  id: row.id,
  canonicalName: row.canonical_name,
  aliases,
  category: row.category,
  description: row.description,
  website: row.website,
});

export class MerchantRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Full catalog ordered by canonical name
   */
  async findAll(): Promise<Merchant[]> {
    const rows = await this.db
      .selectFrom('merchants')
      .select(['id', 'canonical_name', 'category', 'description', 'website'])
      .orderBy('canonical_name')
      .orderBy('id')
      .execute();

    const aliasRows = await this.db
      .selectFrom('merchant_aliases')
      .select(['merchant_id', 'alias'])
      .orderBy('id')
      .execute();

    const aliasesByMerchant = new Map<string, string[]>();
    for (const { merchant_id, alias } of aliasRows) {
      const list = aliasesByMerchant.get(merchant_id) ?? [];
      list.push(alias);
      aliasesByMerchant.set(merchant_id, list);
    }

    return rows.map((row) => toMerchant(row, aliasesByMerchant.get(row.id) ?? []));
  }

  async findById(merchantId: string): Promise<Merchant | null> {
    const row = await this.db
      .selectFrom('merchants')
      .select(['id', 'canonical_name', 'category', 'description', 'website'])
      .where('id', '=', merchantId)
      .executeTakeFirst();

    if (!row) {
      return null;
    }

    const aliases = await this.db
      .selectFrom('merchant_aliases')
      .select('alias')
      .where('merchant_id', '=', merchantId)
      .orderBy('id')
      .execute();

    return toMerchant(
      row,
      aliases.map((entry) => entry.alias)
    );
  }

  async count(): Promise<number> {
    const { total } = await this.db
      .selectFrom('merchants')
      .select((eb) => eb.fn.countAll<number>().as('total'))
      .executeTakeFirstOrThrow();
    return Number(total);
  }

  /**
   * Inserts a merchant and its aliases atomically
   */
  async insert(merchant: Merchant): Promise<void> {
    await this.db.transaction().execute(async (trx) => {
      await trx
        .insertInto('merchants')
        .values({
          id: merchant.id,
          canonical_name: merchant.canonicalName,
          category: merchant.category,
          description: merchant.description,
          website: merchant.website,
        })
        .execute();

      if (merchant.aliases.length > 0) {
        await trx
          .insertInto('merchant_aliases')
          .values(merchant.aliases.map((alias) => ({ merchant_id: merchant.id, alias })))
          .execute();
      }
    });
  }
}

export default MerchantRepository;
