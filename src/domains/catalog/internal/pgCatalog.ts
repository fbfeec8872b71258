import type { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { toNumber } from '../../../lib/numbers';
import { isPgError, PG_ERROR } from '../../../lib/pgErrors';
import { CatalogConflictError, type Branch, type BranchInput, type CatalogStore, type Item, type ItemInput } from './types';

type ItemRow = {
  id: string;
  sku: string;
  name: string;
  category: string;
  reorder_threshold: string | number;
  created_at: Date;
};

type BranchRow = {
  id: string;
  code: string;
  name: string;
  created_at: Date;
};

function mapItem(row: ItemRow): Item {
  return {
    id: row.id,
    sku: row.sku,
    name: row.name,
    category: row.category,
    reorderThreshold: toNumber(row.reorder_threshold),
    createdAt: new Date(row.created_at).toISOString()
  };
}

function mapBranch(row: BranchRow): Branch {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    createdAt: new Date(row.created_at).toISOString()
  };
}

export class PgCatalogStore implements CatalogStore {
  constructor(private pool: Pool) {}

  async createItem(input: ItemInput): Promise<Item> {
    try {
      const res = await this.pool.query<ItemRow>(
        `INSERT INTO items (id, sku, name, category, reorder_threshold, created_at)
         VALUES ($1,$2,$3,$4,$5,now())
         RETURNING *`,
        [uuidv4(), input.sku, input.name, input.category, input.reorderThreshold ?? 0]
      );
      return mapItem(res.rows[0]);
    } catch (err) {
      if (isPgError(err, PG_ERROR.UNIQUE_VIOLATION)) throw new CatalogConflictError('sku', input.sku);
      throw err;
    }
  }

  async createBranch(input: BranchInput): Promise<Branch> {
    try {
      const res = await this.pool.query<BranchRow>(
        `INSERT INTO branches (id, code, name, created_at)
         VALUES ($1,$2,$3,now())
         RETURNING *`,
        [uuidv4(), input.code, input.name]
      );
      return mapBranch(res.rows[0]);
    } catch (err) {
      if (isPgError(err, PG_ERROR.UNIQUE_VIOLATION)) throw new CatalogConflictError('code', input.code);
      throw err;
    }
  }

  async getItem(id: string): Promise<Item | null> {
    const res = await this.pool.query<ItemRow>('SELECT * FROM items WHERE id = $1', [id]);
    if (res.rowCount === 0) return null;
    return mapItem(res.rows[0]);
  }

  async getBranch(id: string): Promise<Branch | null> {
    const res = await this.pool.query<BranchRow>('SELECT * FROM branches WHERE id = $1', [id]);
    if (res.rowCount === 0) return null;
    return mapBranch(res.rows[0]);
  }

  async listItems(): Promise<Item[]> {
    const { rows } = await this.pool.query<ItemRow>('SELECT * FROM items ORDER BY sku ASC');
    return rows.map(mapItem);
  }

  async listBranches(): Promise<Branch[]> {
    const { rows } = await this.pool.query<BranchRow>('SELECT * FROM branches ORDER BY code ASC');
    return rows.map(mapBranch);
  }
}
