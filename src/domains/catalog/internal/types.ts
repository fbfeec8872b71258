export type Item = {
  id: string;
  sku: string;
  name: string;
  category: string;
  reorderThreshold: number;
  createdAt: string;
};

export type Branch = {
  id: string;
  code: string;
  name: string;
  createdAt: string;
};

export type ItemInput = {
  sku: string;
  name: string;
  category: string;
  reorderThreshold?: number;
};

export type BranchInput = {
  code: string;
  name: string;
};

/** Read-only lookups the allocation and redistribution core depends on. */
export interface CatalogReader {
  getItem(id: string): Promise<Item | null>;
  getBranch(id: string): Promise<Branch | null>;
  listItems(): Promise<Item[]>;
  listBranches(): Promise<Branch[]>;
}

export interface CatalogStore extends CatalogReader {
  createItem(input: ItemInput): Promise<Item>;
  createBranch(input: BranchInput): Promise<Branch>;
}

export class CatalogConflictError extends Error {
  code = 'CATALOG_DUPLICATE' as const;
  details: { message: string; field: 'sku' | 'code'; value: string };

  constructor(field: 'sku' | 'code', value: string) {
    super('CATALOG_DUPLICATE');
    this.name = 'CatalogConflictError';
    this.details = { message: `An entry with ${field} "${value}" already exists.`, field, value };
  }
}
