import type { AppContext } from '../appContext';
import type { Branch, BranchInput, CatalogReader, Item, ItemInput } from '../domains/catalog';
import { LotLedgerError } from '../domains/lots';

export async function requireItem(catalog: CatalogReader, itemId: string): Promise<Item> {
  const item = await catalog.getItem(itemId);
  if (!item) {
    throw new LotLedgerError('ITEM_NOT_FOUND', 'Item not found.', { itemId });
  }
  return item;
}

export async function requireBranch(catalog: CatalogReader, branchId: string): Promise<Branch> {
  const branch = await catalog.getBranch(branchId);
  if (!branch) {
    throw new LotLedgerError('BRANCH_NOT_FOUND', 'Branch not found.', { branchId });
  }
  return branch;
}

export async function requireItemAndBranch(catalog: CatalogReader, itemId: string, branchId: string) {
  const [item, branch] = await Promise.all([requireItem(catalog, itemId), requireBranch(catalog, branchId)]);
  return { item, branch };
}

export function createItem(ctx: AppContext, input: ItemInput): Promise<Item> {
  return ctx.catalog.createItem(input);
}

export function createBranch(ctx: AppContext, input: BranchInput): Promise<Branch> {
  return ctx.catalog.createBranch(input);
}

export function listItems(ctx: AppContext): Promise<Item[]> {
  return ctx.catalog.listItems();
}

export function listBranches(ctx: AppContext): Promise<Branch[]> {
  return ctx.catalog.listBranches();
}
