import { v4 as uuidv4 } from 'uuid';
import { systemClock, type Clock } from '../../../lib/dates';
import { CatalogConflictError, type Branch, type BranchInput, type CatalogStore, type Item, type ItemInput } from './types';

export class MemoryCatalogStore implements CatalogStore {
  private items = new Map<string, Item>();
  private branches = new Map<string, Branch>();

  constructor(private clock: Clock = systemClock) {}

  async createItem(input: ItemInput): Promise<Item> {
    for (const existing of this.items.values()) {
      if (existing.sku === input.sku) throw new CatalogConflictError('sku', input.sku);
    }
    const item: Item = {
      id: uuidv4(),
      sku: input.sku,
      name: input.name,
      category: input.category,
      reorderThreshold: input.reorderThreshold ?? 0,
      createdAt: this.clock().toISOString()
    };
    this.items.set(item.id, item);
    return { ...item };
  }

  async createBranch(input: BranchInput): Promise<Branch> {
    for (const existing of this.branches.values()) {
      if (existing.code === input.code) throw new CatalogConflictError('code', input.code);
    }
    const branch: Branch = {
      id: uuidv4(),
      code: input.code,
      name: input.name,
      createdAt: this.clock().toISOString()
    };
    this.branches.set(branch.id, branch);
    return { ...branch };
  }

  async getItem(id: string): Promise<Item | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  async getBranch(id: string): Promise<Branch | null> {
    const branch = this.branches.get(id);
    return branch ? { ...branch } : null;
  }

  async listItems(): Promise<Item[]> {
    return [...this.items.values()].sort((a, b) => a.sku.localeCompare(b.sku)).map((item) => ({ ...item }));
  }

  async listBranches(): Promise<Branch[]> {
    return [...this.branches.values()]
      .sort((a, b) => a.code.localeCompare(b.code))
      .map((branch) => ({ ...branch }));
  }
}
