export {
  CatalogConflictError,
  type Branch,
  type BranchInput,
  type CatalogReader,
  type CatalogStore,
  type Item,
  type ItemInput
} from './internal/types';

export { MemoryCatalogStore } from './internal/memoryCatalog';
export { PgCatalogStore } from './internal/pgCatalog';
