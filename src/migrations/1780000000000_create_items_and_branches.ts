import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('items', {
    id: { type: 'uuid', primaryKey: true },
    sku: { type: 'text', notNull: true, unique: true },
    name: { type: 'text', notNull: true },
    category: { type: 'text', notNull: true },
    reorder_threshold: { type: 'numeric(18,6)', notNull: true, default: 0 },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('items', 'chk_items_reorder_threshold_nonneg', {
    check: 'reorder_threshold >= 0'
  });

  pgm.createTable('branches', {
    id: { type: 'uuid', primaryKey: true },
    code: { type: 'text', notNull: true, unique: true },
    name: { type: 'text', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('branches');
  pgm.dropTable('items');
}
