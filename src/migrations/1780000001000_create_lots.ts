import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('lots', {
    id: { type: 'uuid', primaryKey: true },
    item_id: { type: 'uuid', notNull: true, references: 'items' },
    branch_id: { type: 'uuid', notNull: true, references: 'branches' },
    lot_number: { type: 'text' },
    quantity_received: { type: 'numeric(18,6)', notNull: true },
    quantity_remaining: { type: 'numeric(18,6)', notNull: true },
    expiry_date: { type: 'date', notNull: true },
    received_at: { type: 'timestamptz', notNull: true },
    receipt_sequence: { type: 'bigserial', notNull: true, unique: true },
    unit_cost: { type: 'numeric(18,6)', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true }
  });

  pgm.addConstraint('lots', 'chk_lots_quantity_received_pos', {
    check: 'quantity_received > 0'
  });
  pgm.addConstraint('lots', 'chk_lots_quantity_remaining_range', {
    check: 'quantity_remaining >= 0 AND quantity_remaining <= quantity_received'
  });
  pgm.addConstraint('lots', 'chk_lots_unit_cost_nonneg', {
    check: 'unit_cost >= 0'
  });

  pgm.createIndex('lots', ['item_id', 'branch_id', 'expiry_date', 'received_at', 'receipt_sequence'], {
    name: 'idx_lots_fefo'
  });
  pgm.createIndex('lots', 'branch_id', { name: 'idx_lots_branch' });

  pgm.createTable('lot_corrections', {
    id: { type: 'uuid', primaryKey: true },
    lot_id: { type: 'uuid', notNull: true, references: 'lots', onDelete: 'CASCADE' },
    previous_quantity: { type: 'numeric(18,6)', notNull: true },
    corrected_quantity: { type: 'numeric(18,6)', notNull: true },
    reason: { type: 'text', notNull: true },
    corrected_at: { type: 'timestamptz', notNull: true }
  });

  pgm.createIndex('lot_corrections', ['lot_id', 'corrected_at'], { name: 'idx_lot_corrections_lot' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('lot_corrections');
  pgm.dropTable('lots');
}
