import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('dispense_records', {
    id: { type: 'uuid', primaryKey: true },
    item_id: { type: 'uuid', notNull: true, references: 'items' },
    branch_id: { type: 'uuid', notNull: true, references: 'branches' },
    requested_quantity: { type: 'numeric(18,6)', notNull: true },
    unfulfilled_quantity: { type: 'numeric(18,6)', notNull: true },
    total_cost: { type: 'numeric(18,6)', notNull: true },
    reference: { type: 'text' },
    dispensed_at: { type: 'timestamptz', notNull: true },
    created_sequence: { type: 'bigserial', notNull: true }
  });

  pgm.addConstraint('dispense_records', 'chk_dispense_records_quantities', {
    check: 'requested_quantity > 0 AND unfulfilled_quantity >= 0 AND unfulfilled_quantity <= requested_quantity'
  });

  pgm.createIndex('dispense_records', ['item_id', 'branch_id', 'dispensed_at'], {
    name: 'idx_dispense_records_key_time'
  });
  pgm.createIndex('dispense_records', ['dispensed_at', 'created_sequence'], {
    name: 'idx_dispense_records_recent'
  });

  pgm.createTable('dispense_record_lines', {
    id: { type: 'uuid', primaryKey: true },
    dispense_record_id: { type: 'uuid', notNull: true, references: 'dispense_records', onDelete: 'CASCADE' },
    line_number: { type: 'integer', notNull: true },
    lot_id: { type: 'uuid', notNull: true, references: 'lots' },
    lot_number: { type: 'text' },
    expiry_date: { type: 'date', notNull: true },
    quantity_drawn: { type: 'numeric(18,6)', notNull: true },
    unit_cost: { type: 'numeric(18,6)', notNull: true }
  });

  pgm.addConstraint('dispense_record_lines', 'chk_dispense_record_lines_qty_pos', {
    check: 'quantity_drawn > 0'
  });
  pgm.createIndex('dispense_record_lines', ['dispense_record_id', 'line_number'], {
    name: 'idx_dispense_record_lines_record',
    unique: true
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('dispense_record_lines');
  pgm.dropTable('dispense_records');
}
