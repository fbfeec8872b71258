import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('demand_estimates', {
    item_id: { type: 'uuid', notNull: true, references: 'items' },
    branch_id: { type: 'uuid', notNull: true, references: 'branches' },
    window_days: { type: 'integer', notNull: true },
    daily_rate: { type: 'numeric(18,6)', notNull: true },
    estimated_at: { type: 'timestamptz', notNull: true }
  });

  pgm.addConstraint('demand_estimates', 'pk_demand_estimates', {
    primaryKey: ['item_id', 'branch_id', 'window_days']
  });
  pgm.addConstraint('demand_estimates', 'chk_demand_estimates_values', {
    check: 'window_days > 0 AND daily_rate >= 0'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('demand_estimates');
}
