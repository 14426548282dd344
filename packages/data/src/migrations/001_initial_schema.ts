import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('contracts')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('not_assigned'))
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text')
    .addColumn('deleted_at', 'text')
    .addCheckConstraint(
      'contracts_status_valid',
      sql`status IN ('not_assigned', 'active', 'completed', 'terminated', 'renew', 'closed', 'under_termination')`
    )
    .execute();

  await db.schema
    .createTable('purchase_lots')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('business_id', 'text')
    .addColumn('request_type', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('pending'))
    .addColumn('requested_quantity', 'text', (col) => col.notNull())
    .addColumn('material_type', 'text', (col) => col.notNull())
    .addColumn('material_item_id', 'text', (col) => col.notNull())
    .addColumn('material_item_name', 'text', (col) => col.notNull())
    .addColumn('carat_type_id', 'text')
    .addColumn('shape_cut_id', 'text')
    .addColumn('clarity_id', 'text')
    .addColumn('color_id', 'text')
    .addColumn('unit_weight', 'text')
    .addColumn('related_lot_id', 'text', (col) => col.references('purchase_lots.id'))
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text')
    .addColumn('deleted_at', 'text')
    .addCheckConstraint('purchase_lots_request_type_valid', sql`request_type IN ('purchase', 'sale', 'jewelry_design')`)
    .addCheckConstraint(
      'purchase_lots_status_valid',
      sql`status IN ('pending', 'approved', 'completed', 'confirmed', 'rejected', 'pending_seller_price', 'pending_investor_confirmation')`
    )
    .addCheckConstraint('purchase_lots_material_type_valid', sql`material_type IN ('metal', 'stone', 'other')`)
    .execute();

  await db.schema.createIndex('idx_purchase_lots_related_lot_id').on('purchase_lots').column('related_lot_id').execute();

  await db.schema
    .createTable('inventory_units')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('lot_id', 'text', (col) => col.notNull().references('purchase_lots.id'))
    .addColumn('serial_number', 'text', (col) => col.notNull())
    .addColumn('system_serial_number', 'text')
    .addColumn('sale_lot_id', 'text', (col) => col.references('purchase_lots.id'))
    .addColumn('contract_id', 'text', (col) => col.references('contracts.id'))
    .addColumn('pool_id', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text')
    .addColumn('deleted_at', 'text')
    .addUniqueConstraint('inventory_units_lot_serial_unique', ['lot_id', 'serial_number'])
    .execute();

  await db.schema.createIndex('idx_inventory_units_lot_id').on('inventory_units').column('lot_id').execute();

  await db.schema
    .createTable('contract_unit_histories')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('unit_id', 'text', (col) => col.notNull().references('inventory_units.id'))
    .addColumn('contract_id', 'text', (col) => col.notNull().references('contracts.id'))
    .addColumn('contributed_weight', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('deleted_at', 'text')
    .execute();

  await db.schema
    .createIndex('idx_contract_unit_histories_unit_id')
    .on('contract_unit_histories')
    .column('unit_id')
    .execute();

  await db.schema
    .createTable('production_allocations')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('production_payment_id', 'text', (col) => col.notNull())
    .addColumn('unit_id', 'text', (col) => col.references('inventory_units.id'))
    .addColumn('contract_unit_history_id', 'text', (col) => col.references('contract_unit_histories.id'))
    .addColumn('contract_id', 'text', (col) => col.references('contracts.id'))
    .addColumn('weight', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('deleted_at', 'text')
    .addCheckConstraint(
      'production_allocations_single_source',
      sql`(unit_id IS NOT NULL AND contract_unit_history_id IS NULL) OR (unit_id IS NULL AND contract_unit_history_id IS NOT NULL)`
    )
    .execute();

  await db.schema
    .createTable('contributions')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('lot_id', 'text', (col) => col.notNull().references('purchase_lots.id'))
    .addColumn('quantity', 'text', (col) => col.notNull())
    .addColumn('contribution_type', 'text', (col) => col.notNull())
    .addColumn('pool_id', 'text')
    .addColumn('contract_id', 'text', (col) => col.references('contracts.id'))
    .addColumn('production_payment_id', 'text')
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('pending'))
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text')
    .addColumn('deleted_at', 'text')
    .addCheckConstraint(
      'contributions_status_valid',
      sql`status IN ('pending', 'admin_approved', 'approved', 'terminated', 'rejected')`
    )
    .addCheckConstraint(
      'contributions_target_matches_type',
      sql`(contribution_type = 'pool' AND pool_id IS NOT NULL AND contract_id IS NULL AND production_payment_id IS NULL)
        OR (contribution_type = 'contract' AND contract_id IS NOT NULL AND pool_id IS NULL AND production_payment_id IS NULL)
        OR (contribution_type = 'production_payment' AND production_payment_id IS NOT NULL AND pool_id IS NULL AND contract_id IS NULL)`
    )
    .execute();

  await db.schema.createIndex('idx_contributions_lot_id').on('contributions').column('lot_id').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('contributions').execute();
  await db.schema.dropTable('production_allocations').execute();
  await db.schema.dropTable('contract_unit_histories').execute();
  await db.schema.dropTable('inventory_units').execute();
  await db.schema.dropTable('purchase_lots').execute();
  await db.schema.dropTable('contracts').execute();
}
