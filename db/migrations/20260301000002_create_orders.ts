import type { Knex } from 'knex';

const ORDER_STATUSES = [
  'pending',
  'processing',
  'on-hold',
  'completed',
  'cancelled',
  'refunded',
  'failed',
];

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('orders', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table
      .uuid('customer_id')
      .notNullable()
      .references('id')
      .inTable('customers')
      .onDelete('CASCADE');
    table.enu('status', ORDER_STATUSES, { useNative: false, enumName: 'order_status' }).notNullable();
    table.timestamp('date_created', { useTz: true }).notNullable();

    table.index(['customer_id', 'status'], 'idx_orders_customer_status');
    table.index(['status', 'date_created'], 'idx_orders_status_date');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('orders');
}
