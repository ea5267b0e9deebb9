import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // Create customers table
  await knex.schema.createTable('customers', (table) => {
    table.string('customer_id', 20).primary();
    table.string('first_name', 50);
    table.string('last_name', 50);
    table.string('email', 100);
    table.string('phone', 20);
    table.timestamp('registration_date', { useTz: false }).notNullable();
    table.integer('age');
    table.string('city', 50);
    table.string('state', 10);
    table.string('segment', 20);
    table.boolean('is_active');

    // Indexes
    table.index('segment', 'idx_customers_segment');
  });

  // Create transactions table
  await knex.schema.createTable('transactions', (table) => {
    table.string('transaction_id', 20).primary();
    table.string('customer_id', 20).notNullable();
    table.timestamp('transaction_date', { useTz: false }).notNullable();
    table.decimal('amount', 15, 2).notNullable();
    table.string('currency', 5);
    table.string('transaction_type', 20);
    table.string('merchant', 50);
    table.string('category', 30);
    table.string('payment_method', 20);
    table.string('status', 20).notNullable();

    // Indexes
    table.index('customer_id', 'idx_transactions_customer_id');
    table.index('transaction_date', 'idx_transactions_date');
    table.index('amount', 'idx_transactions_amount');
  });

  // Create events table
  await knex.schema.createTable('events', (table) => {
    table.string('event_id', 20).primary();
    table.string('customer_id', 20).notNullable();
    table.timestamp('timestamp', { useTz: false }).notNullable();
    table.string('event_type', 30).notNullable();
    table.string('page_url', 100);
    table.string('session_id', 20);
    table.string('device_type', 20);
    table.string('browser', 20);

    // Indexes
    table.index('customer_id', 'idx_events_customer_id');
    table.index('timestamp', 'idx_events_timestamp');
  });

  // Create products table
  await knex.schema.createTable('products', (table) => {
    table.string('product_id', 20).primary();
    table.string('name', 100).notNullable();
    table.string('category', 30).notNullable();
    table.string('subcategory', 50);
    table.decimal('price', 15, 2).notNullable();
    table.decimal('cost', 15, 2);
    table.integer('stock_quantity');
    table.string('supplier', 50);
    table.timestamp('created_date', { useTz: false });
    table.boolean('is_active');
  });

  await knex.raw(`
    CREATE OR REPLACE VIEW customer_summary AS
    SELECT
      c.customer_id,
      c.first_name,
      c.last_name,
      c.segment,
      c.registration_date,
      COUNT(t.transaction_id) AS total_transactions,
      COALESCE(SUM(t.amount), 0) AS total_spent,
      COALESCE(AVG(t.amount), 0) AS avg_order_value,
      MIN(t.transaction_date) AS first_purchase,
      MAX(t.transaction_date) AS last_purchase
    FROM customers c
    LEFT JOIN transactions t ON c.customer_id = t.customer_id
    GROUP BY c.customer_id, c.first_name, c.last_name, c.segment, c.registration_date
  `);

  await knex.raw(`
    CREATE OR REPLACE VIEW daily_metrics AS
    SELECT
      DATE(transaction_date) AS date,
      COUNT(*) AS daily_transactions,
      SUM(amount) AS daily_revenue,
      AVG(amount) AS avg_transaction_value,
      COUNT(DISTINCT customer_id) AS unique_customers
    FROM transactions
    WHERE status = 'completed'
    GROUP BY DATE(transaction_date)
  `);

  await knex.raw(`
    CREATE OR REPLACE VIEW monthly_trends AS
    SELECT
      to_char(transaction_date, 'YYYY-MM') AS month,
      COUNT(*) AS monthly_transactions,
      SUM(amount) AS monthly_revenue,
      COUNT(DISTINCT customer_id) AS unique_customers,
      AVG(amount) AS avg_order_value
    FROM transactions
    WHERE status = 'completed'
    GROUP BY to_char(transaction_date, 'YYYY-MM')
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw('DROP VIEW IF EXISTS monthly_trends');
  await knex.raw('DROP VIEW IF EXISTS daily_metrics');
  await knex.raw('DROP VIEW IF EXISTS customer_summary');

  await knex.schema.dropTableIfExists('products');
  await knex.schema.dropTableIfExists('events');
  await knex.schema.dropTableIfExists('transactions');
  await knex.schema.dropTableIfExists('customers');
}
