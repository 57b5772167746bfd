import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('tickets', (table) => {
    table.text('id').primary();
    table.string('theater_name', 100).notNullable();
    table.string('user_id', 100).notNullable();
    table.string('movie_title', 200).notNullable();
    table.integer('price_krw').notNullable();
    table.string('status', 20).notNullable().defaultTo('issued');
    table.text('memo').nullable();
    table.text('cancel_reason').nullable();
    table.timestamp('issued_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('canceled_at', { useTz: true }).nullable();
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.index(['theater_name'], 'idx_tickets_theater_name');
    table.index(['user_id'], 'idx_tickets_user_id');
    table.index(['movie_title'], 'idx_tickets_movie_title');
    table.index(['status'], 'idx_tickets_status');
  });

  await knex.raw(`
    ALTER TABLE tickets
      ADD CONSTRAINT chk_tickets_status CHECK (status IN ('issued', 'canceled')),
      ADD CONSTRAINT chk_tickets_price CHECK (price_krw BETWEEN 1 AND 1000000),
      ADD CONSTRAINT chk_tickets_canceled_at CHECK (
        (status = 'canceled' AND canceled_at IS NOT NULL)
        OR (status = 'issued' AND canceled_at IS NULL)
      )
  `);

  // Listing order
  await knex.raw('CREATE INDEX idx_tickets_issued_at_id ON tickets (issued_at DESC, id DESC)');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('tickets');
}
