import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('books', (table) => {
    table.increments('id').primary();
    table.text('title').notNullable();
    table.text('author').notNullable();
    table.integer('pages').notNullable();
    table.text('summary').notNullable();
    table.text('image').notNullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('books');
}
