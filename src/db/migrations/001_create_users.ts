import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('users', (table) => {
    table.increments('id').primary();
    table.string('first_name').notNullable();
    table.string('last_name').notNullable();
    table.string('email').notNullable().unique().index();
    table.text('password').notNullable(); // bcrypt hash
    table.timestamp('created_on').notNullable().defaultTo(knex.fn.now());
    table.boolean('is_admin').notNullable().defaultTo(false);
    table.string('token').unique().index();
    table.timestamp('token_exp');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('users');
}
