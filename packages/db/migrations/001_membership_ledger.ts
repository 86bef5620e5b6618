import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("registry_metadata", (table) => {
    table.text("key").primary();
    table.text("value").notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable("registry_issuers", (table) => {
    table.text("principal").primary();
    table.boolean("authorized").notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable("registry_credentials", (table) => {
    table.text("credential_id").primary();
    table.text("image_hash").notNullable();
    table.text("holder").notNullable();
    table.text("issuer").notNullable();
    // unix seconds
    table.bigInteger("issued_at").notNullable();
    table.bigInteger("expires_at").notNullable();
    table.boolean("active").notNullable().defaultTo(true);
    table.index(["issuer"]);
    table.index(["holder"]);
  });

  await knex.schema.createTable("registry_events", (table) => {
    table.bigInteger("sequence").primary();
    table.text("event_type").notNullable();
    table.text("payload").notNullable();
    table.text("data_hash").notNullable();
    table.text("prev_hash");
    table.text("chain_hash").notNullable();
    table.bigInteger("recorded_at").notNullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("registry_events");
  await knex.schema.dropTableIfExists("registry_credentials");
  await knex.schema.dropTableIfExists("registry_issuers");
  await knex.schema.dropTableIfExists("registry_metadata");
}
