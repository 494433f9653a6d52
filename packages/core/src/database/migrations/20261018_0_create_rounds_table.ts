import { Kysely, sql } from "kysely";

// Migrations run before the typed schema exists, so they take an untyped handle.
export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable("rounds")
    .ifNotExists()
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("instance", "varchar(64)", (col) => col.notNull())
    .addColumn("round", "integer", (col) => col.notNull())
    .addColumn("outcome", "varchar(16)", (col) => col.notNull())
    .addColumn("forfeit", "boolean", (col) => col.notNull().defaultTo(false))
    .addColumn("player_one", "varchar(42)", (col) => col.notNull())
    .addColumn("player_two", "varchar(42)", (col) => col.notNull())
    .addColumn("choice_one", "smallint", (col) => col.notNull())
    .addColumn("choice_two", "smallint", (col) => col.notNull())
    .addColumn("payout_one", "varchar(78)", (col) => col.notNull())
    .addColumn("payout_two", "varchar(78)", (col) => col.notNull())
    .addColumn("retained_one", "varchar(78)", (col) => col.notNull())
    .addColumn("retained_two", "varchar(78)", (col) => col.notNull())
    .addColumn("settled_block", "varchar(78)", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addUniqueConstraint("rounds_instance_round_unique", ["instance", "round"])
    .execute();

  await db.schema
    .createIndex("rounds_player_one_idx")
    .ifNotExists()
    .on("rounds")
    .column("player_one")
    .execute();

  await db.schema
    .createIndex("rounds_player_two_idx")
    .ifNotExists()
    .on("rounds")
    .column("player_two")
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable("rounds").execute();
}
