import { Kysely } from "kysely";
import { Database, NewRound, Round } from "../types";

export async function createRound(db: Kysely<Database>, round: NewRound): Promise<void> {
  await db
    .insertInto("rounds")
    .values(round)
    .onConflict((oc) => oc.columns(["instance", "round"]).doNothing())
    .execute();
}

export async function listRounds(
  db: Kysely<Database>,
  instance: string,
  limit = 20
): Promise<Round[]> {
  return db
    .selectFrom("rounds")
    .where("instance", "=", instance)
    .selectAll()
    .orderBy("round", "desc")
    .limit(limit)
    .execute();
}

export async function listRoundsForPlayer(
  db: Kysely<Database>,
  address: string,
  limit = 20
): Promise<Round[]> {
  return db
    .selectFrom("rounds")
    .where((eb) =>
      eb.or([eb("player_one", "=", address), eb("player_two", "=", address)])
    )
    .selectAll()
    .orderBy("created_at", "desc")
    .limit(limit)
    .execute();
}
