import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import type { Config } from "../../config.ts";
import type { DB } from "./schema.ts";

const INT8_OID = 20;

/** Reads an int8 column as a number, rejecting values a double cannot hold. */
export function parseInt8(value: string): number {
	const parsed = Number(value);
	if (!Number.isSafeInteger(parsed)) {
		throw new RangeError(`int8 value ${value} is not a safe integer`);
	}
	return parsed;
}

// The parser is set on each pooled client, not on pg's global registry.
export function createPool(config: Config): pg.Pool {
	const pool = new pg.Pool({
		host: config.postgres.host,
		port: config.postgres.port,
		user: config.postgres.user,
		password: config.postgres.password,
		database: config.postgres.database,
		max: config.postgres.max,
	});
	pool.on("connect", (client) => {
		client.setTypeParser(INT8_OID, parseInt8);
	});
	return pool;
}

export function createDb(config: Config): Kysely<DB> {
	return new Kysely<DB>({
		dialect: new PostgresDialect({ pool: createPool(config) }),
	});
}
