import { Kysely } from "kysely";
import pg from "pg";
import { describe, expect, test } from "vitest";
import { loadConfig } from "src/config.ts";
import { createDb, createPool, parseInt8 } from "src/store/kysely/db.ts";

const config = loadConfig({
  POSTGRES_USER: "dev",
  POSTGRES_PASSWORD: "test-secret",
  POSTGRES_DB: "tasks",
});

describe("createDb", () => {
  test("builds a Kysely instance without connecting", async () => {
    const db = createDb(config);
    expect(db).toBeInstanceOf(Kysely);
    await db.destroy();
  });

  test("registers the int8 parser on the pool, not globally", async () => {
    const pool = createPool(config);
    expect(pool.listenerCount("connect")).toBe(1);
    expect(pg.types.getTypeParser(20)("42")).toBe("42");
    await pool.end();
  });
});

describe("parseInt8", () => {
  test("reads bigint columns as numbers", () => {
    expect(parseInt8("42")).toBe(42);
    expect(parseInt8("9007199254740991")).toBe(9007199254740991);
  });

  test("rejects values beyond the safe integer range", () => {
    expect(() => parseInt8("9007199254740993")).toThrow(RangeError);
  });
});
