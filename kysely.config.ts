import { PostgresDialect } from "kysely";
import { defineConfig } from "kysely-ctl";
import { loadConfig } from "./src/config.ts";
import { createPool } from "./src/store/kysely/db.ts";

export default defineConfig({
  dialect: new PostgresDialect({
    pool: createPool(loadConfig()),
  }),
  migrations: {
    migrationFolder: "src/store/kysely/migrations",
  },
});
