import { PostgresDialect } from "kysely";
import { defineConfig } from "kysely-ctl";
import path from "node:path";
import pg from "pg";
import { loadConfig } from "../src/modules/shared/infra/config.js";

export default defineConfig({
  dialect: new PostgresDialect({
    pool: new pg.Pool({ connectionString: loadConfig().databaseUrl }),
  }),
  migrations: {
    migrationFolder: path.resolve(process.cwd(), "database/migrations"),
  },
});
