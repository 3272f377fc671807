/**
 * Drizzle-kit generates migrations from schema diffs. After changing src/db/schema/,
 * run `npm run db:generate` and review the generated SQL before committing.
 *
 * The running service does not depend on these migrations: src/db/bootstrap.ts creates
 * the signals table on startup when it is missing.
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: ["./src/db/schema/signals.ts"],
  out: "./drizzle/migrations",
  dialect: "postgresql",
  dbCredentials: {
    host: process.env.DB_HOST || "localhost",
    port: Number(process.env.DB_PORT || 5432),
    user: process.env.DB_USER || "postgres",
    password: process.env.DB_PASSWORD || "",
    database: process.env.DB_NAME || "machine_data",
    ssl: false,
  },
});
