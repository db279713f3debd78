import { defineConfig } from "drizzle-kit";

if (!process.env.DATABASE_URL) {
  throw new Error("DATABASE_URL is not set; point it at the Postgres database to push the schema to");
}

export default defineConfig({
  out: "./migrations",
  schema: "./packages/shared/schema/index.ts",
  dialect: "postgresql",
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL,
  },
});
