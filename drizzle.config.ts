import "dotenv/config";
import { defineConfig } from "drizzle-kit";

const env = (name: string, fallback?: string): string => {
  const value = process.env[name] ?? fallback;
  if (value === undefined) {
    throw new Error(`${name} must be set to run drizzle-kit`);
  }
  return value;
};

export default defineConfig({
  out: "./drizzle",
  schema: "./src/db/schema.ts",
  dialect: "postgresql",
  dbCredentials: {
    host: env("DB_HOST"),
    database: env("DB_NAME"),
    user: env("DB_USER"),
    password: env("DB_PASSWORD"),
    port: Number.parseInt(env("DB_PORT", "5432"), 10),
    ssl: env("DB_SSL", "false") === "true",
  },
});
