import { neon } from "@neondatabase/serverless";
import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import * as schema from "./schema";

export type Database = NeonHttpDatabase<typeof schema>;

export function createDb(connectionString: string | undefined): Database {
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }
  const client = neon(connectionString);
  return drizzle(client, { schema });
}
