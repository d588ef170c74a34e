/**
 * Database Connection
 *
 * Purpose:
 * Builds the Drizzle client over Neon's HTTP driver. Only called when
 * DATABASE_URL is configured; otherwise the in-memory store is used.
 *
 * Layer: Infrastructure
 */

import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";

export type Database = NeonHttpDatabase;

export function createDb(databaseUrl: string): Database {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  const queryClient = neon(databaseUrl);
  return drizzle(queryClient);
}
