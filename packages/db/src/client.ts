import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

export const createDb = (databaseUrl: string) =>
  drizzle(
    new Pool({
      connectionString: databaseUrl,
    })
  );

export type Database = ReturnType<typeof createDb>;
