import { Pool } from "pg";

export interface QueryResult<Row extends Record<string, unknown>> {
  rows: Row[];
}

export interface Queryable {
  query<Row extends Record<string, unknown>>(
    query: string,
    values?: unknown[]
  ): Promise<QueryResult<Row>>;
}

export function createPool(databaseUrl: string) {
  return new Pool({ connectionString: databaseUrl });
}
