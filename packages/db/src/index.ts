export { createDb, type Database, type DbOptions } from "./client.js";
export { createClickHouseClient, type ClickHouseClientOptions } from "./clickhouse-client.js";
export * from "./schema.js";
