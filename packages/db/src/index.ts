export * from "./schema/index.js";
export { createDbClient, closeDbClient, type DbClient, type DbClientOptions } from "./client.js";
export {
  getSchemaStatements,
  getSchemaSql,
  applySchema,
  checkDatabaseSetup,
  type SqlExecutor,
  type SetupStatus,
} from "./setup.js";
