import { readFile } from "node:fs/promises";
import {
  Global,
  Inject,
  Logger,
  Module,
  type OnApplicationShutdown,
  type Provider,
} from "@nestjs/common";
import { drizzle } from "drizzle-orm/node-postgres";
import pg, { type Pool } from "pg";
import { ConfigService } from "../config/config.service.js";
import type { Repositories } from "./data.types.js";
import {
  ANALYSIS_CONFIG_REPOSITORY,
  ANALYSIS_RESULT_REPOSITORY,
  CREDENTIAL_REPOSITORY,
  DATABASE_POOL,
  ORGANIZATION_REPOSITORY,
  PERSONA_REPOSITORY,
  PRINCIPAL_REPOSITORY,
  REPOSITORIES,
  REQUEST_REPOSITORY,
  SESSION_REPOSITORY,
  USAGE_REPOSITORY,
} from "./data.tokens.js";
import { createMemoryRepositories } from "./memory/memory.repositories.js";
import { createPostgresRepositories } from "./postgres/postgres.repositories.js";
import * as schema from "./postgres/schema.js";

const SCHEMA_SQL = new URL("../../sql/schema.sql", import.meta.url);

const logger = new Logger("DataModule");

async function createPool(config: ConfigService): Promise<Pool | null> {
  const databaseUrl = config.get("databaseUrl");
  if (!databaseUrl) {
    logger.warn("DATABASE_URL is not set, using the in-memory store (data is lost on restart)");
    return null;
  }
  const pool = new pg.Pool({ connectionString: databaseUrl });
  pool.on("error", (error) => {
    logger.error(`Idle database client error: ${error.message}`);
  });
  if (config.get("databaseAutoMigrate")) {
    const ddl = await readFile(SCHEMA_SQL, "utf8");
    await pool.query(ddl);
    logger.log("Database schema applied");
  }
  return pool;
}

function repositoryProvider(token: symbol, pick: (r: Repositories) => unknown): Provider {
  return { provide: token, useFactory: pick, inject: [REPOSITORIES] };
}

const providers: Provider[] = [
  { provide: DATABASE_POOL, useFactory: createPool, inject: [ConfigService] },
  {
    provide: REPOSITORIES,
    useFactory: (pool: Pool | null): Repositories =>
      pool ? createPostgresRepositories(drizzle(pool, { schema })) : createMemoryRepositories(),
    inject: [DATABASE_POOL],
  },
  repositoryProvider(ORGANIZATION_REPOSITORY, (r) => r.organizations),
  repositoryProvider(CREDENTIAL_REPOSITORY, (r) => r.credentials),
  repositoryProvider(PRINCIPAL_REPOSITORY, (r) => r.principals),
  repositoryProvider(SESSION_REPOSITORY, (r) => r.sessions),
  repositoryProvider(REQUEST_REPOSITORY, (r) => r.requests),
  repositoryProvider(USAGE_REPOSITORY, (r) => r.usage),
  repositoryProvider(PERSONA_REPOSITORY, (r) => r.personas),
  repositoryProvider(ANALYSIS_CONFIG_REPOSITORY, (r) => r.analysisConfigs),
  repositoryProvider(ANALYSIS_RESULT_REPOSITORY, (r) => r.analysisResults),
];

@Global()
@Module({
  providers,
  exports: providers,
})
export class DataModule implements OnApplicationShutdown {
  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool | null) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool?.end();
  }
}
