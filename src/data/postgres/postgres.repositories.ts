import { and, asc, count, desc, eq, isNull } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { asReferencedRow, asUniqueViolation } from "../data.errors.js";
import { isRowId } from "../row-id.js";
import type {
  AnalysisConfigPatch,
  AnalysisConfigRecord,
  AnalysisConfigRepository,
  AnalysisResultRecord,
  AnalysisResultRepository,
  Credential,
  CredentialPatch,
  CredentialRepository,
  ListOptions,
  NewAnalysisConfig,
  NewAnalysisResult,
  NewCredential,
  NewOrganization,
  NewPersona,
  NewPrincipal,
  NewRequest,
  NewSession,
  NewUsage,
  Organization,
  OrganizationRepository,
  Persona,
  PersonaPatch,
  PersonaRepository,
  Principal,
  PrincipalRepository,
  Repositories,
  RequestPatch,
  RequestRecord,
  RequestRepository,
  Session,
  SessionRepository,
  UsageRecord,
  UsageRepository,
} from "../data.types.js";
import * as schema from "./schema.js";

export type Database = NodePgDatabase<typeof schema>;

const DEFAULT_LIST_LIMIT = 1000;

function first<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}

function inserted<T>(rows: T[], table: string): T {
  const row = rows[0];
  if (!row) {
    throw new Error(`Insert into ${table} returned no row`);
  }
  return row;
}

async function translateConflicts<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw asUniqueViolation(error) ?? error;
  }
}

class PgOrganizationRepository implements OrganizationRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewOrganization): Promise<Organization> {
    const rows = await this.db.insert(schema.organizations).values(input).returning();
    return inserted(rows, "organizations");
  }

  async get(id: string): Promise<Organization | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db
      .select()
      .from(schema.organizations)
      .where(eq(schema.organizations.id, id))
      .limit(1);
    return first(rows);
  }

  async list(): Promise<Organization[]> {
    return this.db.select().from(schema.organizations).orderBy(asc(schema.organizations.createdAt));
  }

  async delete(id: string): Promise<boolean> {
    if (!isRowId(id)) return false;
    try {
      const rows = await this.db
        .delete(schema.organizations)
        .where(eq(schema.organizations.id, id))
        .returning({ id: schema.organizations.id });
      return rows.length > 0;
    } catch (error) {
      throw asReferencedRow(error) ?? error;
    }
  }
}

class PgCredentialRepository implements CredentialRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewCredential): Promise<Credential> {
    const rows = await translateConflicts(() =>
      this.db.insert(schema.apiKeys).values(input).returning(),
    );
    return inserted(rows, "api_keys");
  }

  async get(id: string): Promise<Credential | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db.select().from(schema.apiKeys).where(eq(schema.apiKeys.id, id)).limit(1);
    return first(rows);
  }

  async findBySyntheticKey(syntheticKey: string): Promise<Credential | null> {
    const rows = await this.db
      .select()
      .from(schema.apiKeys)
      .where(eq(schema.apiKeys.syntheticKey, syntheticKey))
      .limit(1);
    return first(rows);
  }

  async findActiveForPrincipal(organizationId: string, principalId: string): Promise<Credential | null> {
    const rows = await this.db
      .select()
      .from(schema.apiKeys)
      .where(
        and(
          eq(schema.apiKeys.organizationId, organizationId),
          eq(schema.apiKeys.principalId, principalId),
          eq(schema.apiKeys.isActive, true),
        ),
      )
      .orderBy(desc(schema.apiKeys.createdAt))
      .limit(1);
    return first(rows);
  }

  async findActiveDefault(organizationId: string): Promise<Credential | null> {
    const rows = await this.db
      .select()
      .from(schema.apiKeys)
      .where(
        and(
          eq(schema.apiKeys.organizationId, organizationId),
          isNull(schema.apiKeys.principalId),
          eq(schema.apiKeys.isActive, true),
        ),
      )
      .limit(1);
    return first(rows);
  }

  async listByOrganization(organizationId: string): Promise<Credential[]> {
    return this.db
      .select()
      .from(schema.apiKeys)
      .where(eq(schema.apiKeys.organizationId, organizationId))
      .orderBy(asc(schema.apiKeys.createdAt));
  }

  async update(id: string, patch: CredentialPatch): Promise<Credential | null> {
    if (!isRowId(id)) return null;
    const rows = await translateConflicts(() =>
      this.db
        .update(schema.apiKeys)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(schema.apiKeys.id, id))
        .returning(),
    );
    return first(rows);
  }
}

class PgPrincipalRepository implements PrincipalRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewPrincipal): Promise<Principal> {
    const rows = await translateConflicts(() =>
      this.db.insert(schema.principals).values(input).returning(),
    );
    return inserted(rows, "principals");
  }

  async get(id: string): Promise<Principal | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db
      .select()
      .from(schema.principals)
      .where(eq(schema.principals.id, id))
      .limit(1);
    return first(rows);
  }

  async findByExternalId(organizationId: string, externalId: string): Promise<Principal | null> {
    const rows = await this.db
      .select()
      .from(schema.principals)
      .where(
        and(
          eq(schema.principals.organizationId, organizationId),
          eq(schema.principals.externalId, externalId),
        ),
      )
      .limit(1);
    return first(rows);
  }

  async listByOrganization(organizationId: string): Promise<Principal[]> {
    return this.db
      .select()
      .from(schema.principals)
      .where(eq(schema.principals.organizationId, organizationId))
      .orderBy(asc(schema.principals.createdAt));
  }
}

class PgSessionRepository implements SessionRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewSession): Promise<Session> {
    const rows = await translateConflicts(() =>
      this.db.insert(schema.sessions).values(input).returning(),
    );
    return inserted(rows, "sessions");
  }

  async findByToken(token: string): Promise<Session | null> {
    const rows = await this.db
      .select()
      .from(schema.sessions)
      .where(eq(schema.sessions.token, token))
      .limit(1);
    return first(rows);
  }

  async end(id: string, endedAt: Date): Promise<Session | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db
      .update(schema.sessions)
      .set({ endedAt })
      .where(eq(schema.sessions.id, id))
      .returning();
    return first(rows);
  }
}

class PgRequestRepository implements RequestRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewRequest): Promise<RequestRecord> {
    const rows = await translateConflicts(() =>
      this.db.insert(schema.requests).values(input).returning(),
    );
    return inserted(rows, "requests");
  }

  async get(id: string): Promise<RequestRecord | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db.select().from(schema.requests).where(eq(schema.requests.id, id)).limit(1);
    return first(rows);
  }

  async findByRequestId(requestId: string): Promise<RequestRecord | null> {
    const rows = await this.db
      .select()
      .from(schema.requests)
      .where(eq(schema.requests.requestId, requestId))
      .limit(1);
    return first(rows);
  }

  async findByResponseId(responseId: string): Promise<RequestRecord | null> {
    const rows = await this.db
      .select()
      .from(schema.requests)
      .where(eq(schema.requests.responseId, responseId))
      .limit(1);
    return first(rows);
  }

  async update(requestId: string, patch: RequestPatch): Promise<boolean> {
    if (Object.keys(patch).length === 0) return false;
    const rows = await this.db
      .update(schema.requests)
      .set(patch)
      .where(eq(schema.requests.requestId, requestId))
      .returning({ id: schema.requests.id });
    return rows.length > 0;
  }
}

class PgUsageRepository implements UsageRepository {
  constructor(private readonly db: Database) {}

  async upsert(input: NewUsage): Promise<UsageRecord> {
    const { requestId, ...counters } = input;
    const rows = await this.db
      .insert(schema.usageRecords)
      .values(input)
      .onConflictDoUpdate({ target: schema.usageRecords.requestId, set: counters })
      .returning();
    return inserted(rows, `usage_records for ${requestId}`);
  }

  async findByRequestId(requestId: string): Promise<UsageRecord | null> {
    const rows = await this.db
      .select()
      .from(schema.usageRecords)
      .where(eq(schema.usageRecords.requestId, requestId))
      .limit(1);
    return first(rows);
  }
}

class PgPersonaRepository implements PersonaRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewPersona): Promise<Persona> {
    const rows = await translateConflicts(() =>
      this.db.insert(schema.personas).values(input).returning(),
    );
    return inserted(rows, "personas");
  }

  async get(id: string): Promise<Persona | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db.select().from(schema.personas).where(eq(schema.personas.id, id)).limit(1);
    return first(rows);
  }

  async listByOrganization(organizationId: string, options: ListOptions = {}): Promise<Persona[]> {
    const conditions = [eq(schema.personas.organizationId, organizationId)];
    if (!options.includeInactive) {
      conditions.push(eq(schema.personas.isActive, true));
    }
    return this.db
      .select()
      .from(schema.personas)
      .where(and(...conditions))
      .orderBy(asc(schema.personas.name))
      .limit(options.limit ?? DEFAULT_LIST_LIMIT)
      .offset(options.offset ?? 0);
  }

  async update(id: string, patch: PersonaPatch): Promise<Persona | null> {
    if (!isRowId(id)) return null;
    const rows = await translateConflicts(() =>
      this.db
        .update(schema.personas)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(schema.personas.id, id))
        .returning(),
    );
    return first(rows);
  }

  async delete(id: string): Promise<boolean> {
    if (!isRowId(id)) return false;
    const rows = await this.db
      .delete(schema.personas)
      .where(eq(schema.personas.id, id))
      .returning({ id: schema.personas.id });
    return rows.length > 0;
  }
}

class PgAnalysisConfigRepository implements AnalysisConfigRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewAnalysisConfig): Promise<AnalysisConfigRecord> {
    const rows = await translateConflicts(() =>
      this.db.insert(schema.analysisConfigs).values(input).returning(),
    );
    return inserted(rows, "analysis_configs");
  }

  async get(id: string): Promise<AnalysisConfigRecord | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db
      .select()
      .from(schema.analysisConfigs)
      .where(eq(schema.analysisConfigs.id, id))
      .limit(1);
    return first(rows);
  }

  async findByName(organizationId: string, name: string): Promise<AnalysisConfigRecord | null> {
    const rows = await this.db
      .select()
      .from(schema.analysisConfigs)
      .where(
        and(
          eq(schema.analysisConfigs.organizationId, organizationId),
          eq(schema.analysisConfigs.name, name),
        ),
      )
      .limit(1);
    return first(rows);
  }

  async listByOrganization(
    organizationId: string,
    options: ListOptions = {},
  ): Promise<AnalysisConfigRecord[]> {
    const conditions = [eq(schema.analysisConfigs.organizationId, organizationId)];
    if (!options.includeInactive) {
      conditions.push(eq(schema.analysisConfigs.isActive, true));
    }
    return this.db
      .select()
      .from(schema.analysisConfigs)
      .where(and(...conditions))
      .orderBy(desc(schema.analysisConfigs.createdAt))
      .limit(options.limit ?? DEFAULT_LIST_LIMIT)
      .offset(options.offset ?? 0);
  }

  async countByOrganization(
    organizationId: string,
    options: Pick<ListOptions, "includeInactive"> = {},
  ): Promise<number> {
    const conditions = [eq(schema.analysisConfigs.organizationId, organizationId)];
    if (!options.includeInactive) {
      conditions.push(eq(schema.analysisConfigs.isActive, true));
    }
    const rows = await this.db
      .select({ total: count() })
      .from(schema.analysisConfigs)
      .where(and(...conditions));
    return rows[0]?.total ?? 0;
  }

  async update(id: string, patch: AnalysisConfigPatch): Promise<AnalysisConfigRecord | null> {
    if (!isRowId(id)) return null;
    const rows = await translateConflicts(() =>
      this.db
        .update(schema.analysisConfigs)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(schema.analysisConfigs.id, id))
        .returning(),
    );
    return first(rows);
  }
}

class PgAnalysisResultRepository implements AnalysisResultRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewAnalysisResult): Promise<AnalysisResultRecord> {
    const rows = await translateConflicts(() =>
      this.db.insert(schema.analysisResults).values(input).returning(),
    );
    return inserted(rows, "analysis_results");
  }

  async get(id: string): Promise<AnalysisResultRecord | null> {
    if (!isRowId(id)) return null;
    const rows = await this.db
      .select()
      .from(schema.analysisResults)
      .where(eq(schema.analysisResults.id, id))
      .limit(1);
    return first(rows);
  }

  async findByRequestAndHash(
    requestId: string,
    configHash: string,
  ): Promise<AnalysisResultRecord | null> {
    const rows = await this.db
      .select()
      .from(schema.analysisResults)
      .where(
        and(
          eq(schema.analysisResults.requestId, requestId),
          eq(schema.analysisResults.configHash, configHash),
        ),
      )
      .limit(1);
    return first(rows);
  }
}

export function createPostgresRepositories(db: Database): Repositories {
  return {
    organizations: new PgOrganizationRepository(db),
    credentials: new PgCredentialRepository(db),
    principals: new PgPrincipalRepository(db),
    sessions: new PgSessionRepository(db),
    requests: new PgRequestRepository(db),
    usage: new PgUsageRepository(db),
    personas: new PgPersonaRepository(db),
    analysisConfigs: new PgAnalysisConfigRepository(db),
    analysisResults: new PgAnalysisResultRepository(db),
  };
}
