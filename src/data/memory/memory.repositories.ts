import { randomUUID } from "node:crypto";
import { ReferencedRowError, UniqueViolationError } from "../data.errors.js";
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
import { isRowId } from "../row-id.js";

/**
 * Process-local store with the same unique constraints as the PostgreSQL
 * schema. Used when DATABASE_URL is unset and in tests.
 */
class Table<T extends { id: string }> {
  private readonly rows = new Map<string, T>();

  constructor(
    private readonly uniques: Array<{ name: string; key: (row: T) => string | null }> = [],
  ) {}

  insert(row: T): T {
    this.assertUnique(row);
    this.rows.set(row.id, row);
    return { ...row };
  }

  get(id: string): T | null {
    if (!isRowId(id)) return null;
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  find(predicate: (row: T) => boolean): T | null {
    for (const row of this.rows.values()) {
      if (predicate(row)) return { ...row };
    }
    return null;
  }

  filter(predicate: (row: T) => boolean): T[] {
    return [...this.rows.values()].filter(predicate).map((row) => ({ ...row }));
  }

  patch(id: string, patch: Partial<T>): T | null {
    if (!isRowId(id)) return null;
    const current = this.rows.get(id);
    if (!current) return null;
    const next = { ...current, ...definedFields(patch) };
    this.assertUnique(next);
    this.rows.set(id, next);
    return { ...next };
  }

  delete(id: string): boolean {
    return isRowId(id) && this.rows.delete(id);
  }

  private assertUnique(candidate: T): void {
    for (const unique of this.uniques) {
      const key = unique.key(candidate);
      if (key === null) continue;
      for (const row of this.rows.values()) {
        if (row.id !== candidate.id && unique.key(row) === key) {
          throw new UniqueViolationError(unique.name);
        }
      }
    }
  }
}

// Undefined patch fields leave the column untouched, as drizzle's set() does
function definedFields<T>(patch: Partial<T>): Partial<T> {
  const result: Partial<T> = {};
  for (const key in patch) {
    if (patch[key] !== undefined) {
      result[key] = patch[key];
    }
  }
  return result;
}

function page<T>(rows: T[], options: ListOptions): T[] {
  const offset = options.offset ?? 0;
  return options.limit === undefined ? rows.slice(offset) : rows.slice(offset, offset + options.limit);
}

const byCreatedAt = (a: { createdAt: Date }, b: { createdAt: Date }): number =>
  a.createdAt.getTime() - b.createdAt.getTime();

export class MemoryOrganizationRepository implements OrganizationRepository {
  private readonly table = new Table<Organization>();

  constructor(private readonly isReferenced: (id: string) => boolean = () => false) {}

  async create(input: NewOrganization): Promise<Organization> {
    const now = new Date();
    return this.table.insert({ id: randomUUID(), name: input.name, createdAt: now, updatedAt: now });
  }

  async get(id: string): Promise<Organization | null> {
    return this.table.get(id);
  }

  async list(): Promise<Organization[]> {
    return this.table.filter(() => true).sort(byCreatedAt);
  }

  async delete(id: string): Promise<boolean> {
    if (this.isReferenced(id)) {
      throw new ReferencedRowError("requests_organization_id_fkey");
    }
    return this.table.delete(id);
  }
}

export class MemoryCredentialRepository implements CredentialRepository {
  private readonly table = new Table<Credential>([
    { name: "uq_api_keys_synthetic_key", key: (row) => row.syntheticKey },
    {
      name: "uq_api_keys_org_default",
      key: (row) => (row.principalId === null && row.isActive ? row.organizationId : null),
    },
  ]);

  async create(input: NewCredential): Promise<Credential> {
    const now = new Date();
    return this.table.insert({ ...input, id: randomUUID(), createdAt: now, updatedAt: now });
  }

  async get(id: string): Promise<Credential | null> {
    return this.table.get(id);
  }

  async findBySyntheticKey(syntheticKey: string): Promise<Credential | null> {
    return this.table.find((row) => row.syntheticKey === syntheticKey);
  }

  async findActiveForPrincipal(organizationId: string, principalId: string): Promise<Credential | null> {
    const matches = this.table
      .filter(
        (row) => row.organizationId === organizationId && row.principalId === principalId && row.isActive,
      )
      .sort(byCreatedAt);
    return matches[matches.length - 1] ?? null;
  }

  async findActiveDefault(organizationId: string): Promise<Credential | null> {
    return this.table.find(
      (row) => row.organizationId === organizationId && row.principalId === null && row.isActive,
    );
  }

  async listByOrganization(organizationId: string): Promise<Credential[]> {
    return this.table.filter((row) => row.organizationId === organizationId).sort(byCreatedAt);
  }

  async update(id: string, patch: CredentialPatch): Promise<Credential | null> {
    return this.table.patch(id, { ...patch, updatedAt: new Date() });
  }
}

export class MemoryPrincipalRepository implements PrincipalRepository {
  private readonly table = new Table<Principal>([
    { name: "uq_principals_org_external", key: (row) => `${row.organizationId}:${row.externalId}` },
  ]);

  async create(input: NewPrincipal): Promise<Principal> {
    return this.table.insert({ ...input, id: randomUUID(), createdAt: new Date() });
  }

  async get(id: string): Promise<Principal | null> {
    return this.table.get(id);
  }

  async findByExternalId(organizationId: string, externalId: string): Promise<Principal | null> {
    return this.table.find(
      (row) => row.organizationId === organizationId && row.externalId === externalId,
    );
  }

  async listByOrganization(organizationId: string): Promise<Principal[]> {
    return this.table.filter((row) => row.organizationId === organizationId).sort(byCreatedAt);
  }
}

export class MemorySessionRepository implements SessionRepository {
  private readonly table = new Table<Session>([{ name: "uq_sessions_token", key: (row) => row.token }]);

  async create(input: NewSession): Promise<Session> {
    return this.table.insert({ ...input, id: randomUUID(), startedAt: new Date(), endedAt: null });
  }

  async findByToken(token: string): Promise<Session | null> {
    return this.table.find((row) => row.token === token);
  }

  async end(id: string, endedAt: Date): Promise<Session | null> {
    return this.table.patch(id, { endedAt });
  }
}

export class MemoryRequestRepository implements RequestRepository {
  private readonly table = new Table<RequestRecord>([
    { name: "uq_requests_request_id", key: (row) => row.requestId },
  ]);

  async create(input: NewRequest): Promise<RequestRecord> {
    return this.table.insert({
      ...input,
      id: randomUUID(),
      responseId: null,
      responsePayload: null,
      status: "pending",
      errorMessage: null,
      rating: null,
      ratingFeedback: null,
      ratedAt: null,
      createdAt: new Date(),
      completedAt: null,
    });
  }

  async get(id: string): Promise<RequestRecord | null> {
    return this.table.get(id);
  }

  async findByRequestId(requestId: string): Promise<RequestRecord | null> {
    return this.table.find((row) => row.requestId === requestId);
  }

  async findByResponseId(responseId: string): Promise<RequestRecord | null> {
    return this.table.find((row) => row.responseId === responseId);
  }

  referencesOrganization(organizationId: string): boolean {
    return this.table.find((row) => row.organizationId === organizationId) !== null;
  }

  async update(requestId: string, patch: RequestPatch): Promise<boolean> {
    const row = this.table.find((r) => r.requestId === requestId);
    if (!row) return false;
    return this.table.patch(row.id, patch) !== null;
  }
}

export class MemoryUsageRepository implements UsageRepository {
  private readonly table = new Table<UsageRecord>([
    { name: "uq_usage_records_request", key: (row) => row.requestId },
  ]);

  async upsert(input: NewUsage): Promise<UsageRecord> {
    const existing = this.table.find((row) => row.requestId === input.requestId);
    if (existing) {
      return this.table.patch(existing.id, input) ?? existing;
    }
    return this.table.insert({ ...input, id: randomUUID(), createdAt: new Date() });
  }

  async findByRequestId(requestId: string): Promise<UsageRecord | null> {
    return this.table.find((row) => row.requestId === requestId);
  }
}

export class MemoryPersonaRepository implements PersonaRepository {
  private readonly table = new Table<Persona>([
    { name: "uq_personas_org_name", key: (row) => `${row.organizationId}:${row.name}` },
  ]);

  async create(input: NewPersona): Promise<Persona> {
    const now = new Date();
    return this.table.insert({ ...input, id: randomUUID(), createdAt: now, updatedAt: now });
  }

  async get(id: string): Promise<Persona | null> {
    return this.table.get(id);
  }

  async listByOrganization(organizationId: string, options: ListOptions = {}): Promise<Persona[]> {
    const rows = this.table
      .filter(
        (row) => row.organizationId === organizationId && (options.includeInactive || row.isActive),
      )
      .sort((a, b) => a.name.localeCompare(b.name));
    return page(rows, options);
  }

  async update(id: string, patch: PersonaPatch): Promise<Persona | null> {
    return this.table.patch(id, { ...patch, updatedAt: new Date() });
  }

  async delete(id: string): Promise<boolean> {
    return this.table.delete(id);
  }
}

export class MemoryAnalysisConfigRepository implements AnalysisConfigRepository {
  private readonly table = new Table<AnalysisConfigRecord>([
    { name: "uq_analysis_configs_org_name", key: (row) => `${row.organizationId}:${row.name}` },
  ]);

  async create(input: NewAnalysisConfig): Promise<AnalysisConfigRecord> {
    const now = new Date();
    return this.table.insert({ ...input, id: randomUUID(), createdAt: now, updatedAt: now });
  }

  async get(id: string): Promise<AnalysisConfigRecord | null> {
    return this.table.get(id);
  }

  async listByOrganization(
    organizationId: string,
    options: ListOptions = {},
  ): Promise<AnalysisConfigRecord[]> {
    const rows = this.table
      .filter(
        (row) => row.organizationId === organizationId && (options.includeInactive || row.isActive),
      )
      .sort((a, b) => byCreatedAt(b, a));
    return page(rows, options);
  }

  async findByName(organizationId: string, name: string): Promise<AnalysisConfigRecord | null> {
    return this.table.find((row) => row.organizationId === organizationId && row.name === name);
  }

  async countByOrganization(
    organizationId: string,
    options: Pick<ListOptions, "includeInactive"> = {},
  ): Promise<number> {
    return this.table.filter(
      (row) => row.organizationId === organizationId && (options.includeInactive || row.isActive),
    ).length;
  }

  async update(id: string, patch: AnalysisConfigPatch): Promise<AnalysisConfigRecord | null> {
    return this.table.patch(id, { ...patch, updatedAt: new Date() });
  }
}

export class MemoryAnalysisResultRepository implements AnalysisResultRepository {
  private readonly table = new Table<AnalysisResultRecord>([
    {
      name: "uq_analysis_results_request_hash",
      key: (row) => `${row.requestId}:${row.configHash}`,
    },
  ]);

  async create(input: NewAnalysisResult): Promise<AnalysisResultRecord> {
    return this.table.insert({ ...input, id: randomUUID(), createdAt: new Date() });
  }

  async get(id: string): Promise<AnalysisResultRecord | null> {
    return this.table.get(id);
  }

  async findByRequestAndHash(
    requestId: string,
    configHash: string,
  ): Promise<AnalysisResultRecord | null> {
    return this.table.find((row) => row.requestId === requestId && row.configHash === configHash);
  }
}

export function createMemoryRepositories(): Repositories {
  const requests = new MemoryRequestRepository();
  return {
    organizations: new MemoryOrganizationRepository((id) => requests.referencesOrganization(id)),
    credentials: new MemoryCredentialRepository(),
    principals: new MemoryPrincipalRepository(),
    sessions: new MemorySessionRepository(),
    requests,
    usage: new MemoryUsageRepository(),
    personas: new MemoryPersonaRepository(),
    analysisConfigs: new MemoryAnalysisConfigRepository(),
    analysisResults: new MemoryAnalysisResultRepository(),
  };
}
