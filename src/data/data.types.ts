export type JsonObject = Record<string, unknown>;

export const REQUEST_STATUSES = ["pending", "completed", "failed", "cancelled"] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];
export type FinalRequestStatus = Exclude<RequestStatus, "pending">;

export interface Organization {
  id: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * An upstream API key held for an organization. `principalId` null means the
 * key is the organization-wide default.
 */
export interface Credential {
  id: string;
  organizationId: string;
  principalId: string | null;
  syntheticKey: string;
  encryptedKey: string;
  name: string | null;
  description: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Principal {
  id: string;
  organizationId: string;
  externalId: string;
  createdAt: Date;
}

export interface Session {
  id: string;
  principalId: string;
  token: string;
  startedAt: Date;
  endedAt: Date | null;
}

export interface RequestRecord {
  id: string;
  requestId: string;
  responseId: string | null;
  organizationId: string;
  sessionId: string;
  principalId: string;
  credentialId: string;
  personaId: string | null;
  model: string | null;
  requestPayload: JsonObject;
  responsePayload: JsonObject | null;
  status: RequestStatus;
  errorMessage: string | null;
  rating: number | null;
  ratingFeedback: string | null;
  ratedAt: Date | null;
  createdAt: Date;
  completedAt: Date | null;
}

export interface UsageRecord {
  id: string;
  requestId: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  reasoningTokens: number;
  totalTokens: number;
  costUsd: string;
  createdAt: Date;
}

export interface Persona {
  id: string;
  organizationId: string;
  principalId: string | null;
  name: string;
  description: string | null;
  content: string;
  /** Free-form tags and versioning info */
  metadata: JsonObject | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface AnalysisConfigRecord {
  id: string;
  organizationId: string;
  name: string;
  description: string | null;
  config: JsonObject;
  isActive: boolean;
  createdBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AnalysisResultRecord {
  id: string;
  requestId: string;
  analysisConfigId: string | null;
  configHash: string;
  configSnapshot: JsonObject;
  analysisType: string;
  results: JsonObject;
  modelUsed: string;
  tokensUsed: number | null;
  costUsd: string | null;
  createdAt: Date;
}

type Generated = "id" | "createdAt" | "updatedAt";

export type NewOrganization = Pick<Organization, "name">;
export type NewCredential = Omit<Credential, Generated>;
export type CredentialPatch = Partial<
  Pick<Credential, "principalId" | "encryptedKey" | "name" | "description" | "isActive">
>;
export type NewPrincipal = Pick<Principal, "organizationId" | "externalId">;
export type NewSession = Pick<Session, "principalId" | "token">;
export type NewRequest = Pick<
  RequestRecord,
  | "requestId"
  | "organizationId"
  | "sessionId"
  | "principalId"
  | "credentialId"
  | "personaId"
  | "model"
  | "requestPayload"
>;
export type RequestPatch = Partial<
  Pick<
    RequestRecord,
    | "responseId"
    | "responsePayload"
    | "status"
    | "errorMessage"
    | "completedAt"
    | "rating"
    | "ratingFeedback"
    | "ratedAt"
  >
>;
export type NewUsage = Omit<UsageRecord, "id" | "createdAt">;
export type NewPersona = Omit<Persona, Generated>;
export type PersonaPatch = Partial<
  Pick<Persona, "principalId" | "name" | "description" | "content" | "metadata" | "isActive">
>;
export type NewAnalysisConfig = Omit<AnalysisConfigRecord, Generated>;
export type AnalysisConfigPatch = Partial<
  Pick<AnalysisConfigRecord, "name" | "description" | "config" | "isActive">
>;
export type NewAnalysisResult = Omit<AnalysisResultRecord, "id" | "createdAt">;

export interface ListOptions {
  includeInactive?: boolean;
  limit?: number;
  offset?: number;
}

export interface OrganizationRepository {
  create(input: NewOrganization): Promise<Organization>;
  get(id: string): Promise<Organization | null>;
  list(): Promise<Organization[]>;
  /** @throws ReferencedRowError when requests were recorded for the organization */
  delete(id: string): Promise<boolean>;
}

export interface CredentialRepository {
  create(input: NewCredential): Promise<Credential>;
  get(id: string): Promise<Credential | null>;
  findBySyntheticKey(syntheticKey: string): Promise<Credential | null>;
  findActiveForPrincipal(organizationId: string, principalId: string): Promise<Credential | null>;
  findActiveDefault(organizationId: string): Promise<Credential | null>;
  listByOrganization(organizationId: string): Promise<Credential[]>;
  update(id: string, patch: CredentialPatch): Promise<Credential | null>;
}

export interface PrincipalRepository {
  /** @throws UniqueViolationError when the external id is already taken */
  create(input: NewPrincipal): Promise<Principal>;
  get(id: string): Promise<Principal | null>;
  findByExternalId(organizationId: string, externalId: string): Promise<Principal | null>;
  listByOrganization(organizationId: string): Promise<Principal[]>;
}

export interface SessionRepository {
  create(input: NewSession): Promise<Session>;
  findByToken(token: string): Promise<Session | null>;
  end(id: string, endedAt: Date): Promise<Session | null>;
}

export interface RequestRepository {
  create(input: NewRequest): Promise<RequestRecord>;
  get(id: string): Promise<RequestRecord | null>;
  findByRequestId(requestId: string): Promise<RequestRecord | null>;
  findByResponseId(responseId: string): Promise<RequestRecord | null>;
  /** Updates only the given fields. Returns false when no row matched. */
  update(requestId: string, patch: RequestPatch): Promise<boolean>;
}

export interface UsageRepository {
  upsert(input: NewUsage): Promise<UsageRecord>;
  findByRequestId(requestId: string): Promise<UsageRecord | null>;
}

export interface PersonaRepository {
  /** @throws UniqueViolationError on a duplicate name within the organization */
  create(input: NewPersona): Promise<Persona>;
  get(id: string): Promise<Persona | null>;
  listByOrganization(organizationId: string, options?: ListOptions): Promise<Persona[]>;
  update(id: string, patch: PersonaPatch): Promise<Persona | null>;
  delete(id: string): Promise<boolean>;
}

export interface AnalysisConfigRepository {
  /** @throws UniqueViolationError on a duplicate name within the organization */
  create(input: NewAnalysisConfig): Promise<AnalysisConfigRecord>;
  get(id: string): Promise<AnalysisConfigRecord | null>;
  findByName(organizationId: string, name: string): Promise<AnalysisConfigRecord | null>;
  listByOrganization(organizationId: string, options?: ListOptions): Promise<AnalysisConfigRecord[]>;
  countByOrganization(organizationId: string, options?: Pick<ListOptions, "includeInactive">): Promise<number>;
  update(id: string, patch: AnalysisConfigPatch): Promise<AnalysisConfigRecord | null>;
}

export interface AnalysisResultRepository {
  /** @throws UniqueViolationError when a result for the request and hash exists */
  create(input: NewAnalysisResult): Promise<AnalysisResultRecord>;
  get(id: string): Promise<AnalysisResultRecord | null>;
  findByRequestAndHash(requestId: string, configHash: string): Promise<AnalysisResultRecord | null>;
}

export interface Repositories {
  organizations: OrganizationRepository;
  credentials: CredentialRepository;
  principals: PrincipalRepository;
  sessions: SessionRepository;
  requests: RequestRepository;
  usage: UsageRepository;
  personas: PersonaRepository;
  analysisConfigs: AnalysisConfigRepository;
  analysisResults: AnalysisResultRepository;
}
