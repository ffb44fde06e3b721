import { randomUUID } from "node:crypto";
import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  type Principal,
  PRINCIPAL_REPOSITORY,
  type PrincipalRepository,
  type Session,
  SESSION_REPOSITORY,
  type SessionRepository,
  UniqueViolationError,
} from "../data/index.js";
import {
  DuplicateNameError,
  NotAuthorizedError,
  PrincipalNotFoundError,
  SessionNotFoundError,
} from "../errors/index.js";

export interface ResolvedSession {
  principal: Principal;
  session: Session;
}

export function generateSessionToken(): string {
  return `sess_${randomUUID().replaceAll("-", "")}`;
}

@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);

  constructor(
    @Inject(PRINCIPAL_REPOSITORY) private readonly principals: PrincipalRepository,
    @Inject(SESSION_REPOSITORY) private readonly sessions: SessionRepository,
  ) {}

  /**
   * Find-or-insert keyed on (organization, external id). A concurrent insert
   * of the same principal surfaces as a unique violation and resolves to the
   * row that won.
   */
  async getOrCreatePrincipal(organizationId: string, externalId: string): Promise<Principal> {
    const existing = await this.principals.findByExternalId(organizationId, externalId);
    if (existing) return existing;

    try {
      const principal = await this.principals.create({ organizationId, externalId });
      this.logger.log(`Created user ${externalId} for organization ${organizationId}`);
      return principal;
    } catch (error) {
      if (!(error instanceof UniqueViolationError)) throw error;
      const winner = await this.principals.findByExternalId(organizationId, externalId);
      if (!winner) throw error;
      return winner;
    }
  }

  /**
   * Reuses the given session token when it names an active session of the
   * same principal; otherwise starts a new session.
   */
  async getOrCreateSession(
    organizationId: string,
    externalId: string,
    sessionToken?: string,
  ): Promise<ResolvedSession> {
    const principal = await this.getOrCreatePrincipal(organizationId, externalId);

    if (sessionToken) {
      const session = await this.sessions.findByToken(sessionToken);
      if (session && session.principalId === principal.id && session.endedAt === null) {
        return { principal, session };
      }
    }

    const session = await this.sessions.create({
      principalId: principal.id,
      token: generateSessionToken(),
    });
    this.logger.log(`Created session ${session.token} for user ${externalId}`);
    return { principal, session };
  }

  async endSession(organizationId: string, sessionToken: string): Promise<Session> {
    const session = await this.sessions.findByToken(sessionToken);
    if (!session) {
      throw new SessionNotFoundError(sessionToken);
    }
    const principal = await this.principals.get(session.principalId);
    if (!principal || principal.organizationId !== organizationId) {
      throw new NotAuthorizedError("Not authorized to end this session");
    }
    if (session.endedAt !== null) {
      return session;
    }
    const ended = await this.sessions.end(session.id, new Date());
    if (!ended) {
      throw new SessionNotFoundError(sessionToken);
    }
    this.logger.log(`Ended session ${sessionToken}`);
    return ended;
  }

  async createPrincipal(organizationId: string, externalId: string): Promise<Principal> {
    try {
      return await this.principals.create({ organizationId, externalId });
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateNameError("User", externalId);
      }
      throw error;
    }
  }

  async getPrincipal(organizationId: string, externalId: string): Promise<Principal> {
    const principal = await this.principals.findByExternalId(organizationId, externalId);
    if (!principal) {
      throw new PrincipalNotFoundError(externalId);
    }
    return principal;
  }

  async findPrincipal(organizationId: string, externalId: string): Promise<Principal | null> {
    return this.principals.findByExternalId(organizationId, externalId);
  }

  async getPrincipalById(principalId: string): Promise<Principal | null> {
    return this.principals.get(principalId);
  }

  async listPrincipals(organizationId: string): Promise<Principal[]> {
    return this.principals.listByOrganization(organizationId);
  }
}
