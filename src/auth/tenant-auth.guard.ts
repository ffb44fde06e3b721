import { type CanActivate, type ExecutionContext, Inject, Injectable } from "@nestjs/common";
import type { Request } from "express";
import {
  type Credential,
  CREDENTIAL_REPOSITORY,
  type CredentialRepository,
  ORGANIZATION_REPOSITORY,
  type OrganizationRepository,
} from "../data/index.js";
import { TokenInvalidError } from "../errors/index.js";
import { JwtService } from "./jwt.service.js";
import { parseToken } from "./token.utils.js";

export interface TenantContext {
  id: string;
  name: string;
  /** Set when the caller authenticated with a synthetic key */
  credential: Credential | null;
}

export interface AuthenticatedRequest extends Request {
  tenant: TenantContext;
}

/**
 * Accepts either an organization JWT or a synthetic API key
 * (`sk-proxy-...`). A synthetic key pins the upstream credential used for the
 * request.
 */
@Injectable()
export class TenantAuthGuard implements CanActivate {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(ORGANIZATION_REPOSITORY) private readonly organizations: OrganizationRepository,
    @Inject(CREDENTIAL_REPOSITORY) private readonly credentials: CredentialRepository,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const parsed = parseToken(request.headers["authorization"]);
    if (!parsed) {
      throw new TokenInvalidError();
    }

    let organizationId: string;
    let credential: Credential | null = null;
    if (parsed.kind === "synthetic") {
      credential = await this.credentials.findBySyntheticKey(parsed.key);
      if (!credential || !credential.isActive) {
        throw new TokenInvalidError();
      }
      organizationId = credential.organizationId;
    } else {
      const claims = await this.jwtService.verify(parsed.token);
      organizationId = claims.organizationId;
    }

    const organization = await this.organizations.get(organizationId);
    if (!organization) {
      throw new TokenInvalidError();
    }

    Object.assign(request, {
      tenant: { id: organization.id, name: organization.name, credential },
    } satisfies Pick<AuthenticatedRequest, "tenant">);

    return true;
  }
}
