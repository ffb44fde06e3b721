import { Inject, Injectable, Logger } from "@nestjs/common";
import { type IssuedToken, JwtService } from "../auth/index.js";
import {
  type Organization,
  ORGANIZATION_REPOSITORY,
  type OrganizationRepository,
  ReferencedRowError,
} from "../data/index.js";
import { OrganizationInUseError, OrganizationNotFoundError } from "../errors/index.js";
import type { CreateOrganizationInput } from "./organizations.schema.js";

export interface OrganizationView {
  id: string;
  name: string;
  created_at: string;
  updated_at: string;
}

export interface OrganizationTokenView {
  organization_id: string;
  token: string;
  expires_at: string;
}

export function toOrganizationView(organization: Organization): OrganizationView {
  return {
    id: organization.id,
    name: organization.name,
    created_at: organization.createdAt.toISOString(),
    updated_at: organization.updatedAt.toISOString(),
  };
}

@Injectable()
export class OrganizationsService {
  private readonly logger = new Logger(OrganizationsService.name);

  constructor(
    @Inject(ORGANIZATION_REPOSITORY) private readonly organizations: OrganizationRepository,
    private readonly jwtService: JwtService,
  ) {}

  async create(input: CreateOrganizationInput): Promise<{ organization: Organization; token: IssuedToken }> {
    const organization = await this.organizations.create({ name: input.name });
    const token = await this.jwtService.issue(organization);
    this.logger.log(`Created organization ${organization.id}`);
    return { organization, token };
  }

  async list(): Promise<Organization[]> {
    return this.organizations.list();
  }

  async get(id: string): Promise<Organization> {
    const organization = await this.organizations.get(id);
    if (!organization) {
      throw new OrganizationNotFoundError(id);
    }
    return organization;
  }

  async issueToken(id: string): Promise<IssuedToken> {
    return this.jwtService.issue(await this.get(id));
  }

  async delete(id: string): Promise<void> {
    let deleted: boolean;
    try {
      deleted = await this.organizations.delete(id);
    } catch (error) {
      if (error instanceof ReferencedRowError) {
        throw new OrganizationInUseError(id);
      }
      throw error;
    }
    if (!deleted) {
      throw new OrganizationNotFoundError(id);
    }
    this.logger.log(`Deleted organization ${id}`);
  }
}
