import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConversationService } from "../conversation/conversation.service.js";
import {
  type Credential,
  type CredentialPatch,
  CREDENTIAL_REPOSITORY,
  type CredentialRepository,
  UniqueViolationError,
} from "../data/index.js";
import {
  CredentialNotFoundError,
  DuplicateDefaultCredentialError,
  NotAuthorizedError,
} from "../errors/index.js";
import { CredentialVault, generateSyntheticKey } from "../vault/index.js";
import type { CreateCredentialInput, UpdateCredentialInput } from "./credentials.schema.js";

export interface CredentialView {
  id: string;
  organization_id: string;
  user_id: string | null;
  synthetic_key: string;
  is_active: boolean;
  name: string | null;
  description: string | null;
  created_at: string;
  updated_at: string;
}

const SYNTHETIC_KEY_ATTEMPTS = 3;

@Injectable()
export class CredentialsService {
  private readonly logger = new Logger(CredentialsService.name);

  constructor(
    @Inject(CREDENTIAL_REPOSITORY) private readonly credentials: CredentialRepository,
    private readonly vault: CredentialVault,
    private readonly conversation: ConversationService,
  ) {}

  async create(organizationId: string, input: CreateCredentialInput): Promise<CredentialView> {
    const principalId = input.user_id
      ? (await this.conversation.getOrCreatePrincipal(organizationId, input.user_id)).id
      : null;
    const encryptedKey = this.vault.encrypt(input.openai_api_key);

    for (let attempt = 1; ; attempt++) {
      try {
        const credential = await this.credentials.create({
          organizationId,
          principalId,
          syntheticKey: generateSyntheticKey(),
          encryptedKey,
          name: input.name ?? null,
          description: input.description ?? null,
          isActive: true,
        });
        this.logger.log(`Created API key ${credential.id} for organization ${organizationId}`);
        return this.toView(credential, input.user_id ?? null);
      } catch (error) {
        if (!(error instanceof UniqueViolationError)) throw error;
        if (error.constraint === "uq_api_keys_org_default") {
          throw new DuplicateDefaultCredentialError();
        }
        // synthetic key collision: mint another
        if (attempt >= SYNTHETIC_KEY_ATTEMPTS) throw error;
      }
    }
  }

  async list(organizationId: string): Promise<CredentialView[]> {
    const credentials = await this.credentials.listByOrganization(organizationId);
    return Promise.all(credentials.map((c) => this.view(c)));
  }

  async get(organizationId: string, id: string): Promise<CredentialView> {
    return this.view(await this.getOwned(organizationId, id));
  }

  async update(organizationId: string, id: string, input: UpdateCredentialInput): Promise<CredentialView> {
    await this.getOwned(organizationId, id);

    const patch: CredentialPatch = {
      isActive: input.is_active,
      name: input.name,
      description: input.description,
    };
    if (input.user_id !== undefined) {
      patch.principalId = input.user_id
        ? (await this.conversation.getOrCreatePrincipal(organizationId, input.user_id)).id
        : null;
    }
    if (input.openai_api_key) {
      patch.encryptedKey = this.vault.encrypt(input.openai_api_key);
    }

    try {
      const updated = await this.credentials.update(id, patch);
      if (!updated) throw new CredentialNotFoundError(id);
      return this.view(updated);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateDefaultCredentialError();
      }
      throw error;
    }
  }

  /** Keys are deactivated, never removed: requests keep referencing them. */
  async deactivate(organizationId: string, id: string): Promise<void> {
    await this.getOwned(organizationId, id);
    await this.credentials.update(id, { isActive: false });
    this.logger.log(`Deactivated API key ${id}`);
  }

  private async getOwned(organizationId: string, id: string): Promise<Credential> {
    const credential = await this.credentials.get(id);
    if (!credential) {
      throw new CredentialNotFoundError(id);
    }
    if (credential.organizationId !== organizationId) {
      throw new NotAuthorizedError("Not authorized to access this API key");
    }
    return credential;
  }

  private async view(credential: Credential): Promise<CredentialView> {
    let externalId: string | null = null;
    if (credential.principalId) {
      const principal = await this.conversation.getPrincipalById(credential.principalId);
      externalId = principal?.externalId ?? null;
    }
    return this.toView(credential, externalId);
  }

  private toView(credential: Credential, externalId: string | null): CredentialView {
    return {
      id: credential.id,
      organization_id: credential.organizationId,
      user_id: externalId,
      synthetic_key: credential.syntheticKey,
      is_active: credential.isActive,
      name: credential.name,
      description: credential.description,
      created_at: credential.createdAt.toISOString(),
      updated_at: credential.updatedAt.toISOString(),
    };
  }
}
