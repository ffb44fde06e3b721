import { Inject, Injectable, Logger } from "@nestjs/common";
import { type Credential, CREDENTIAL_REPOSITORY, type CredentialRepository } from "../data/index.js";
import { CredentialNotConfiguredError, NotAuthorizedError } from "../errors/index.js";
import { CredentialVault } from "../vault/index.js";

export interface ResolvedCredential {
  credential: Credential;
  /** Decrypted upstream secret; never persisted or logged */
  secret: string;
}

/**
 * Picks the upstream credential for a principal: a key scoped to the
 * principal wins over the organization-wide default.
 */
@Injectable()
export class CredentialResolver {
  private readonly logger = new Logger(CredentialResolver.name);

  constructor(
    @Inject(CREDENTIAL_REPOSITORY) private readonly credentials: CredentialRepository,
    private readonly vault: CredentialVault,
  ) {}

  async resolve(organizationId: string, principalId: string): Promise<Credential> {
    const scoped = await this.credentials.findActiveForPrincipal(organizationId, principalId);
    if (scoped) return scoped;

    const fallback = await this.credentials.findActiveDefault(organizationId);
    if (fallback) return fallback;

    this.logger.warn(`No active API key for user ${principalId} in organization ${organizationId}`);
    throw new CredentialNotConfiguredError(organizationId);
  }

  /**
   * Uses the caller's own synthetic-key credential when present, otherwise
   * resolves by priority. A principal-scoped synthetic key only serves its
   * principal.
   */
  async resolveForRequest(
    organizationId: string,
    principalId: string,
    presented: Credential | null,
  ): Promise<ResolvedCredential> {
    let credential: Credential;
    if (presented) {
      const current = await this.credentials.get(presented.id);
      if (!current || !current.isActive || current.organizationId !== organizationId) {
        throw new CredentialNotConfiguredError(organizationId);
      }
      if (current.principalId !== null && current.principalId !== principalId) {
        throw new NotAuthorizedError("API key is not assigned to this user");
      }
      credential = current;
    } else {
      credential = await this.resolve(organizationId, principalId);
    }
    return { credential, secret: this.vault.decrypt(credential.encryptedKey) };
  }

  /** The organization-wide default key, ignoring principal-scoped keys. */
  async resolveDefault(organizationId: string): Promise<ResolvedCredential> {
    const credential = await this.credentials.findActiveDefault(organizationId);
    if (!credential) {
      throw new CredentialNotConfiguredError(organizationId);
    }
    return { credential, secret: this.vault.decrypt(credential.encryptedKey) };
  }

  /** The key a recorded request was made with, active or not. */
  async resolveById(organizationId: string, credentialId: string): Promise<ResolvedCredential> {
    const credential = await this.credentials.get(credentialId);
    if (!credential || credential.organizationId !== organizationId) {
      throw new CredentialNotConfiguredError(organizationId);
    }
    return { credential, secret: this.vault.decrypt(credential.encryptedKey) };
  }
}
