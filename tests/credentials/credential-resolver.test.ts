import { beforeEach, describe, expect, it } from "vitest";
import { ConversationService } from "../../src/conversation/conversation.service.js";
import { CredentialResolver } from "../../src/credentials/credential-resolver.service.js";
import { CredentialsService } from "../../src/credentials/credentials.service.js";
import { createMemoryRepositories, type Repositories } from "../../src/data/index.js";
import { CredentialNotConfiguredError, NotAuthorizedError } from "../../src/errors/index.js";
import { CredentialVault } from "../../src/vault/credential-vault.service.js";
import { createTestConfig } from "../helpers.js";

const ORG = "org-1";

describe("CredentialResolver", () => {
  let repositories: Repositories;
  let conversation: ConversationService;
  let credentials: CredentialsService;
  let resolver: CredentialResolver;

  beforeEach(() => {
    repositories = createMemoryRepositories();
    const vault = new CredentialVault(createTestConfig());
    conversation = new ConversationService(repositories.principals, repositories.sessions);
    credentials = new CredentialsService(repositories.credentials, vault, conversation);
    resolver = new CredentialResolver(repositories.credentials, vault);
  });

  it("should fall back to the organization default when the user has no key", async () => {
    await credentials.create(ORG, { openai_api_key: "sk-test-default", name: "org-default" });
    const alice = await conversation.getOrCreatePrincipal(ORG, "alice");

    const credential = await resolver.resolve(ORG, alice.id);

    expect(credential.name).toBe("org-default");
  });

  it("should prefer the user's own key over the default", async () => {
    await credentials.create(ORG, { openai_api_key: "sk-test-default", name: "org-default" });
    await credentials.create(ORG, { openai_api_key: "sk-test-alice", name: "alice-key", user_id: "alice" });
    const alice = await conversation.getOrCreatePrincipal(ORG, "alice");

    const { credential, secret } = await resolver.resolveForRequest(ORG, alice.id, null);

    expect(credential.name).toBe("alice-key");
    expect(secret).toBe("sk-test-alice");
  });

  it("should skip a deactivated user key", async () => {
    await credentials.create(ORG, { openai_api_key: "sk-test-default", name: "org-default" });
    const scoped = await credentials.create(ORG, { openai_api_key: "sk-test-alice", user_id: "alice" });
    await credentials.deactivate(ORG, scoped.id);
    const alice = await conversation.getOrCreatePrincipal(ORG, "alice");

    const credential = await resolver.resolve(ORG, alice.id);

    expect(credential.name).toBe("org-default");
  });

  it("should fail when no key is configured", async () => {
    const alice = await conversation.getOrCreatePrincipal(ORG, "alice");

    await expect(resolver.resolve(ORG, alice.id)).rejects.toBeInstanceOf(CredentialNotConfiguredError);
  });

  it("should use the presented synthetic key's credential", async () => {
    await credentials.create(ORG, { openai_api_key: "sk-test-default", name: "org-default" });
    const bobKey = await credentials.create(ORG, { openai_api_key: "sk-test-bob", user_id: "bob" });
    const bob = await conversation.getOrCreatePrincipal(ORG, "bob");
    const presented = await repositories.credentials.get(bobKey.id);

    const { secret } = await resolver.resolveForRequest(ORG, bob.id, presented);

    expect(secret).toBe("sk-test-bob");
  });

  it("should refuse a user-scoped key presented for another user", async () => {
    const bobKey = await credentials.create(ORG, { openai_api_key: "sk-test-bob", user_id: "bob" });
    const alice = await conversation.getOrCreatePrincipal(ORG, "alice");
    const presented = await repositories.credentials.get(bobKey.id);

    await expect(resolver.resolveForRequest(ORG, alice.id, presented)).rejects.toBeInstanceOf(
      NotAuthorizedError,
    );
  });

  it("should resolve the default key only through resolveDefault", async () => {
    await credentials.create(ORG, { openai_api_key: "sk-test-alice", user_id: "alice" });

    await expect(resolver.resolveDefault(ORG)).rejects.toBeInstanceOf(CredentialNotConfiguredError);
  });
});
