import { SignJWT } from "jose";
import { describe, expect, it } from "vitest";
import { JwtService } from "../../src/auth/jwt.service.js";
import { ConfigurationError, TokenInvalidError } from "../../src/errors/index.js";
import { createTestConfig, TEST_JWT_SECRET } from "../helpers.js";

const organization = { id: "6f1c2b1e-0000-4000-8000-000000000001", name: "Acme" };

describe("JwtService", () => {
  it("should issue a token that verifies to the organization", async () => {
    const service = new JwtService(createTestConfig());

    const { token } = await service.issue(organization);

    await expect(service.verify(token)).resolves.toEqual({
      organizationId: organization.id,
      organizationName: "Acme",
    });
  });

  it("should set the expiry from JWT_EXPIRATION", async () => {
    const service = new JwtService(createTestConfig({ JWT_EXPIRATION: "1h" }));
    const now = new Date("2026-01-01T00:00:00.000Z");

    const { expiresAt } = await service.issue(organization, now);

    expect(expiresAt.toISOString()).toBe("2026-01-01T01:00:00.000Z");
  });

  it("should reject an expired token", async () => {
    const service = new JwtService(createTestConfig({ JWT_EXPIRATION: "1s" }));
    const { token } = await service.issue(organization, new Date("2020-01-01T00:00:00.000Z"));

    await expect(service.verify(token)).rejects.toBeInstanceOf(TokenInvalidError);
  });

  it("should reject a token signed with another secret", async () => {
    const issuer = new JwtService(createTestConfig({ JWT_SECRET_KEY: "other-secret" }));
    const verifier = new JwtService(createTestConfig());
    const { token } = await issuer.issue(organization);

    await expect(verifier.verify(token)).rejects.toBeInstanceOf(TokenInvalidError);
  });

  it("should reject a token without a subject", async () => {
    const token = await new SignJWT({ org_name: "Acme" })
      .setProtectedHeader({ alg: "HS256" })
      .setIssuedAt()
      .setExpirationTime("1h")
      .sign(new TextEncoder().encode(TEST_JWT_SECRET));
    const service = new JwtService(createTestConfig());

    await expect(service.verify(token)).rejects.toBeInstanceOf(TokenInvalidError);
  });

  it("should require JWT_SECRET_KEY", async () => {
    const service = new JwtService(createTestConfig({ JWT_SECRET_KEY: "" }));

    await expect(service.issue(organization)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
