import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host.js";
import { describe, expect, it } from "vitest";
import { AdminAuthGuard, matchesAdminToken } from "../../src/auth/admin-auth.guard.js";
import { AdminTokenInvalidError, AdminTokenNotConfiguredError } from "../../src/errors/index.js";
import { createTestConfig } from "../helpers.js";

function contextFor(authorization?: string): ExecutionContextHost {
  const request = { method: "GET", path: "/v1/admin/organizations", headers: { authorization } };
  return new ExecutionContextHost([request, {}]);
}

describe("AdminAuthGuard", () => {
  it("should accept any configured admin token", () => {
    const guard = new AdminAuthGuard(createTestConfig({ ADMIN_TOKENS: "admin-one,admin-two" }));

    expect(guard.canActivate(contextFor("Bearer admin-two"))).toBe(true);
  });

  it("should reject an unknown token", () => {
    const guard = new AdminAuthGuard(createTestConfig({ ADMIN_TOKENS: "admin-one" }));

    expect(() => guard.canActivate(contextFor("Bearer admin-three"))).toThrow(AdminTokenInvalidError);
  });

  it("should reject a missing header", () => {
    const guard = new AdminAuthGuard(createTestConfig({ ADMIN_TOKENS: "admin-one" }));

    expect(() => guard.canActivate(contextFor())).toThrow(AdminTokenInvalidError);
  });

  it("should refuse every token when none are configured", () => {
    const guard = new AdminAuthGuard(createTestConfig({ ADMIN_TOKENS: "" }));

    expect(() => guard.canActivate(contextFor("Bearer admin-one"))).toThrow(AdminTokenNotConfiguredError);
  });
});

describe("matchesAdminToken", () => {
  it("should compare whole tokens only", () => {
    expect(matchesAdminToken("admin", ["admin-one"])).toBe(false);
    expect(matchesAdminToken("admin-one", ["admin-one"])).toBe(true);
    expect(matchesAdminToken("admin-one", [])).toBe(false);
  });
});
