import { createHash, timingSafeEqual } from "node:crypto";
import { type CanActivate, type ExecutionContext, Injectable, Logger } from "@nestjs/common";
import type { Request } from "express";
import { ConfigService } from "../config/config.service.js";
import { AdminTokenInvalidError, AdminTokenNotConfiguredError } from "../errors/index.js";
import { parseBearerToken } from "./token.utils.js";

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/** Compares digests so the check takes the same time for every candidate. */
export function matchesAdminToken(token: string, adminTokens: readonly string[]): boolean {
  const presented = digest(token);
  let matched = false;
  for (const candidate of adminTokens) {
    if (timingSafeEqual(presented, digest(candidate))) {
      matched = true;
    }
  }
  return matched;
}

/** Guards the organization administration routes with ADMIN_TOKENS. */
@Injectable()
export class AdminAuthGuard implements CanActivate {
  private readonly logger = new Logger(AdminAuthGuard.name);

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const token = parseBearerToken(request.headers["authorization"]);
    if (!token) {
      throw new AdminTokenInvalidError();
    }

    const adminTokens = this.configService.get("adminTokens");
    if (adminTokens.length === 0) {
      this.logger.warn("Admin route called but ADMIN_TOKENS is empty");
      throw new AdminTokenNotConfiguredError();
    }

    if (!matchesAdminToken(token, adminTokens)) {
      this.logger.warn(`Rejected admin call to ${request.method} ${request.path}`);
      throw new AdminTokenInvalidError();
    }
    return true;
  }
}
