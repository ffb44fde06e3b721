import { Injectable } from "@nestjs/common";
import { errors, jwtVerify, SignJWT } from "jose";
import { ConfigService } from "../config/config.service.js";
import type { Organization } from "../data/index.js";
import { ConfigurationError, TokenInvalidError } from "../errors/index.js";

export interface OrganizationClaims {
  organizationId: string;
  organizationName: string | null;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

/**
 * Organization access tokens: `sub` is the organization id, `org_name` its
 * display name.
 */
@Injectable()
export class JwtService {
  constructor(private readonly configService: ConfigService) {}

  async issue(organization: Pick<Organization, "id" | "name">, now = new Date()): Promise<IssuedToken> {
    const expiresAt = new Date(now.getTime() + this.configService.get("jwtExpiration"));
    const token = await new SignJWT({ org_name: organization.name })
      .setProtectedHeader({ alg: this.configService.get("jwtAlgorithm") })
      .setSubject(organization.id)
      .setIssuedAt(Math.floor(now.getTime() / 1000))
      .setExpirationTime(Math.floor(expiresAt.getTime() / 1000))
      .sign(this.getSecret());
    return { token, expiresAt };
  }

  async verify(token: string): Promise<OrganizationClaims> {
    try {
      const { payload } = await jwtVerify(token, this.getSecret(), {
        algorithms: [this.configService.get("jwtAlgorithm")],
      });
      if (!payload.sub) {
        throw new TokenInvalidError();
      }
      const name = payload["org_name"];
      return {
        organizationId: payload.sub,
        organizationName: typeof name === "string" ? name : null,
      };
    } catch (error) {
      if (error instanceof errors.JOSEError || error instanceof TokenInvalidError) {
        throw new TokenInvalidError();
      }
      throw error;
    }
  }

  private getSecret(): Uint8Array {
    const secret = this.configService.get("jwtSecretKey");
    if (!secret) {
      throw new ConfigurationError("JWT_SECRET_KEY is not configured");
    }
    return new TextEncoder().encode(secret);
  }
}
