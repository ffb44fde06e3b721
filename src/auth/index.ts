export { AdminAuthGuard, matchesAdminToken } from "./admin-auth.guard.js";
export { AuthModule } from "./auth.module.js";
export { type IssuedToken, JwtService, type OrganizationClaims } from "./jwt.service.js";
export { type AuthenticatedRequest, TenantAuthGuard, type TenantContext } from "./tenant-auth.guard.js";
export { type ParsedToken, parseBearerToken, parseToken } from "./token.utils.js";
