import { Module } from "@nestjs/common";
import { AdminAuthGuard } from "./admin-auth.guard.js";
import { JwtService } from "./jwt.service.js";
import { TenantAuthGuard } from "./tenant-auth.guard.js";

@Module({
  providers: [JwtService, TenantAuthGuard, AdminAuthGuard],
  exports: [JwtService, TenantAuthGuard, AdminAuthGuard],
})
export class AuthModule {}
