import { Controller, Get, Req, UseGuards } from "@nestjs/common";
import { type AuthenticatedRequest, TenantAuthGuard } from "../auth/tenant-auth.guard.js";
import { type OrganizationView, OrganizationsService, toOrganizationView } from "./organizations.service.js";

@Controller("v1/organization")
@UseGuards(TenantAuthGuard)
export class OrganizationController {
  constructor(private readonly organizationsService: OrganizationsService) {}

  /** The organization the caller authenticated as. */
  @Get()
  async current(@Req() req: AuthenticatedRequest): Promise<OrganizationView> {
    return toOrganizationView(await this.organizationsService.get(req.tenant.id));
  }
}
