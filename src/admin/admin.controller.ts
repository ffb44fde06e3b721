import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from "@nestjs/common";
import { AdminAuthGuard } from "../auth/admin-auth.guard.js";
import { formatZodError } from "../common/validation.utils.js";
import {
  CreateOrganizationInputSchema,
  type OrganizationTokenView,
  type OrganizationView,
  OrganizationsService,
  toOrganizationView,
} from "../organizations/index.js";

interface CreateOrganizationResponse {
  organization: OrganizationView;
  token: string;
  expires_at: string;
}

interface OrganizationListResponse {
  organizations: OrganizationView[];
}

@Controller("v1/admin/organizations")
@UseGuards(AdminAuthGuard)
export class AdminController {
  constructor(private readonly organizationsService: OrganizationsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createOrganization(@Body() body: unknown): Promise<CreateOrganizationResponse> {
    const parseResult = CreateOrganizationInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }

    const { organization, token } = await this.organizationsService.create(parseResult.data);
    return {
      organization: toOrganizationView(organization),
      token: token.token,
      expires_at: token.expiresAt.toISOString(),
    };
  }

  @Get()
  async listOrganizations(): Promise<OrganizationListResponse> {
    const organizations = await this.organizationsService.list();
    return { organizations: organizations.map(toOrganizationView) };
  }

  @Get(":id")
  async getOrganization(@Param("id") id: string): Promise<OrganizationView> {
    return toOrganizationView(await this.organizationsService.get(id));
  }

  /** Issues a fresh organization access token. Earlier tokens stay valid until they expire. */
  @Post(":id/token")
  @HttpCode(HttpStatus.CREATED)
  async issueToken(@Param("id") id: string): Promise<OrganizationTokenView> {
    const token = await this.organizationsService.issueToken(id);
    return { organization_id: id, token: token.token, expires_at: token.expiresAt.toISOString() };
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteOrganization(@Param("id") id: string): Promise<void> {
    await this.organizationsService.delete(id);
  }
}
