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
  Put,
  Req,
  UseGuards,
} from "@nestjs/common";
import { type AuthenticatedRequest, TenantAuthGuard } from "../auth/tenant-auth.guard.js";
import { formatZodError } from "../common/validation.utils.js";
import { CreateCredentialInputSchema, UpdateCredentialInputSchema } from "./credentials.schema.js";
import { type CredentialView, CredentialsService } from "./credentials.service.js";

@Controller("v1/api-keys")
@UseGuards(TenantAuthGuard)
export class CredentialsController {
  constructor(private readonly credentialsService: CredentialsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown): Promise<CredentialView> {
    const parseResult = CreateCredentialInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.credentialsService.create(req.tenant.id, parseResult.data);
  }

  @Get()
  async list(@Req() req: AuthenticatedRequest): Promise<{ api_keys: CredentialView[] }> {
    return { api_keys: await this.credentialsService.list(req.tenant.id) };
  }

  @Get(":id")
  async get(@Req() req: AuthenticatedRequest, @Param("id") id: string): Promise<CredentialView> {
    return this.credentialsService.get(req.tenant.id, id);
  }

  @Put(":id")
  async update(
    @Req() req: AuthenticatedRequest,
    @Param("id") id: string,
    @Body() body: unknown,
  ): Promise<CredentialView> {
    const parseResult = UpdateCredentialInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.credentialsService.update(req.tenant.id, id, parseResult.data);
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async deactivate(@Req() req: AuthenticatedRequest, @Param("id") id: string): Promise<void> {
    await this.credentialsService.deactivate(req.tenant.id, id);
  }
}
