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
  Query,
  Req,
  UseGuards,
} from "@nestjs/common";
import { type AuthenticatedRequest, TenantAuthGuard } from "../auth/tenant-auth.guard.js";
import { formatZodError } from "../common/validation.utils.js";
import {
  CreatePersonaInputSchema,
  ListPersonasQuerySchema,
  UpdatePersonaInputSchema,
} from "./personas.schema.js";
import { type PersonaView, PersonasService } from "./personas.service.js";

@Controller("v1/personas")
@UseGuards(TenantAuthGuard)
export class PersonasController {
  constructor(private readonly personasService: PersonasService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown): Promise<PersonaView> {
    const parseResult = CreatePersonaInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.personasService.create(req.tenant.id, parseResult.data);
  }

  @Get()
  async list(
    @Req() req: AuthenticatedRequest,
    @Query() query: unknown,
  ): Promise<{ personas: PersonaView[] }> {
    const parseResult = ListPersonasQuerySchema.safeParse(query);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return { personas: await this.personasService.list(req.tenant.id, parseResult.data) };
  }

  @Get(":id")
  async get(@Req() req: AuthenticatedRequest, @Param("id") id: string): Promise<PersonaView> {
    return this.personasService.get(req.tenant.id, id);
  }

  @Put(":id")
  async update(
    @Req() req: AuthenticatedRequest,
    @Param("id") id: string,
    @Body() body: unknown,
  ): Promise<PersonaView> {
    const parseResult = UpdatePersonaInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.personasService.update(req.tenant.id, id, parseResult.data);
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Req() req: AuthenticatedRequest, @Param("id") id: string): Promise<void> {
    await this.personasService.delete(req.tenant.id, id);
  }
}
