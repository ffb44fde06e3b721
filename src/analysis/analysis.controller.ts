import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Headers,
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
  type AnalysisConfigList,
  type AnalysisConfigView,
  AnalysisConfigsService,
} from "./analysis-configs.service.js";
import {
  AnalyzeRequestSchema,
  CreateAnalysisConfigInputSchema,
  ListAnalysisConfigsQuerySchema,
  UpdateAnalysisConfigInputSchema,
} from "./analysis.schema.js";
import { AnalysisService, type AnalysisView } from "./analysis.service.js";

@Controller("v1/analysis")
@UseGuards(TenantAuthGuard)
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  /**
   * Classifies a completed request
   * POST /v1/analysis
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async analyze(@Req() req: AuthenticatedRequest, @Body() body: unknown): Promise<AnalysisView> {
    const parseResult = AnalyzeRequestSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.analysisService.analyze(req.tenant.id, parseResult.data);
  }

  @Get(":analysisId")
  async get(
    @Req() req: AuthenticatedRequest,
    @Param("analysisId") analysisId: string,
  ): Promise<AnalysisView> {
    return this.analysisService.getResult(req.tenant.id, analysisId);
  }
}

@Controller("v1/analysis-configs")
@UseGuards(TenantAuthGuard)
export class AnalysisConfigsController {
  constructor(private readonly configsService: AnalysisConfigsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Req() req: AuthenticatedRequest,
    @Body() body: unknown,
    @Headers("x-user-id") userId: string | undefined,
  ): Promise<AnalysisConfigView> {
    const parseResult = CreateAnalysisConfigInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.configsService.create(req.tenant.id, parseResult.data, userId?.trim() || undefined);
  }

  @Get()
  async list(@Req() req: AuthenticatedRequest, @Query() query: unknown): Promise<AnalysisConfigList> {
    const parseResult = ListAnalysisConfigsQuerySchema.safeParse(query);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.configsService.list(req.tenant.id, parseResult.data);
  }

  @Get("by-name/:name")
  async getByName(
    @Req() req: AuthenticatedRequest,
    @Param("name") name: string,
  ): Promise<AnalysisConfigView> {
    return this.configsService.getByName(req.tenant.id, name);
  }

  @Get(":id")
  async get(@Req() req: AuthenticatedRequest, @Param("id") id: string): Promise<AnalysisConfigView> {
    return this.configsService.get(req.tenant.id, id);
  }

  @Put(":id")
  async update(
    @Req() req: AuthenticatedRequest,
    @Param("id") id: string,
    @Body() body: unknown,
  ): Promise<AnalysisConfigView> {
    const parseResult = UpdateAnalysisConfigInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.configsService.update(req.tenant.id, id, parseResult.data);
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Req() req: AuthenticatedRequest, @Param("id") id: string): Promise<void> {
    await this.configsService.deactivate(req.tenant.id, id);
  }
}
