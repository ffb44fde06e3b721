import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Req,
  Res,
  UseGuards,
} from "@nestjs/common";
import type { Response } from "express";
import { type AuthenticatedRequest, TenantAuthGuard } from "../auth/tenant-auth.guard.js";
import { formatZodError } from "../common/validation.utils.js";
import { MissingUserIdError } from "../errors/index.js";
import { type RatingView, RatingsService } from "../ratings/index.js";
import { writeFrames } from "./frame-writer.js";
import { RateRequestSchema, ResponsesRequestSchema } from "./relay.schema.js";
import { type RelayContext, RelayService, type UpstreamHealth } from "./relay.service.js";

const EXPOSED_HEADERS = "X-Request-ID, X-Session-ID";

@Controller("v1/responses")
@UseGuards(TenantAuthGuard)
export class RelayController {
  private readonly logger = new Logger(RelayController.name);

  constructor(
    private readonly relayService: RelayService,
    private readonly ratingsService: RatingsService,
  ) {}

  /**
   * Responses API passthrough
   * POST /v1/responses
   */
  @Post()
  async create(
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
    @Body() body: unknown,
    @Headers("x-user-id") userId: string | undefined,
    @Headers("x-session-id") sessionId: string | undefined,
  ): Promise<void> {
    const externalUserId = userId?.trim();
    if (!externalUserId) {
      throw new MissingUserIdError();
    }
    const parseResult = ResponsesRequestSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }

    const context = await this.relayService.prepare(
      req.tenant,
      externalUserId,
      sessionId?.trim() || undefined,
      parseResult.data,
    );
    res.setHeader("X-Request-ID", context.request.requestId);
    res.setHeader("X-Session-ID", context.session.token);
    res.setHeader("Access-Control-Expose-Headers", EXPOSED_HEADERS);

    const disconnect = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        disconnect.abort(new Error("Client disconnected"));
      }
    });

    if (context.stream) {
      await this.relayStream(res, context, disconnect.signal);
      return;
    }

    const reply = await this.relayService.relayBuffered(context, disconnect.signal);
    res.status(reply.status).type("application/json").send(reply.body);
  }

  @Get("health")
  async health(@Req() req: AuthenticatedRequest): Promise<UpstreamHealth> {
    return this.relayService.checkUpstreamHealth(req.tenant);
  }

  /**
   * Fetches a stored response by request id or upstream response id
   * GET /v1/responses/:responseId
   */
  @Get(":responseId")
  async retrieve(
    @Req() req: AuthenticatedRequest,
    @Res() res: Response,
    @Param("responseId") responseId: string,
  ): Promise<void> {
    const reply = await this.relayService.retrieve(req.tenant, responseId);
    res.status(reply.status).type("application/json").send(reply.body);
  }

  @Post(":responseId/rate")
  @HttpCode(HttpStatus.OK)
  async rate(
    @Req() req: AuthenticatedRequest,
    @Param("responseId") responseId: string,
    @Body() body: unknown,
  ): Promise<RatingView> {
    const parseResult = RateRequestSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    return this.ratingsService.rate(
      req.tenant.id,
      responseId,
      parseResult.data.rating,
      parseResult.data.feedback,
    );
  }

  private async relayStream(res: Response, context: RelayContext, signal: AbortSignal): Promise<void> {
    res.status(HttpStatus.OK);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    try {
      await writeFrames(this.relayService.stream(context, signal), res, signal);
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug(`Caller left stream ${context.request.requestId} while it was paused`);
      } else {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Stream relay for ${context.request.requestId} aborted: ${message}`);
      }
    } finally {
      res.end();
    }
  }
}
