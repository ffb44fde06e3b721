import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Req,
  UseGuards,
} from "@nestjs/common";
import { type AuthenticatedRequest, TenantAuthGuard } from "../auth/tenant-auth.guard.js";
import { formatZodError } from "../common/validation.utils.js";
import type { Principal, Session } from "../data/index.js";
import { CreatePrincipalInputSchema } from "./conversation.schema.js";
import { ConversationService } from "./conversation.service.js";

interface PrincipalView {
  id: string;
  organization_id: string;
  user_id: string;
  created_at: string;
}

interface SessionView {
  session_id: string;
  started_at: string;
  ended_at: string | null;
}

function toPrincipalView(principal: Principal): PrincipalView {
  return {
    id: principal.id,
    organization_id: principal.organizationId,
    user_id: principal.externalId,
    created_at: principal.createdAt.toISOString(),
  };
}

function toSessionView(session: Session): SessionView {
  return {
    session_id: session.token,
    started_at: session.startedAt.toISOString(),
    ended_at: session.endedAt?.toISOString() ?? null,
  };
}

@Controller("v1/users")
@UseGuards(TenantAuthGuard)
export class UsersController {
  constructor(private readonly conversationService: ConversationService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Req() req: AuthenticatedRequest, @Body() body: unknown): Promise<PrincipalView> {
    const parseResult = CreatePrincipalInputSchema.safeParse(body);
    if (!parseResult.success) {
      throw new BadRequestException(formatZodError(parseResult.error));
    }
    const principal = await this.conversationService.createPrincipal(
      req.tenant.id,
      parseResult.data.user_id,
    );
    return toPrincipalView(principal);
  }

  @Get()
  async list(@Req() req: AuthenticatedRequest): Promise<{ users: PrincipalView[] }> {
    const principals = await this.conversationService.listPrincipals(req.tenant.id);
    return { users: principals.map(toPrincipalView) };
  }

  @Get(":userId")
  async get(@Req() req: AuthenticatedRequest, @Param("userId") userId: string): Promise<PrincipalView> {
    return toPrincipalView(await this.conversationService.getPrincipal(req.tenant.id, userId));
  }
}

@Controller("v1/sessions")
@UseGuards(TenantAuthGuard)
export class SessionsController {
  constructor(private readonly conversationService: ConversationService) {}

  @Post(":sessionId/end")
  @HttpCode(HttpStatus.OK)
  async end(
    @Req() req: AuthenticatedRequest,
    @Param("sessionId") sessionId: string,
  ): Promise<SessionView> {
    return toSessionView(await this.conversationService.endSession(req.tenant.id, sessionId));
  }
}
