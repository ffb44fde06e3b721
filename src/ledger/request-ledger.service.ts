import { randomUUID } from "node:crypto";
import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  type FinalRequestStatus,
  type JsonObject,
  type NewRequest,
  REQUEST_REPOSITORY,
  type RequestPatch,
  type RequestRecord,
  type RequestRepository,
  USAGE_REPOSITORY,
  type UsageRecord,
  type UsageRepository,
} from "../data/index.js";
import { NotAuthorizedError, RequestNotFoundError } from "../errors/index.js";
import { CostEstimator } from "../pricing/index.js";
import type { UsageReport } from "./usage.js";

export type OpenRequestInput = Omit<NewRequest, "requestId">;

export interface FinalizeDetails {
  responsePayload?: JsonObject | null;
  errorMessage?: string | null;
}

export function generateRequestId(): string {
  return `req_${randomUUID().replaceAll("-", "")}`;
}

/** True when the request belongs to the organization. */
export function ownsRequest(request: Pick<RequestRecord, "organizationId">, organizationId: string): boolean {
  return request.organizationId === organizationId;
}

/**
 * Lifecycle of proxied requests. Every write is a targeted field update so
 * concurrent writers of different fields never overwrite each other.
 */
@Injectable()
export class RequestLedger {
  private readonly logger = new Logger(RequestLedger.name);

  constructor(
    @Inject(REQUEST_REPOSITORY) private readonly requests: RequestRepository,
    @Inject(USAGE_REPOSITORY) private readonly usage: UsageRepository,
    private readonly costEstimator: CostEstimator,
  ) {}

  async open(input: OpenRequestInput): Promise<RequestRecord> {
    const record = await this.requests.create({ ...input, requestId: generateRequestId() });
    this.logger.debug(`Opened request ${record.requestId}`);
    return record;
  }

  /**
   * Moves a request to a terminal status. Repeated calls are accepted and the
   * last write wins.
   */
  async finalize(requestId: string, status: FinalRequestStatus, details: FinalizeDetails = {}): Promise<void> {
    const patch: RequestPatch = { status, completedAt: new Date() };
    if (details.responsePayload !== undefined) {
      patch.responsePayload = details.responsePayload;
    }
    if (details.errorMessage !== undefined) {
      patch.errorMessage = details.errorMessage;
    }
    const updated = await this.requests.update(requestId, patch);
    if (!updated) {
      throw new RequestNotFoundError(requestId);
    }
    this.logger.log(`Request ${requestId} ${status}`);
  }

  async setResponseId(requestId: string, responseId: string): Promise<void> {
    const updated = await this.requests.update(requestId, { responseId });
    if (!updated) {
      throw new RequestNotFoundError(requestId);
    }
    this.logger.debug(`Stored response ID ${responseId} for request ${requestId}`);
  }

  async recordUsage(
    request: Pick<RequestRecord, "id" | "requestId">,
    usage: UsageReport,
    model: string,
  ): Promise<UsageRecord> {
    const cost = this.costEstimator.estimate(model, usage.inputTokens, usage.outputTokens);
    const record = await this.usage.upsert({
      requestId: request.id,
      model,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      reasoningTokens: usage.reasoningTokens,
      totalTokens: usage.totalTokens,
      costUsd: cost.usd,
    });
    this.logger.log(
      `Logged usage for request ${request.requestId}: ${usage.totalTokens} tokens, $${cost.usd}`,
    );
    return record;
  }

  async findUsage(request: Pick<RequestRecord, "id">): Promise<UsageRecord | null> {
    return this.usage.findByRequestId(request.id);
  }

  async getById(id: string): Promise<RequestRecord | null> {
    return this.requests.get(id);
  }

  /** Looks up by caller-facing request id first, then by upstream response id. */
  async findByReference(reference: string): Promise<RequestRecord | null> {
    return (
      (await this.requests.findByRequestId(reference)) ?? (await this.requests.findByResponseId(reference))
    );
  }

  async getOwned(organizationId: string, reference: string): Promise<RequestRecord> {
    const request = await this.findByReference(reference);
    if (!request) {
      throw new RequestNotFoundError(reference);
    }
    if (!ownsRequest(request, organizationId)) {
      throw new NotAuthorizedError("Not authorized to access this request");
    }
    return request;
  }

  async update(requestId: string, patch: RequestPatch): Promise<void> {
    const updated = await this.requests.update(requestId, patch);
    if (!updated) {
      throw new RequestNotFoundError(requestId);
    }
  }
}
