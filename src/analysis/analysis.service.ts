import { Inject, Injectable, Logger } from "@nestjs/common";
import { parseJsonObject } from "../common/canonical-json.js";
import { CredentialResolver } from "../credentials/index.js";
import {
  ANALYSIS_RESULT_REPOSITORY,
  type AnalysisResultRecord,
  type AnalysisResultRepository,
  type JsonObject,
  type RequestRecord,
  UniqueViolationError,
} from "../data/index.js";
import {
  AnalysisResultNotFoundError,
  InvalidAnalysisConfigError,
  MalformedUpstreamResponseError,
  UpstreamError,
} from "../errors/index.js";
import { ownsRequest, parseUsage, RequestLedger } from "../ledger/index.js";
import { CostEstimator } from "../pricing/index.js";
import { UPSTREAM_API, type UpstreamApi } from "../upstream/index.js";
import { AnalysisConfigsService } from "./analysis-configs.service.js";
import {
  DEFAULT_ANALYSIS_TYPE,
  type EffectiveAnalysisConfig,
  hashAnalysisConfig,
  mergeAnalysisConfig,
  toConfigSnapshot,
} from "./analysis.config.js";
import {
  ANALYSIS_RESPONSE_FORMAT,
  buildAnalysisPrompt,
  extractInputText,
  extractOutputText,
} from "./analysis.prompt.js";
import {
  type AnalysisConfigInput,
  AnalysisConfigInputSchema,
  type AnalysisOutput,
  AnalysisOutputSchema,
  type AnalyzeRequest,
} from "./analysis.schema.js";

export interface CategoryScore {
  name: string;
  confidence: number;
}

export interface AnalysisView {
  analysis_id: string;
  request_id: string;
  response_id: string | null;
  analysis_type: string;
  primary_category: string | null;
  categories: CategoryScore[];
  confidence: number | null;
  reasoning: string | null;
  metadata: Record<string, unknown> | null;
  analyzed_at: string;
  model_used: string;
  tokens_used: number;
  cost_usd: string;
  cached: boolean;
}

interface Classification {
  output: AnalysisOutput;
  tokensUsed: number;
  costUsd: string;
}

/**
 * Classifies completed conversations. Results are cached per request and
 * configuration content hash; identical requests in flight at the same time
 * may both reach upstream, and the second insert resolves to the first row.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @Inject(ANALYSIS_RESULT_REPOSITORY) private readonly results: AnalysisResultRepository,
    @Inject(UPSTREAM_API) private readonly upstream: UpstreamApi,
    private readonly ledger: RequestLedger,
    private readonly credentials: CredentialResolver,
    private readonly configs: AnalysisConfigsService,
    private readonly costEstimator: CostEstimator,
  ) {}

  async analyze(organizationId: string, input: AnalyzeRequest): Promise<AnalysisView> {
    const request = await this.ledger.getOwned(organizationId, input.id);

    const saved = input.config_id
      ? parseSavedConfig(await this.configs.getActiveRecord(organizationId, input.config_id))
      : undefined;
    const config = mergeAnalysisConfig(saved, input.config, input.config_overrides);
    const configHash = hashAnalysisConfig(config);

    const cached = await this.results.findByRequestAndHash(request.id, configHash);
    if (cached) {
      this.logger.debug(`Analysis cache hit for request ${request.requestId}`);
      return toAnalysisView(cached, request, true);
    }

    const classification = await this.classify(organizationId, request, config);
    try {
      const stored = await this.results.create({
        requestId: request.id,
        analysisConfigId: input.config_id ?? null,
        configHash,
        configSnapshot: toConfigSnapshot(config),
        analysisType: config.analysis_type ?? DEFAULT_ANALYSIS_TYPE,
        results: { ...classification.output },
        modelUsed: config.model,
        tokensUsed: classification.tokensUsed,
        costUsd: classification.costUsd,
      });
      this.logger.log(`Analyzed request ${request.requestId} with ${config.model}`);
      return toAnalysisView(stored, request, false);
    } catch (error) {
      if (!(error instanceof UniqueViolationError)) throw error;
      const existing = await this.results.findByRequestAndHash(request.id, configHash);
      if (!existing) throw error;
      return toAnalysisView(existing, request, true);
    }
  }

  async getResult(organizationId: string, analysisId: string): Promise<AnalysisView> {
    const result = await this.results.get(analysisId);
    const request = result ? await this.ledger.getById(result.requestId) : null;
    if (!result || !request || !ownsRequest(request, organizationId)) {
      throw new AnalysisResultNotFoundError(analysisId);
    }
    return toAnalysisView(result, request, true);
  }

  private async classify(
    organizationId: string,
    request: RequestRecord,
    config: EffectiveAnalysisConfig,
  ): Promise<Classification> {
    const { secret } = await this.credentials.resolveForRequest(
      organizationId,
      request.principalId,
      null,
    );
    const prompt = buildAnalysisPrompt(
      extractInputText(request.requestPayload),
      extractOutputText(request.responsePayload),
      config,
    );

    const payload: JsonObject = {
      model: config.model,
      input: prompt,
      temperature: config.temperature,
      text: { format: ANALYSIS_RESPONSE_FORMAT },
    };
    if (config.max_tokens !== undefined) {
      payload["max_output_tokens"] = config.max_tokens;
    }

    const reply = await this.upstream.createResponse(secret, payload);
    const document = parseJsonObject(reply.body);
    if (!document) {
      throw new MalformedUpstreamResponseError("analysis response is not a JSON object");
    }
    const error = document["error"];
    if (reply.status < 200 || reply.status >= 300 || (error !== undefined && error !== null)) {
      this.logger.error(`Analysis call failed for request ${request.requestId} (${reply.status})`);
      throw new UpstreamError(reply.status >= 400 ? reply.status : 502, document);
    }

    const text = extractOutputText(document);
    if (text === "") {
      throw new MalformedUpstreamResponseError("analysis response has no output text");
    }
    const parsed = AnalysisOutputSchema.safeParse(parseJsonObject(text));
    if (!parsed.success) {
      throw new MalformedUpstreamResponseError(
        `analysis output does not match the expected schema: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }

    const usage = parseUsage(document["usage"]);
    const cost = this.costEstimator.estimate(
      config.model,
      usage?.inputTokens ?? 0,
      usage?.outputTokens ?? 0,
    );
    return { output: parsed.data, tokensUsed: usage?.totalTokens ?? 0, costUsd: cost.usd };
  }
}

function parseSavedConfig(config: JsonObject): AnalysisConfigInput {
  const parsed = AnalysisConfigInputSchema.safeParse(config);
  if (!parsed.success) {
    throw new InvalidAnalysisConfigError("Saved analysis configuration is invalid");
  }
  return parsed.data;
}

function toAnalysisView(result: AnalysisResultRecord, request: RequestRecord, cached: boolean): AnalysisView {
  const output = AnalysisOutputSchema.partial().safeParse(result.results);
  const stored: Partial<AnalysisOutput> = output.success ? output.data : {};
  const { primary_category = null, categories = [], reasoning = null, metadata = null } = stored;
  return {
    analysis_id: result.id,
    request_id: request.requestId,
    response_id: request.responseId,
    analysis_type: result.analysisType,
    primary_category,
    categories,
    confidence: categories.length > 0 ? Math.max(...categories.map((c) => c.confidence)) : null,
    reasoning,
    metadata,
    analyzed_at: result.createdAt.toISOString(),
    model_used: result.modelUsed,
    tokens_used: result.tokensUsed ?? 0,
    cost_usd: result.costUsd ?? "0.000000",
    cached,
  };
}
