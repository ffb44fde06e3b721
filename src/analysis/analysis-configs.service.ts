import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConversationService } from "../conversation/index.js";
import {
  ANALYSIS_CONFIG_REPOSITORY,
  type AnalysisConfigPatch,
  type AnalysisConfigRecord,
  type AnalysisConfigRepository,
  type JsonObject,
  UniqueViolationError,
} from "../data/index.js";
import { AnalysisConfigNotFoundError, DuplicateNameError } from "../errors/index.js";
import type {
  CreateAnalysisConfigInput,
  ListAnalysisConfigsQuery,
  UpdateAnalysisConfigInput,
} from "./analysis.schema.js";

export interface AnalysisConfigView {
  id: string;
  organization_id: string;
  name: string;
  description: string | null;
  config: JsonObject;
  is_active: boolean;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface AnalysisConfigList {
  items: AnalysisConfigView[];
  total: number;
  page: number;
  page_size: number;
}

function toView(record: AnalysisConfigRecord): AnalysisConfigView {
  return {
    id: record.id,
    organization_id: record.organizationId,
    name: record.name,
    description: record.description,
    config: record.config,
    is_active: record.isActive,
    created_by: record.createdBy,
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  };
}

/**
 * Saved analysis configurations. Deletion only deactivates, so results that
 * reference a configuration keep their link.
 */
@Injectable()
export class AnalysisConfigsService {
  private readonly logger = new Logger(AnalysisConfigsService.name);

  constructor(
    @Inject(ANALYSIS_CONFIG_REPOSITORY) private readonly configs: AnalysisConfigRepository,
    private readonly conversation: ConversationService,
  ) {}

  async create(
    organizationId: string,
    input: CreateAnalysisConfigInput,
    createdBy?: string,
  ): Promise<AnalysisConfigView> {
    const creator = createdBy ? await this.conversation.findPrincipal(organizationId, createdBy) : null;
    try {
      const record = await this.configs.create({
        organizationId,
        name: input.name,
        description: input.description ?? null,
        config: { ...input.config },
        isActive: true,
        createdBy: creator?.id ?? null,
      });
      this.logger.log(`Created analysis configuration ${record.name} for organization ${organizationId}`);
      return toView(record);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateNameError("Configuration", input.name);
      }
      throw error;
    }
  }

  async list(organizationId: string, query: ListAnalysisConfigsQuery): Promise<AnalysisConfigList> {
    const options = { includeInactive: query.include_inactive };
    const [records, total] = await Promise.all([
      this.configs.listByOrganization(organizationId, {
        ...options,
        limit: query.page_size,
        offset: (query.page - 1) * query.page_size,
      }),
      this.configs.countByOrganization(organizationId, options),
    ]);
    return { items: records.map(toView), total, page: query.page, page_size: query.page_size };
  }

  async get(organizationId: string, id: string): Promise<AnalysisConfigView> {
    return toView(await this.getOwned(organizationId, id));
  }

  /** Active configurations only; names are unique per organization. */
  async getByName(organizationId: string, name: string): Promise<AnalysisConfigView> {
    const record = await this.configs.findByName(organizationId, name);
    if (!record?.isActive) {
      throw new AnalysisConfigNotFoundError(name);
    }
    return toView(record);
  }

  /** The stored settings of an active configuration, for analysis runs. */
  async getActiveRecord(organizationId: string, id: string): Promise<JsonObject> {
    const record = await this.getOwned(organizationId, id);
    if (!record.isActive) {
      throw new AnalysisConfigNotFoundError(id);
    }
    return record.config;
  }

  async update(
    organizationId: string,
    id: string,
    input: UpdateAnalysisConfigInput,
  ): Promise<AnalysisConfigView> {
    await this.getOwned(organizationId, id);
    const patch: AnalysisConfigPatch = {
      name: input.name,
      description: input.description,
      config: input.config ? { ...input.config } : undefined,
      isActive: input.is_active,
    };
    try {
      const updated = await this.configs.update(id, patch);
      if (!updated) throw new AnalysisConfigNotFoundError(id);
      return toView(updated);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateNameError("Configuration", input.name ?? "");
      }
      throw error;
    }
  }

  async deactivate(organizationId: string, id: string): Promise<void> {
    await this.getOwned(organizationId, id);
    await this.configs.update(id, { isActive: false });
    this.logger.log(`Deactivated analysis configuration ${id}`);
  }

  private async getOwned(organizationId: string, id: string): Promise<AnalysisConfigRecord> {
    const record = await this.configs.get(id);
    if (!record || record.organizationId !== organizationId) {
      throw new AnalysisConfigNotFoundError(id);
    }
    return record;
  }
}
