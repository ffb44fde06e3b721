import { beforeEach, describe, expect, it } from "vitest";
import { AnalysisConfigsService } from "../../src/analysis/analysis-configs.service.js";
import { ConversationService } from "../../src/conversation/conversation.service.js";
import { createMemoryRepositories } from "../../src/data/index.js";
import { AnalysisConfigNotFoundError, DuplicateNameError } from "../../src/errors/index.js";

const ORG = "org-1";
const CONFIG = {
  analysis_type: "support",
  categories: [{ name: "billing", description: "Payments", examples: [] }],
};

describe("AnalysisConfigsService", () => {
  let conversation: ConversationService;
  let service: AnalysisConfigsService;

  beforeEach(() => {
    const repositories = createMemoryRepositories();
    conversation = new ConversationService(repositories.principals, repositories.sessions);
    service = new AnalysisConfigsService(repositories.analysisConfigs, conversation);
  });

  it("should record the creating user when known", async () => {
    const alice = await conversation.getOrCreatePrincipal(ORG, "alice");

    const created = await service.create(ORG, { name: "triage", config: CONFIG }, "alice");
    const anonymous = await service.create(ORG, { name: "other", config: CONFIG }, "nobody");

    expect(created.created_by).toBe(alice.id);
    expect(anonymous.created_by).toBeNull();
    expect(created.config).toEqual(CONFIG);
  });

  it("should reject a duplicate name in the same organization", async () => {
    await service.create(ORG, { name: "triage", config: CONFIG });

    await expect(service.create(ORG, { name: "triage", config: CONFIG })).rejects.toBeInstanceOf(
      DuplicateNameError,
    );
  });

  it("should page through active configurations", async () => {
    for (const name of ["a", "b", "c"]) {
      await service.create(ORG, { name, config: CONFIG });
    }

    const firstPage = await service.list(ORG, { include_inactive: false, page: 1, page_size: 2 });
    const secondPage = await service.list(ORG, { include_inactive: false, page: 2, page_size: 2 });

    expect(firstPage).toMatchObject({ total: 3, page: 1, page_size: 2 });
    expect(firstPage.items).toHaveLength(2);
    expect(secondPage.items).toHaveLength(1);
  });

  it("should hide deactivated configurations unless asked", async () => {
    const created = await service.create(ORG, { name: "triage", config: CONFIG });
    await service.deactivate(ORG, created.id);

    expect((await service.list(ORG, { include_inactive: false, page: 1, page_size: 50 })).total).toBe(0);
    expect((await service.list(ORG, { include_inactive: true, page: 1, page_size: 50 })).total).toBe(1);
    expect((await service.get(ORG, created.id)).is_active).toBe(false);
    await expect(service.getActiveRecord(ORG, created.id)).rejects.toBeInstanceOf(AnalysisConfigNotFoundError);
  });

  it("should look up an active configuration by name", async () => {
    const created = await service.create(ORG, { name: "triage", config: CONFIG });
    const retired = await service.create(ORG, { name: "retired", config: CONFIG });
    await service.deactivate(ORG, retired.id);

    expect((await service.getByName(ORG, "triage")).id).toBe(created.id);
    await expect(service.getByName(ORG, "retired")).rejects.toBeInstanceOf(AnalysisConfigNotFoundError);
    await expect(service.getByName("org-2", "triage")).rejects.toBeInstanceOf(AnalysisConfigNotFoundError);
    await expect(service.getByName(ORG, "unknown")).rejects.toThrow("Analysis configuration unknown not found");
  });

  it("should update the name and leave the config untouched", async () => {
    const created = await service.create(ORG, { name: "triage", config: CONFIG });

    const updated = await service.update(ORG, created.id, { name: "renamed" });

    expect(updated.name).toBe("renamed");
    expect(updated.config).toEqual(CONFIG);
  });

  it("should treat configurations of another organization as missing", async () => {
    const created = await service.create(ORG, { name: "triage", config: CONFIG });

    await expect(service.get("org-2", created.id)).rejects.toBeInstanceOf(AnalysisConfigNotFoundError);
  });
});
