import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConversationService } from "../conversation/conversation.service.js";
import {
  type Persona,
  type PersonaPatch,
  PERSONA_REPOSITORY,
  type PersonaRepository,
  UniqueViolationError,
} from "../data/index.js";
import { DuplicateNameError, PersonaNotFoundError } from "../errors/index.js";
import type { CreatePersonaInput, ListPersonasQuery, UpdatePersonaInput } from "./personas.schema.js";

export interface PersonaView {
  id: string;
  organization_id: string;
  user_id: string | null;
  name: string;
  description: string | null;
  content: string;
  metadata: Record<string, unknown> | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

/**
 * A persona is usable by a principal when it is unrestricted or restricted
 * to that principal.
 */
export function isPersonaAccessible(persona: Persona, principalId: string | null): boolean {
  return persona.principalId === null || persona.principalId === principalId;
}

@Injectable()
export class PersonasService {
  private readonly logger = new Logger(PersonasService.name);

  constructor(
    @Inject(PERSONA_REPOSITORY) private readonly personas: PersonaRepository,
    private readonly conversation: ConversationService,
  ) {}

  /**
   * Persona lookup for a relay request: active, same organization, and
   * accessible to the acting user (when one is given).
   */
  async resolveForRequest(
    organizationId: string,
    personaId: string,
    externalUserId?: string,
  ): Promise<Persona> {
    const persona = await this.personas.get(personaId);
    if (!persona || persona.organizationId !== organizationId || !persona.isActive) {
      throw new PersonaNotFoundError(personaId);
    }
    let principalId: string | null = null;
    if (externalUserId) {
      const principal = await this.conversation.findPrincipal(organizationId, externalUserId);
      principalId = principal?.id ?? null;
    }
    if (!isPersonaAccessible(persona, principalId)) {
      throw new PersonaNotFoundError(personaId);
    }
    return persona;
  }

  async create(organizationId: string, input: CreatePersonaInput): Promise<PersonaView> {
    const principalId = input.user_id
      ? (await this.conversation.getOrCreatePrincipal(organizationId, input.user_id)).id
      : null;
    try {
      const persona = await this.personas.create({
        organizationId,
        principalId,
        name: input.name,
        description: input.description ?? null,
        content: input.content,
        metadata: input.metadata ?? null,
        isActive: true,
      });
      this.logger.log(`Created persona ${persona.name} for organization ${organizationId}`);
      return this.toView(persona, input.user_id ?? null);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateNameError("A persona", input.name);
      }
      throw error;
    }
  }

  async list(organizationId: string, query: ListPersonasQuery): Promise<PersonaView[]> {
    const personas = await this.personas.listByOrganization(organizationId, {
      includeInactive: query.include_inactive,
    });
    let visible = personas;
    if (query.user_id) {
      const principal = await this.conversation.findPrincipal(organizationId, query.user_id);
      visible = personas.filter((p) => isPersonaAccessible(p, principal?.id ?? null));
    }
    return Promise.all(visible.map((p) => this.view(p)));
  }

  async get(organizationId: string, id: string): Promise<PersonaView> {
    return this.view(await this.getOwned(organizationId, id));
  }

  async update(organizationId: string, id: string, input: UpdatePersonaInput): Promise<PersonaView> {
    await this.getOwned(organizationId, id);
    const patch: PersonaPatch = {
      name: input.name,
      description: input.description,
      content: input.content,
      metadata: input.metadata,
      isActive: input.is_active,
    };
    if (input.user_id !== undefined) {
      patch.principalId = input.user_id
        ? (await this.conversation.getOrCreatePrincipal(organizationId, input.user_id)).id
        : null;
    }
    try {
      const updated = await this.personas.update(id, patch);
      if (!updated) throw new PersonaNotFoundError(id);
      return this.view(updated);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateNameError("A persona", input.name ?? "");
      }
      throw error;
    }
  }

  async delete(organizationId: string, id: string): Promise<void> {
    await this.getOwned(organizationId, id);
    await this.personas.delete(id);
    this.logger.log(`Deleted persona ${id}`);
  }

  // Personas of other organizations read as not found
  private async getOwned(organizationId: string, id: string): Promise<Persona> {
    const persona = await this.personas.get(id);
    if (!persona || persona.organizationId !== organizationId) {
      throw new PersonaNotFoundError(id);
    }
    return persona;
  }

  private async view(persona: Persona): Promise<PersonaView> {
    let externalId: string | null = null;
    if (persona.principalId) {
      externalId = (await this.conversation.getPrincipalById(persona.principalId))?.externalId ?? null;
    }
    return this.toView(persona, externalId);
  }

  private toView(persona: Persona, externalId: string | null): PersonaView {
    return {
      id: persona.id,
      organization_id: persona.organizationId,
      user_id: externalId,
      name: persona.name,
      description: persona.description,
      content: persona.content,
      metadata: persona.metadata,
      is_active: persona.isActive,
      created_at: persona.createdAt.toISOString(),
      updated_at: persona.updatedAt.toISOString(),
    };
  }
}
