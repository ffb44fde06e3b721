import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  integer,
  jsonb,
  numeric,
  pgTable,
  smallint,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { type JsonObject, REQUEST_STATUSES } from "../data.types.js";

const createdAt = () => timestamp("created_at", { withTimezone: true }).notNull().defaultNow();
const updatedAt = () => timestamp("updated_at", { withTimezone: true }).notNull().defaultNow();

export const organizations = pgTable("organizations", {
  id: uuid("id").primaryKey().defaultRandom(),
  name: varchar("name", { length: 255 }).notNull(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const principals = pgTable(
  "principals",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    organizationId: uuid("organization_id")
      .notNull()
      .references(() => organizations.id, { onDelete: "cascade" }),
    externalId: varchar("external_id", { length: 255 }).notNull(),
    createdAt: createdAt(),
  },
  (table) => ({
    orgExternalUnique: uniqueIndex("uq_principals_org_external").on(
      table.organizationId,
      table.externalId,
    ),
  }),
);

export const apiKeys = pgTable(
  "api_keys",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    organizationId: uuid("organization_id")
      .notNull()
      .references(() => organizations.id, { onDelete: "cascade" }),
    principalId: uuid("principal_id").references(() => principals.id, { onDelete: "set null" }),
    syntheticKey: varchar("synthetic_key", { length: 64 }).notNull(),
    encryptedKey: text("encrypted_key").notNull(),
    name: varchar("name", { length: 255 }),
    description: text("description"),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    syntheticKeyUnique: uniqueIndex("uq_api_keys_synthetic_key").on(table.syntheticKey),
    orgPrincipalIdx: index("idx_api_keys_org_principal").on(table.organizationId, table.principalId),
    // At most one active organization-wide default key
    orgDefaultUnique: uniqueIndex("uq_api_keys_org_default")
      .on(table.organizationId)
      .where(sql`${table.principalId} IS NULL AND ${table.isActive}`),
  }),
);

export const sessions = pgTable(
  "sessions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    principalId: uuid("principal_id")
      .notNull()
      .references(() => principals.id, { onDelete: "cascade" }),
    token: varchar("token", { length: 64 }).notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull().defaultNow(),
    endedAt: timestamp("ended_at", { withTimezone: true }),
  },
  (table) => ({
    tokenUnique: uniqueIndex("uq_sessions_token").on(table.token),
  }),
);

export const personas = pgTable(
  "personas",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    organizationId: uuid("organization_id")
      .notNull()
      .references(() => organizations.id, { onDelete: "cascade" }),
    principalId: uuid("principal_id").references(() => principals.id, { onDelete: "cascade" }),
    name: varchar("name", { length: 255 }).notNull(),
    description: text("description"),
    content: text("content").notNull(),
    metadata: jsonb("metadata").$type<JsonObject>(),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    orgNameUnique: uniqueIndex("uq_personas_org_name").on(table.organizationId, table.name),
  }),
);

// Requests and usage are audit trail: no cascade from principals or sessions.
export const requests = pgTable(
  "requests",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    requestId: varchar("request_id", { length: 64 }).notNull(),
    responseId: varchar("response_id", { length: 255 }),
    organizationId: uuid("organization_id")
      .notNull()
      .references(() => organizations.id),
    sessionId: uuid("session_id")
      .notNull()
      .references(() => sessions.id),
    principalId: uuid("principal_id")
      .notNull()
      .references(() => principals.id),
    credentialId: uuid("api_key_id")
      .notNull()
      .references(() => apiKeys.id),
    personaId: uuid("persona_id").references(() => personas.id, { onDelete: "set null" }),
    model: varchar("model", { length: 100 }),
    requestPayload: jsonb("request_payload").$type<JsonObject>().notNull(),
    responsePayload: jsonb("response_payload").$type<JsonObject>(),
    status: varchar("status", { length: 20, enum: REQUEST_STATUSES }).notNull().default("pending"),
    errorMessage: text("error_message"),
    // -1, 0 or 1; ck_requests_rating in sql/schema.sql
    rating: smallint("rating"),
    ratingFeedback: text("rating_feedback"),
    ratedAt: timestamp("rated_at", { withTimezone: true }),
    createdAt: createdAt(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => ({
    requestIdUnique: uniqueIndex("uq_requests_request_id").on(table.requestId),
    responseIdIdx: index("idx_requests_response_id").on(table.responseId),
    orgCreatedIdx: index("idx_requests_org_created").on(table.organizationId, table.createdAt),
  }),
);

export const usageRecords = pgTable(
  "usage_records",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    requestId: uuid("request_id")
      .notNull()
      .references(() => requests.id),
    model: varchar("model", { length: 100 }).notNull(),
    inputTokens: integer("input_tokens").notNull().default(0),
    outputTokens: integer("output_tokens").notNull().default(0),
    reasoningTokens: integer("reasoning_tokens").notNull().default(0),
    totalTokens: integer("total_tokens").notNull().default(0),
    costUsd: numeric("cost_usd", { precision: 10, scale: 6 }).notNull(),
    createdAt: createdAt(),
  },
  (table) => ({
    requestUnique: uniqueIndex("uq_usage_records_request").on(table.requestId),
  }),
);

export const analysisConfigs = pgTable(
  "analysis_configs",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    organizationId: uuid("organization_id")
      .notNull()
      .references(() => organizations.id, { onDelete: "cascade" }),
    name: varchar("name", { length: 255 }).notNull(),
    description: text("description"),
    config: jsonb("config").$type<JsonObject>().notNull(),
    isActive: boolean("is_active").notNull().default(true),
    createdBy: varchar("created_by", { length: 255 }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    orgNameUnique: uniqueIndex("uq_analysis_configs_org_name").on(table.organizationId, table.name),
  }),
);

export const analysisResults = pgTable(
  "analysis_results",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    requestId: uuid("request_id")
      .notNull()
      .references(() => requests.id),
    analysisConfigId: uuid("analysis_config_id").references(() => analysisConfigs.id, {
      onDelete: "set null",
    }),
    configHash: varchar("config_hash", { length: 64 }).notNull(),
    configSnapshot: jsonb("config_snapshot").$type<JsonObject>().notNull(),
    analysisType: varchar("analysis_type", { length: 50 }).notNull(),
    results: jsonb("results").$type<JsonObject>().notNull(),
    modelUsed: varchar("model_used", { length: 100 }).notNull(),
    tokensUsed: integer("tokens_used"),
    costUsd: numeric("cost_usd", { precision: 10, scale: 6 }),
    createdAt: createdAt(),
  },
  (table) => ({
    requestHashUnique: uniqueIndex("uq_analysis_results_request_hash").on(
      table.requestId,
      table.configHash,
    ),
  }),
);
