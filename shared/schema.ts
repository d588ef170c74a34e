import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb, integer, real, boolean, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Ordered: earlier labels win confidence ties
export const INTENT_LABELS = [
  "knowledge_qa",
  "lead_capture",
  "proposal_request",
  "next_step",
  "status_update",
  "smalltalk",
  "unknown",
] as const;
export type IntentLabel = typeof INTENT_LABELS[number];

export const ENTITY_TYPES = ["name", "company", "email", "phone", "money", "datetime"] as const;
export type EntityType = typeof ENTITY_TYPES[number];

export const STATUS_LABELS = ["Won", "Lost", "On Hold"] as const;
export type StatusLabel = typeof STATUS_LABELS[number];

export const documentChunks = pgTable("document_chunks", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  sourceId: text("source_id").notNull(),
  title: text("title"),
  chunkIndex: integer("chunk_index").notNull(),
  content: text("content").notNull(),
  tokenCount: integer("token_count").notNull(),
  requestId: text("request_id"),
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  sourceIdx: index("document_chunks_source_idx").on(table.sourceId),
}));

export const leads = pgTable("leads", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: text("user_id").notNull(),
  requestId: text("request_id").notNull(),
  name: text("name").notNull(),
  company: text("company").notNull(),
  email: text("email").notNull(),
  phone: text("phone").notNull(),
  intent: text("intent").notNull(),
  budget: text("budget").notNull(),
  timeline: text("timeline").notNull(),
  normalizedDomain: text("normalized_domain"),
  emailValid: boolean("email_valid").default(false).notNull(),
  phoneValid: boolean("phone_valid").default(false).notNull(),
  qualityScore: real("quality_score").notNull(),
  notes: text("notes"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const interactionLogs = pgTable("interaction_logs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  requestId: text("request_id").notNull(),
  userId: text("user_id").notNull(),
  messageText: text("message_text").notNull(),
  intent: text("intent").notNull(),
  confidence: real("confidence").notNull(),
  entities: jsonb("entities").$type<Array<{ type: string; value: string; confidence: number }>>().notNull(),
  responseKind: text("response_kind").notNull(),
  errorCode: text("error_code"),
  durationMs: integer("duration_ms"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  userIdx: index("interaction_logs_user_idx").on(table.userId),
}));

export const insertDocumentChunkSchema = createInsertSchema(documentChunks).omit({
  id: true,
  createdAt: true,
});

export const insertLeadSchema = createInsertSchema(leads).omit({
  id: true,
  createdAt: true,
});

export const insertInteractionLogSchema = createInsertSchema(interactionLogs).omit({
  id: true,
  createdAt: true,
});

// Row types come from the tables; the zod schemas above check a row before it is written
export type InsertDocumentChunk = typeof documentChunks.$inferInsert;
export type InsertLead = typeof leads.$inferInsert;
export type InsertInteractionLog = typeof interactionLogs.$inferInsert;

// Transport-facing request shapes

export const inboundMessageSchema = z.object({
  text: z.string().max(20000).default(""),
  userId: z.string().min(1, "userId is required"),
  requestId: z.string().min(1).optional(),
  hasAttachment: z.boolean().default(false),
  attachment: z.object({
    filename: z.string().min(1),
    text: z.string(),
  }).optional(),
});
export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export const classifyRequestSchema = z.object({
  text: z.string().max(20000),
  hasAttachment: z.boolean().default(false),
  userId: z.string().min(1).optional(),
});

export const leadRequestSchema = z.object({
  text: z.string().min(1, "text is required"),
});

export const proposalRequestSchema = z.object({
  company: z.string().optional(),
  name: z.string().optional(),
  intent: z.string().optional(),
  budget: z.string().optional(),
  timeline: z.string().optional(),
});

export const scheduleRequestSchema = z.object({
  text: z.string().min(1, "text is required"),
  now: z.string().datetime().optional(),
});

export const statusRequestSchema = z.object({
  label: z.enum(STATUS_LABELS),
  reason: z.string().default(""),
});
