import { z } from "zod";
import {
  pgSchema,
  pgTable,
  bigint,
  text,
  integer,
  numeric,
  jsonb,
  timestamp,
  vector,
  index,
} from "drizzle-orm/pg-core";

/**
 * Data store tables the assistant is allowed to read.
 *
 * These tables are owned by the ingestion pipeline; this file only declares the
 * columns the assistant reads so that table allow-lists and the document
 * search adapter share one source of truth.
 */

export const communications = pgSchema("communications");

export const companies = pgTable("companies", {
  id: bigint("id", { mode: "number" }).primaryKey(),
  companyName: text("company_name"),
  companyDescription: text("company_description"),
  companyWebsite: text("company_website"),
  companyPrimaryEmail: text("company_primary_email"),
  companyPrimaryPhone: text("company_primary_phone"),
  companyStreetAddress1: text("company_street_address_1"),
  companyCity: text("company_city"),
  companyState: text("company_state"),
  companyPostalCode: text("company_postal_code"),
  companyIndustry: text("company_industry"),
  companyAnnualRevenueUsd: numeric("company_annual_revenue_usd"),
  companyFullTimeEmployees: integer("company_full_time_employees"),
  companyYearsInBusiness: integer("company_years_in_business"),
  insuranceTypes: jsonb("insurance_types"),
  companyStatus: text("company_status"),
  pendingAction: text("pending_action"),
  createdAt: timestamp("created_at", { withTimezone: true }),
  updatedAt: timestamp("updated_at", { withTimezone: true }),
});

export const emails = communications.table("emails_silver", {
  id: bigint("id", { mode: "number" }).primaryKey(),
  matchedCompanyId: bigint("matched_company_id", { mode: "number" }),
  threadId: text("thread_id"),
  threadPosition: integer("thread_position"),
  senderEmail: text("sender_email"),
  senderName: text("sender_name"),
  recipientEmails: jsonb("recipient_emails"),
  subject: text("subject"),
  bodyText: text("body_text"),
  parsedContent: text("parsed_content"),
  threadSummary: text("thread_summary"),
  direction: text("direction"),
  classificationRaw: jsonb("classification_raw"),
  sentDate: timestamp("sent_date", { withTimezone: true }),
});

export const phoneCalls = communications.table("phone_call_silver", {
  id: bigint("id", { mode: "number" }).primaryKey(),
  matchedCompanyId: bigint("matched_company_id", { mode: "number" }),
  fromNumber: text("from_number"),
  toNumber: text("to_number"),
  direction: text("direction"),
  type: text("type"),
  recordingSummary: text("recording_summary"),
  classificationRaw: jsonb("classification_raw"),
  callCreatedAt: timestamp("call_created_at", { withTimezone: true }),
  answeredAt: timestamp("answered_at", { withTimezone: true }),
  completedAt: timestamp("completed_at", { withTimezone: true }),
});

export const phoneMessages = communications.table("phone_message_silver", {
  id: bigint("id", { mode: "number" }).primaryKey(),
  matchedCompanyId: bigint("matched_company_id", { mode: "number" }),
  fromNumber: text("from_number"),
  toNumber: text("to_number"),
  direction: text("direction"),
  messageBody: text("message_body"),
  messageCreatedAt: timestamp("message_created_at", { withTimezone: true }),
});

export const documents = pgTable("documents_01_14", {
  id: bigint("id", { mode: "number" }).primaryKey(),
  bucketName: text("bucket_name"),
  objectName: text("object_name"),
  metadata: jsonb("metadata"),
  parsedContent: text("parsed_content"),
  documentSummary: text("document_summary"),
  createdAt: timestamp("created_at", { withTimezone: true }),
});

export const companiesDocumentsJoin = pgTable("companies_documents_join", {
  companyId: bigint("company_id", { mode: "number" }).notNull(),
  attachmentId: bigint("attachment_id", { mode: "number" }).notNull(),
});

// Embedded document summaries and content chunks, one row per chunk.
export const documentChunks = pgTable(
  "document_chunks",
  {
    id: bigint("id", { mode: "number" }).primaryKey(),
    documentId: bigint("document_id", { mode: "number" }).notNull(),
    companyId: bigint("company_id", { mode: "number" }).notNull(),
    filename: text("filename").notNull(),
    chunkType: text("chunk_type").default("summary").notNull(), // "summary" or "content"
    content: text("content").notNull(),
    embedding: vector("embedding", { dimensions: 1536 }).notNull(),
  },
  (table) => ({
    companyIdx: index("document_chunks_company_idx").on(table.companyId),
  }),
);

export type Company = typeof companies.$inferSelect;
export type DocumentChunk = typeof documentChunks.$inferSelect;

// ============================================================================
// Caller-facing API
// ============================================================================

export const ROUTES = ["sql_only", "document_search", "hybrid", "conversational"] as const;
export type RouteName = typeof ROUTES[number];

// Ids past 2^53 would round to a neighbouring tenant.
export const companyIdSchema = z.coerce
  .number()
  .int("companyId must be a positive integer")
  .positive("companyId must be a positive integer")
  .max(Number.MAX_SAFE_INTEGER, "companyId is too large");

export const queryRequestSchema = z.object({
  question: z.string().trim().min(1, "Question is required").max(2000),
  companyId: companyIdSchema,
  sessionId: z.string().trim().min(1, "sessionId is required").max(200),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

export type QueryRow = Record<string, unknown>;

export type DocumentSnippet = {
  sourceId: string;
  text: string;
  score: number;
};

export type QueryResponse = {
  success: boolean;
  route: RouteName;
  sql: string | null;
  rows: QueryRow[] | null;
  documentSnippets: DocumentSnippet[] | null;
  naturalResponse: string;
  trace: string[];
  error: string | null;
  skill: string | null;
  attempts: number;
  dataSources: string[];
  needsClarification: boolean;
  routingAnomaly: string | null;
};
