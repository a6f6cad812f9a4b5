/**
 * Skill Router
 *
 * Purpose:
 * Maps a question to the slice of the data model it is about. A skill decides
 * which schema context the SQL generator sees, which tables the validator
 * allows, which tenant column must be filtered, how answers are phrased and
 * how results are rendered when synthesis is unavailable.
 *
 * Classification is deterministic keyword matching over an ordered table
 * (server/config/skillKeywords.json): first match wins, no match is `general`.
 *
 * Layer: Decision Layer
 */

import { z } from "zod";
import { getTableConfig, type PgTable } from "drizzle-orm/pg-core";
import {
  companies,
  companiesDocumentsJoin,
  documents,
  emails,
  phoneCalls,
  phoneMessages,
  type QueryRow,
} from "@shared/schema";
import skillKeywords from "../config/skillKeywords.json";
import { FALLBACK_LIMITS } from "../config/constants";
import {
  PHONE_CALLS_CONTEXT,
  PHONE_MESSAGES_CONTEXT,
  EMAIL_COMMUNICATIONS_CONTEXT,
  COMPANIES_DATA_CONTEXT,
  DOCUMENTS_CONTEXT,
  GENERAL_CONTEXT,
  PHONE_CALLS_GUIDANCE,
  PHONE_MESSAGES_GUIDANCE,
  EMAIL_COMMUNICATIONS_GUIDANCE,
  COMPANIES_DATA_GUIDANCE,
  DOCUMENTS_GUIDANCE,
  GENERAL_GUIDANCE,
} from "../config/prompts";

export enum Skill {
  PHONE_CALLS = "phone_calls",
  PHONE_MESSAGES = "phone_messages",
  EMAIL_COMMUNICATIONS = "email_communications",
  COMPANIES_DATA = "companies_data",
  DOCUMENTS = "documents",
  GENERAL = "general",
}

export interface SkillDefinition {
  skill: Skill;
  /** Schema-qualified table names the generated SQL may reference. */
  allowedTables: string[];
  /** Columns that carry the tenant id for this skill's tables. */
  tenantColumns: string[];
  schemaContext: string;
  responseGuidance: string;
  formatFallback: (rows: QueryRow[]) => string;
}

// ============================================================================
// KEYWORD TABLE
// ============================================================================

const keywordTableSchema = z.array(
  z.object({
    skill: z.nativeEnum(Skill),
    keywords: z.array(z.string().min(1)).min(1),
  }),
);

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Whole-word match: "recall" must not match "call".
function keywordPattern(keyword: string): RegExp {
  const body = escapeRegex(keyword.toLowerCase()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![\\w])${body}(?![\\w])`);
}

const KEYWORD_TABLE: Array<{ skill: Skill; patterns: RegExp[] }> = keywordTableSchema
  .parse(skillKeywords)
  .map(entry => ({ skill: entry.skill, patterns: entry.keywords.map(keywordPattern) }));

export function detectSkill(question: string): Skill {
  const lower = question.toLowerCase();
  for (const entry of KEYWORD_TABLE) {
    if (entry.patterns.some(pattern => pattern.test(lower))) {
      return entry.skill;
    }
  }
  return Skill.GENERAL;
}

// ============================================================================
// FALLBACK FORMATTERS
// ============================================================================

function display(value: unknown): string {
  if (value === null || value === undefined || value === "") return "N/A";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function has(row: QueryRow, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(row, key);
}

function finish(lines: string[], total: number, shown: number, noun: string): string {
  if (total > shown) {
    lines.push(`...and ${total - shown} more ${noun}.`);
  }
  return lines.join("\n").trimEnd();
}

export function formatGeneralFallback(rows: QueryRow[]): string {
  if (rows.length === 0) return "Query completed but returned no results.";

  const columns = Object.keys(rows[0]);
  let response = `Found ${rows.length} result(s)`;
  if (columns.length > 0) {
    response += ` with columns: ${columns.slice(0, FALLBACK_LIMITS.MAX_LISTED_COLUMNS).join(", ")}`;
    if (columns.length > FALLBACK_LIMITS.MAX_LISTED_COLUMNS) {
      response += ` and ${columns.length - FALLBACK_LIMITS.MAX_LISTED_COLUMNS} more`;
    }
  }
  return response;
}

export function formatPhoneCallsFallback(rows: QueryRow[]): string {
  if (rows.length === 0) return "No phone calls found.";

  const lines = [`Found ${rows.length} phone call(s).`, ""];
  const shown = rows.slice(0, FALLBACK_LIMITS.MAX_LISTED_ITEMS);
  shown.forEach((call, i) => {
    lines.push(`**Call ${i + 1}:**`);
    if (has(call, "direction")) lines.push(`Direction: ${display(call.direction)}`);
    if (has(call, "type")) lines.push(`Type: ${display(call.type)}`);
    if (has(call, "call_created_at")) lines.push(`Date: ${display(call.call_created_at)}`);
    if (call.recording_summary) {
      const summary = display(call.recording_summary);
      lines.push(`Summary: ${summary.length > FALLBACK_LIMITS.CALL_SUMMARY_CHARS
        ? summary.slice(0, FALLBACK_LIMITS.CALL_SUMMARY_CHARS) + "..."
        : summary}`);
    }
    lines.push("");
  });
  return finish(lines, rows.length, shown.length, "calls");
}

export function formatPhoneMessagesFallback(rows: QueryRow[]): string {
  if (rows.length === 0) return "No text messages found.";

  const lines = [`Found ${rows.length} text message(s).`, ""];
  const shown = rows.slice(0, FALLBACK_LIMITS.MAX_LISTED_MESSAGES);
  shown.forEach((message, i) => {
    lines.push(`**Message ${i + 1}:**`);
    if (has(message, "direction")) {
      lines.push(`Direction: ${message.direction === "incoming" ? "From client" : "From our team"}`);
    }
    if (has(message, "message_created_at")) lines.push(`Date: ${display(message.message_created_at)}`);
    if (has(message, "message_body")) lines.push(`Content: ${display(message.message_body)}`);
    lines.push("");
  });
  return finish(lines, rows.length, shown.length, "messages");
}

export function formatEmailFallback(rows: QueryRow[]): string {
  if (rows.length === 0) return "No email communications found.";

  const lines = [`Found ${rows.length} email(s).`, ""];
  const shown = rows.slice(0, FALLBACK_LIMITS.MAX_LISTED_ITEMS);
  shown.forEach((email, i) => {
    lines.push(`**Email ${i + 1}:**`);
    lines.push(`From: ${display(email.sender_email)}`);
    if (has(email, "subject")) lines.push(`Subject: ${display(email.subject)}`);
    if (has(email, "sent_date")) lines.push(`Date: ${display(email.sent_date)}`);
    if (has(email, "category")) lines.push(`Category: ${display(email.category)}`);
    lines.push("");
  });
  return finish(lines, rows.length, shown.length, "emails");
}

function toCount(value: unknown): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

export function formatCompanyFallback(rows: QueryRow[]): string {
  if (rows.length === 0) return "No company information found.";

  const company = rows[0];
  const name = company.company_name ? display(company.company_name) : "Company";
  const lines = [`**${name}**`, ""];
  if (has(company, "company_primary_email")) lines.push(`Email: ${display(company.company_primary_email)}`);
  if (has(company, "company_primary_phone")) lines.push(`Phone: ${display(company.company_primary_phone)}`);
  if (has(company, "company_industry")) lines.push(`Industry: ${display(company.company_industry)}`);
  if (has(company, "company_full_time_employees") || has(company, "company_part_time_employees")) {
    const fullTime = toCount(company.company_full_time_employees);
    const partTime = toCount(company.company_part_time_employees);
    lines.push(`Employees: ${fullTime + partTime} (${fullTime} FT, ${partTime} PT)`);
  }
  return lines.join("\n").trimEnd();
}

export function formatDocumentsFallback(rows: QueryRow[]): string {
  if (rows.length === 0) return "No documents found for this company.";

  const lines = [`Found ${rows.length} document(s):`, ""];
  const shown = rows.slice(0, FALLBACK_LIMITS.MAX_LISTED_ITEMS);
  shown.forEach((doc, i) => {
    const filename = doc.filename ? display(doc.filename) : "Unknown";
    const contentType = doc.content_type ? display(doc.content_type) : "Unknown";
    lines.push(`**${i + 1}. ${filename}** (${contentType})`);
    lines.push(`   - Content: ${doc.has_content ? "Yes" : "No"} | Summary: ${doc.has_summary ? "Yes" : "No"}`);
  });
  return finish(lines, rows.length, shown.length, "documents");
}

// ============================================================================
// SKILL DEFINITIONS
// ============================================================================

export function qualifiedTableName(table: PgTable): string {
  const { name, schema } = getTableConfig(table);
  return `${schema ?? "public"}.${name}`;
}

const tables = (...list: PgTable[]): string[] => list.map(qualifiedTableName);

export const SKILL_DEFINITIONS: Record<Skill, SkillDefinition> = {
  [Skill.PHONE_CALLS]: {
    skill: Skill.PHONE_CALLS,
    allowedTables: tables(phoneCalls),
    tenantColumns: ["matched_company_id"],
    schemaContext: PHONE_CALLS_CONTEXT,
    responseGuidance: PHONE_CALLS_GUIDANCE,
    formatFallback: formatPhoneCallsFallback,
  },
  [Skill.PHONE_MESSAGES]: {
    skill: Skill.PHONE_MESSAGES,
    allowedTables: tables(phoneMessages),
    tenantColumns: ["matched_company_id"],
    schemaContext: PHONE_MESSAGES_CONTEXT,
    responseGuidance: PHONE_MESSAGES_GUIDANCE,
    formatFallback: formatPhoneMessagesFallback,
  },
  [Skill.EMAIL_COMMUNICATIONS]: {
    skill: Skill.EMAIL_COMMUNICATIONS,
    allowedTables: tables(emails),
    tenantColumns: ["matched_company_id"],
    schemaContext: EMAIL_COMMUNICATIONS_CONTEXT,
    responseGuidance: EMAIL_COMMUNICATIONS_GUIDANCE,
    formatFallback: formatEmailFallback,
  },
  [Skill.COMPANIES_DATA]: {
    skill: Skill.COMPANIES_DATA,
    allowedTables: tables(companies),
    tenantColumns: ["id"],
    schemaContext: COMPANIES_DATA_CONTEXT,
    responseGuidance: COMPANIES_DATA_GUIDANCE,
    formatFallback: formatCompanyFallback,
  },
  [Skill.DOCUMENTS]: {
    skill: Skill.DOCUMENTS,
    allowedTables: tables(documents, companiesDocumentsJoin),
    tenantColumns: ["company_id"],
    schemaContext: DOCUMENTS_CONTEXT,
    responseGuidance: DOCUMENTS_GUIDANCE,
    formatFallback: formatDocumentsFallback,
  },
  [Skill.GENERAL]: {
    skill: Skill.GENERAL,
    allowedTables: tables(emails, phoneCalls, phoneMessages, companies, documents, companiesDocumentsJoin),
    tenantColumns: ["matched_company_id", "company_id"],
    schemaContext: GENERAL_CONTEXT,
    responseGuidance: GENERAL_GUIDANCE,
    formatFallback: formatGeneralFallback,
  },
};

export function getSkillDefinition(skill: Skill): SkillDefinition {
  return SKILL_DEFINITIONS[skill];
}

export function renderSchemaContext(skill: Skill, tenantId: number): string {
  return SKILL_DEFINITIONS[skill].schemaContext.replaceAll("{company_id}", String(tenantId));
}
