import type { QueryRow } from "@shared/schema";
import { companies, documents, emails, phoneCalls, phoneMessages } from "@shared/schema";
import { qualifiedTableName } from "../decisionLayer/skills";
import { referencedTables } from "./queryValidator";
import { FALLBACK_LIMITS } from "../config/constants";

const FRIENDLY_NAMES: Record<string, string> = {
  [qualifiedTableName(companies)]: "Companies Master Data",
  [qualifiedTableName(emails)]: "Email Communications",
  [qualifiedTableName(phoneCalls)]: "Phone Calls",
  [qualifiedTableName(phoneMessages)]: "SMS Messages",
  [qualifiedTableName(documents)]: "Company Documents",
};

function friendlyName(table: string): string {
  if (FRIENDLY_NAMES[table]) return FRIENDLY_NAMES[table];
  const match = Object.keys(FRIENDLY_NAMES).find(qualified => qualified.split(".").pop() === table);
  return match ? FRIENDLY_NAMES[match] : table;
}

/**
 * Human-readable names of the tables an executed query read from, in order of
 * first reference. Join tables without a friendly name are listed as-is.
 */
export function extractDataSources(sql: string): string[] {
  const names: string[] = [];
  for (const table of referencedTables(sql)) {
    const name = friendlyName(table);
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

export function summarizeResultMetadata(sql: string, rows: QueryRow[]): string {
  const parts: string[] = [];
  const sources = extractDataSources(sql);
  if (sources.length > 0) {
    parts.push(`Tables: ${sources.join(", ")}`);
  }
  if (rows.length > 0) {
    const columns = Object.keys(rows[0]);
    const shown = columns.slice(0, FALLBACK_LIMITS.MAX_LISTED_COLUMNS).join(", ");
    const more = columns.length > FALLBACK_LIMITS.MAX_LISTED_COLUMNS
      ? ` (+${columns.length - FALLBACK_LIMITS.MAX_LISTED_COLUMNS} more)`
      : "";
    parts.push(`Columns: ${shown}${more}`);
  }
  parts.push(`Rows: ${rows.length}`);
  return parts.join(" | ");
}
