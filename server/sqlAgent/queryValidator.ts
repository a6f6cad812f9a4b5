/**
 * Query Validator
 *
 * Purpose:
 * Deterministic gate between SQL generation and execution. A candidate query
 * only reaches the data store if it is a single read-only statement, filters
 * on the caller's tenant, touches only the skill's tables, and parses as
 * PostgreSQL.
 *
 * Checks run in order and the first failing check short-circuits, so the
 * feedback handed back to the generator names one problem at a time.
 *
 * Layer: SQL Agent
 */

import sqlParser from "node-sql-parser";
import { getSkillDefinition, type Skill } from "../decisionLayer/skills";

export type ValidationVerdict = {
  isValid: boolean;
  violations: string[];
};

// Mutations are rejected anywhere in the text, string literals included.
const FORBIDDEN_KEYWORDS = [
  "insert", "update", "delete", "drop", "alter", "truncate", "create",
  "grant", "revoke", "exec", "execute",
] as const;

// Only matched outside literals: "call" and "copy" are ordinary words in message text.
const FORBIDDEN_STATEMENT_KEYWORDS = ["merge", "copy", "call"] as const;

const wordPattern = (keyword: string) => new RegExp(`\\b${keyword}\\b`, "i");

const FORBIDDEN_PATTERNS = FORBIDDEN_KEYWORDS.map(keyword => ({ keyword, pattern: wordPattern(keyword) }));
const FORBIDDEN_STATEMENT_PATTERNS = FORBIDDEN_STATEMENT_KEYWORDS.map(keyword => ({
  keyword,
  pattern: wordPattern(keyword),
}));

const PARSER_OPTIONS = { database: "PostgresQL" };

const parser = new sqlParser.Parser();

const valid = (): ValidationVerdict => ({ isValid: true, violations: [] });
const invalid = (...violations: string[]): ValidationVerdict => ({ isValid: false, violations });

// ============================================================================
// Lexing: string literals and comments
// ============================================================================

type SqlSegment = { kind: "code" | "literal" | "comment"; text: string };

function quotedEnd(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let i = start + 1;
  while (i < sql.length) {
    if (backslashEscapes && sql[i] === "\\") {
      i += 2;
    } else if (sql[i] === quote) {
      if (sql[i + 1] !== quote) return i + 1;
      i += 2;
    } else {
      i++;
    }
  }
  return sql.length;
}

// PostgreSQL block comments nest.
function blockCommentEnd(sql: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < sql.length) {
    if (sql.startsWith("/*", i)) {
      depth++;
      i += 2;
    } else if (sql.startsWith("*/", i)) {
      depth--;
      i += 2;
      if (depth === 0) return i;
    } else {
      i++;
    }
  }
  return sql.length;
}

/**
 * Splits a query into code, string literals ('...', E'...', $tag$...$tag$)
 * and comments. Quoted identifiers stay in code.
 */
export function scanSql(sql: string): SqlSegment[] {
  const segments: SqlSegment[] = [];
  let code = "";
  const push = (kind: SqlSegment["kind"], text: string) => {
    if (code) {
      segments.push({ kind: "code", text: code });
      code = "";
    }
    segments.push({ kind, text });
  };

  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    const before = sql[i - 1] ?? "";

    if (sql.startsWith("--", i)) {
      const newline = sql.indexOf("\n", i);
      const end = newline === -1 ? sql.length : newline;
      push("comment", sql.slice(i, end));
      i = end;
    } else if (sql.startsWith("/*", i)) {
      const end = blockCommentEnd(sql, i);
      push("comment", sql.slice(i, end));
      i = end;
    } else if (ch === "'") {
      const escapes = /[eE]/.test(before) && !/[\w$]/.test(sql[i - 2] ?? "");
      const end = quotedEnd(sql, i, "'", escapes);
      push("literal", sql.slice(i, end));
      i = end;
    } else if (ch === '"') {
      const end = quotedEnd(sql, i, '"', false);
      code += sql.slice(i, end);
      i = end;
    } else if (ch === "$" && !/[\w$]/.test(before) && /^\$(?:[A-Za-z_]\w*)?\$/.test(sql.slice(i))) {
      const tag = /^\$(?:[A-Za-z_]\w*)?\$/.exec(sql.slice(i))?.[0] ?? "$$";
      const close = sql.indexOf(tag, i + tag.length);
      const end = close === -1 ? sql.length : close + tag.length;
      push("literal", sql.slice(i, end));
      i = end;
    } else {
      code += ch;
      i++;
    }
  }
  if (code) segments.push({ kind: "code", text: code });
  return segments;
}

/** Removes comments outside string literals. */
export function stripComments(sql: string): string {
  return scanSql(sql)
    .map(segment => (segment.kind === "comment" ? " " : segment.text))
    .join("");
}

/**
 * The exact text that is validated and then executed: comments removed,
 * surrounding whitespace trimmed.
 */
export function normalizeQuery(sql: string): string {
  return stripComments(sql).trim();
}

// Literals collapse to '' so their content cannot look like code.
function maskLiterals(sql: string): string {
  return scanSql(sql)
    .map(segment => (segment.kind === "literal" ? "''" : segment.kind === "comment" ? " " : segment.text))
    .join("");
}

// ============================================================================
// AST helpers
// ============================================================================

type AstNode = Record<string, unknown>;

function isNode(value: unknown): value is AstNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectNodes(value: unknown, nodes: AstNode[] = []): AstNode[] {
  if (Array.isArray(value)) {
    for (const item of value) collectNodes(item, nodes);
  } else if (isNode(value)) {
    nodes.push(value);
    for (const child of Object.values(value)) collectNodes(child, nodes);
  }
  return nodes;
}

// Identifiers come back either as plain strings or as { expr: { value } } / { value }.
function identifierName(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (!isNode(value)) return null;
  if (typeof value.value === "string") return value.value;
  return identifierName(value.expr);
}

function columnName(node: unknown): string | null {
  if (!isNode(node) || node.type !== "column_ref") return null;
  const name = identifierName(node.column);
  return name ? name.toLowerCase() : null;
}

function literalValue(node: unknown): string | null {
  if (!isNode(node)) return null;
  if ((node.type === "number" || node.type === "bigint") && (typeof node.value === "number" || typeof node.value === "string")) {
    return String(node.value);
  }
  if (
    (node.type === "single_quote_string" || node.type === "string") &&
    typeof node.value === "string"
  ) {
    return node.value;
  }
  return null;
}

type TenantComparison = { column: string; value: string };

function tenantComparison(node: AstNode, tenantColumns: string[]): TenantComparison | null {
  if (node.type !== "binary_expr" || node.operator !== "=") return null;
  for (const [columnSide, valueSide] of [[node.left, node.right], [node.right, node.left]]) {
    const column = columnName(columnSide);
    const value = literalValue(valueSide);
    if (column && value !== null && tenantColumns.includes(column)) {
      return { column, value };
    }
  }
  return null;
}

function conjuncts(expr: unknown): AstNode[] {
  if (!isNode(expr)) return [];
  if (expr.type === "binary_expr" && typeof expr.operator === "string" && expr.operator.toUpperCase() === "AND") {
    return [...conjuncts(expr.left), ...conjuncts(expr.right)];
  }
  return [expr];
}

function cteNames(nodes: AstNode[]): Set<string> {
  const names = new Set<string>();
  for (const node of nodes) {
    if (node.type !== "select" || !Array.isArray(node.with)) continue;
    for (const cte of node.with) {
      const name = isNode(cte) ? identifierName(cte.name) : null;
      if (name) names.add(name.toLowerCase());
    }
  }
  return names;
}

// Base tables a single SELECT reads directly (not through a sub-select or CTE).
function baseTablesOf(select: AstNode, ctes: Set<string>): string[] {
  if (!Array.isArray(select.from)) return [];
  return select.from
    .filter(isNode)
    .map(item => (typeof item.table === "string" ? item.table.toLowerCase() : null))
    .filter((table): table is string => table !== null && !ctes.has(table));
}

function parse(sql: string): unknown {
  return parser.astify(sql, PARSER_OPTIONS);
}

/**
 * Tables a query reads, lowercased and schema-qualified where the query
 * qualifies them, in order of first reference. CTE names are excluded.
 * Returns [] for text that does not parse.
 */
export function referencedTables(sql: string): string[] {
  const text = normalizeQuery(sql);
  let ast: unknown;
  let entries: string[];
  try {
    ast = parse(text);
    entries = parser.tableList(text, PARSER_OPTIONS);
  } catch {
    return [];
  }

  const ctes = cteNames(collectNodes(ast));
  const tables: string[] = [];
  // Entries look like "select::schema::table", with "null" for an unqualified table.
  for (const entry of entries) {
    const [, schema, table] = entry.split("::");
    if (!table || ctes.has(table.toLowerCase())) continue;
    const name = (schema && schema !== "null" ? `${schema}.${table}` : table).toLowerCase();
    if (!tables.includes(name)) tables.push(name);
  }
  return tables;
}

// ============================================================================
// CHECK 1: read-only single statement
// ============================================================================

function checkReadOnly(sql: string): ValidationVerdict {
  if (sql.length === 0) {
    return invalid("Query is empty");
  }

  const code = maskLiterals(sql);
  const forbidden = [
    ...FORBIDDEN_PATTERNS.filter(({ pattern }) => pattern.test(sql)),
    ...FORBIDDEN_STATEMENT_PATTERNS.filter(({ pattern }) => pattern.test(code)),
  ].map(({ keyword }) => keyword.toUpperCase());
  if (forbidden.length > 0) {
    return invalid(`Forbidden keyword(s) in query: ${forbidden.join(", ")}. Only read-only SELECT queries are allowed`);
  }

  const withoutTrailing = code.trim().replace(/;\s*$/, "");
  if (withoutTrailing.includes(";")) {
    return invalid("Multiple statements are not allowed");
  }

  if (!/^\s*(select|with)\b/i.test(withoutTrailing)) {
    return invalid("Query must start with SELECT or WITH");
  }

  return valid();
}

// ============================================================================
// CHECK 2: parseable
// ============================================================================

function checkParseable(sql: string): { verdict: ValidationVerdict; ast: unknown } {
  try {
    return { verdict: valid(), ast: parse(sql) };
  } catch (error) {
    const reason = error instanceof Error ? error.message.split("\n")[0] : String(error);
    return { verdict: invalid(`SQL syntax error: ${reason}`), ast: null };
  }
}

// ============================================================================
// CHECK 3: tenant predicate
// ============================================================================

/**
 * Every comparison of a tenant column with a literal must name the caller's
 * tenant, and every SELECT that reads a base table must carry such a
 * comparison as a top-level AND term of its own WHERE clause.
 */
function checkTenantFilter(ast: unknown, tenantId: number, tenantColumns: string[]): ValidationVerdict {
  const id = String(tenantId);
  const columns = tenantColumns.map(column => column.toLowerCase());
  const nodes = collectNodes(ast);

  for (const node of nodes) {
    const comparison = tenantComparison(node, columns);
    if (comparison && comparison.value !== id) {
      const { column, value } = comparison;
      return invalid(`Query filters on another tenant (${column} = ${value}); only ${column} = ${id} is allowed`);
    }
  }

  const ctes = cteNames(nodes);
  const selects = nodes.filter(node => node.type === "select");
  const unscoped = selects.some(select =>
    baseTablesOf(select, ctes).length > 0 &&
    !conjuncts(select.where).some(term => tenantComparison(term, columns)?.value === id),
  );
  if (unscoped || selects.length === 0) {
    const expected = tenantColumns.map(column => `${column} = ${id}`).join(" or ");
    return invalid(`Missing tenant filter: the WHERE clause must include ${expected}`);
  }

  return valid();
}

// ============================================================================
// CHECK 4: table allow-list
// ============================================================================

function isAllowedTable(table: string, allowedTables: string[]): boolean {
  const name = table.toLowerCase();
  return allowedTables.some(allowed => allowed === name || allowed.split(".").pop() === name);
}

function checkAllowedTables(sql: string, allowedTables: string[]): ValidationVerdict {
  const disallowed = referencedTables(sql).filter(table => !isAllowedTable(table, allowedTables));
  if (disallowed.length > 0) {
    return invalid(`Table(s) not allowed for this query: ${disallowed.join(", ")}. Allowed tables: ${allowedTables.join(", ")}`);
  }
  return valid();
}

/**
 * Validates a generated query for the given tenant and skill. The verdict
 * applies to `normalizeQuery(sql)`, which is the text the executor runs.
 * Pure and synchronous: the verdict depends only on the arguments.
 */
export function validateQuery(sql: string, tenantId: number, skill: Skill): ValidationVerdict {
  const definition = getSkillDefinition(skill);
  const text = normalizeQuery(sql);

  const readOnly = checkReadOnly(text);
  if (!readOnly.isValid) return readOnly;

  const { verdict: parsed, ast } = checkParseable(text);
  if (!parsed.isValid) return parsed;

  const checks: Array<() => ValidationVerdict> = [
    () => checkTenantFilter(ast, tenantId, definition.tenantColumns),
    () => checkAllowedTables(text, definition.allowedTables),
  ];
  for (const check of checks) {
    const verdict = check();
    if (!verdict.isValid) return verdict;
  }
  return valid();
}
