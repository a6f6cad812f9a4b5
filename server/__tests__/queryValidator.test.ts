import { describe, it, expect } from "vitest";
import { validateQuery, referencedTables, stripComments, normalizeQuery } from "../sqlAgent/queryValidator";
import { Skill } from "../decisionLayer/skills";

const TENANT = 42;
const CALLS_SQL =
  "SELECT direction, recording_summary FROM communications.phone_call_silver WHERE matched_company_id = 42 ORDER BY call_created_at DESC LIMIT 1";
const MISSING_TENANT = "Missing tenant filter: the WHERE clause must include matched_company_id = 42";

describe("validateQuery", () => {
  describe("accepts", () => {
    it("a single tenant-scoped SELECT on an allowed table", () => {
      expect(validateQuery(CALLS_SQL, TENANT, Skill.PHONE_CALLS)).toEqual({ isValid: true, violations: [] });
    });

    it("an aliased, quoted tenant filter", () => {
      const sql = "SELECT p.direction FROM communications.phone_call_silver p WHERE p.matched_company_id = '42'";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).isValid).toBe(true);
    });

    it("a CTE whose name is not mistaken for a table", () => {
      const sql =
        "WITH recent AS (SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 42) SELECT direction FROM recent";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).isValid).toBe(true);
    });

    it("a query whose only forbidden keyword is inside a comment", () => {
      const sql = `${CALLS_SQL} -- DROP TABLE companies`;
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).isValid).toBe(true);
    });

    it("the company table filtered by its own id", () => {
      const sql = "SELECT company_name FROM companies WHERE id = 42";
      expect(validateQuery(sql, TENANT, Skill.COMPANIES_DATA).isValid).toBe(true);
    });

    it("message text containing words that are only statement keywords", () => {
      const sql = `${CALLS_SQL.replace(" ORDER BY", " AND recording_summary ILIKE '%call back%' ORDER BY")}`;
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS)).toEqual({ isValid: true, violations: [] });
    });

    it("comment markers and semicolons inside string literals", () => {
      const sql =
        "SELECT subject FROM communications.emails_silver WHERE matched_company_id = 42 AND body_text ILIKE '%--%' AND subject <> 'a;b'";
      expect(validateQuery(sql, TENANT, Skill.EMAIL_COMMUNICATIONS)).toEqual({ isValid: true, violations: [] });
    });

    it("FROM inside a string literal", () => {
      const sql =
        "SELECT subject FROM communications.emails_silver WHERE matched_company_id = 42 AND subject ILIKE '%quote from acme%'";
      expect(validateQuery(sql, TENANT, Skill.EMAIL_COMMUNICATIONS)).toEqual({ isValid: true, violations: [] });
    });

    it("either tenant column for the general skill", () => {
      const sql = "SELECT document_id FROM public.companies_documents_join WHERE company_id = 42";
      expect(validateQuery(sql, TENANT, Skill.GENERAL).isValid).toBe(true);
    });
  });

  describe("read-only check", () => {
    it("rejects an empty query", () => {
      expect(validateQuery("   ", TENANT, Skill.PHONE_CALLS).violations).toEqual(["Query is empty"]);
      expect(validateQuery("-- nothing here", TENANT, Skill.PHONE_CALLS).violations).toEqual(["Query is empty"]);
    });

    it("rejects DROP", () => {
      const verdict = validateQuery("DROP TABLE communications.phone_call_silver", TENANT, Skill.PHONE_CALLS);
      expect(verdict.isValid).toBe(false);
      expect(verdict.violations).toEqual([
        "Forbidden keyword(s) in query: DROP. Only read-only SELECT queries are allowed",
      ]);
    });

    it("names every forbidden keyword found", () => {
      const verdict = validateQuery(
        "DELETE FROM communications.phone_call_silver; INSERT INTO x VALUES (1)",
        TENANT,
        Skill.PHONE_CALLS,
      );
      expect(verdict.violations).toEqual([
        "Forbidden keyword(s) in query: INSERT, DELETE. Only read-only SELECT queries are allowed",
      ]);
    });

    it("does not treat column names containing keywords as keywords", () => {
      const sql =
        "SELECT call_created_at, updated_at FROM communications.phone_call_silver WHERE matched_company_id = 42";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).isValid).toBe(true);
    });

    it("rejects statement keywords outside string literals", () => {
      const sql = "SELECT copy FROM communications.phone_call_silver WHERE matched_company_id = 42";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([
        "Forbidden keyword(s) in query: COPY. Only read-only SELECT queries are allowed",
      ]);
    });

    it("rejects mutation keywords even inside string literals", () => {
      const sql = "SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 42 AND direction = 'drop'";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([
        "Forbidden keyword(s) in query: DROP. Only read-only SELECT queries are allowed",
      ]);
    });

    it("rejects stacked statements", () => {
      const sql = "SELECT 1 FROM communications.phone_call_silver WHERE matched_company_id = 42; SELECT 2";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual(["Multiple statements are not allowed"]);
    });

    it("rejects statements that do not start with SELECT or WITH", () => {
      const sql = `EXPLAIN ${CALLS_SQL}`;
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual(["Query must start with SELECT or WITH"]);
    });
  });

  describe("tenant check", () => {
    it("rejects a query without the tenant filter", () => {
      const sql = "SELECT direction FROM communications.phone_call_silver LIMIT 5";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([
        "Missing tenant filter: the WHERE clause must include matched_company_id = 42",
      ]);
    });

    it("rejects a query scoped to another tenant", () => {
      const sql = "SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 7";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([
        "Query filters on another tenant (matched_company_id = 7); only matched_company_id = 42 is allowed",
      ]);
    });

    it("rejects widening the filter with a second tenant", () => {
      const sql =
        "SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 42 OR matched_company_id = 7";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).isValid).toBe(false);
    });

    it("does not accept a longer id that starts with the tenant id", () => {
      const sql = "SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 421";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([
        "Query filters on another tenant (matched_company_id = 421); only matched_company_id = 42 is allowed",
      ]);
    });

    it("does not count tenant text inside a string literal", () => {
      const sql =
        "SELECT direction FROM communications.phone_call_silver WHERE recording_summary <> 'matched_company_id = 42 x'";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([MISSING_TENANT]);
    });

    it("does not count a tenant filter inside a comment", () => {
      const sql = "SELECT direction FROM communications.phone_call_silver /* WHERE matched_company_id = 42 */";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([MISSING_TENANT]);
    });

    it("treats -- inside a literal as text, so an OR-widened filter is caught", () => {
      const sql =
        "SELECT * FROM communications.phone_call_silver WHERE direction = '--' OR 1=1 OR direction = '\n' AND matched_company_id = 42";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([MISSING_TENANT]);
    });

    it("requires the tenant filter as an AND term of the WHERE clause", () => {
      const sql = "SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 42 OR 1 = 1";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([MISSING_TENANT]);
    });

    it("requires every sub-select over a table to be scoped", () => {
      const sql =
        "SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 42 AND id IN (SELECT id FROM communications.phone_call_silver)";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([MISSING_TENANT]);
    });

    it("lists both tenant columns for the general skill", () => {
      const sql = "SELECT * FROM companies LIMIT 1";
      expect(validateQuery(sql, TENANT, Skill.GENERAL).violations).toEqual([
        "Missing tenant filter: the WHERE clause must include matched_company_id = 42 or company_id = 42",
      ]);
    });
  });

  describe("table allow-list", () => {
    it("rejects a table outside the skill", () => {
      const sql = "SELECT subject FROM communications.emails_silver WHERE matched_company_id = 42";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([
        "Table(s) not allowed for this query: communications.emails_silver. Allowed tables: communications.phone_call_silver",
      ]);
    });

    it("rejects a join to a table outside the skill", () => {
      const sql =
        "SELECT c.company_name FROM communications.phone_call_silver p JOIN companies c ON c.id = p.matched_company_id WHERE p.matched_company_id = 42";
      expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS).violations).toEqual([
        "Table(s) not allowed for this query: companies. Allowed tables: communications.phone_call_silver",
      ]);
    });
  });

  describe("parse check", () => {
    it("rejects malformed SQL that passes the text checks", () => {
      const sql = "SELECT direction,, FROM communications.phone_call_silver WHERE matched_company_id = 42";
      const verdict = validateQuery(sql, TENANT, Skill.PHONE_CALLS);
      expect(verdict.isValid).toBe(false);
      expect(verdict.violations).toHaveLength(1);
      expect(verdict.violations[0]).toMatch(/^SQL syntax error: /);
    });
  });

  it("is deterministic", () => {
    const sql = "SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 7";
    expect(validateQuery(sql, TENANT, Skill.PHONE_CALLS)).toEqual(validateQuery(sql, TENANT, Skill.PHONE_CALLS));
  });
});

describe("referencedTables", () => {
  it("ignores FROM inside EXTRACT", () => {
    const sql = "SELECT EXTRACT(YEAR FROM call_created_at) AS y FROM communications.phone_call_silver";
    expect(referencedTables(sql)).toEqual(["communications.phone_call_silver"]);
  });

  it("ignores FROM inside string literals", () => {
    const sql = "SELECT subject FROM communications.emails_silver WHERE subject ILIKE '%quote from acme%'";
    expect(referencedTables(sql)).toEqual(["communications.emails_silver"]);
  });

  it("excludes CTE names", () => {
    const sql =
      "WITH recent AS (SELECT direction FROM communications.phone_call_silver WHERE matched_company_id = 42) SELECT direction FROM recent";
    expect(referencedTables(sql)).toEqual(["communications.phone_call_silver"]);
  });

  it("returns nothing for text that does not parse", () => {
    expect(referencedTables("SELECT FROM WHERE")).toEqual([]);
  });

  it("lists joined tables once, lowercased and unquoted", () => {
    const sql =
      'SELECT * FROM "Companies" c JOIN public.companies_documents_join j ON j.company_id = c.id JOIN companies x ON x.id = c.id';
    expect(referencedTables(sql)).toEqual(["companies", "public.companies_documents_join"]);
  });
});

describe("stripComments", () => {
  it("removes line and block comments", () => {
    expect(stripComments("SELECT 1 /* note */ -- trailing").trim()).toBe("SELECT 1");
  });

  it("removes nested block comments", () => {
    expect(stripComments("SELECT 1 /* a /* b */ c */ FROM t")).toBe("SELECT 1   FROM t");
  });

  it("leaves comment markers inside literals alone", () => {
    expect(stripComments("SELECT '--x' AS a, $$/* y */$$ AS b -- z")).toBe("SELECT '--x' AS a, $$/* y */$$ AS b  ");
  });

  it("honours doubled quotes and E-string escapes", () => {
    expect(stripComments("SELECT 'it''s --' -- z")).toBe("SELECT 'it''s --'  ");
    expect(stripComments("SELECT E'it\\'s --' AS a -- z")).toBe("SELECT E'it\\'s --' AS a  ");
  });
});

describe("normalizeQuery", () => {
  it("trims the comment-free text", () => {
    expect(normalizeQuery(`  ${CALLS_SQL} -- newest first\n`)).toBe(CALLS_SQL);
  });
});
