import { describe, it, expect } from "vitest";
import { classifySqlState, toDataStoreError } from "../db";
import { DataStoreError } from "../utils/errorHandler";
import { TimeoutError } from "../utils/retry";
import { pgError } from "./helpers/fakes";

describe("classifySqlState", () => {
  it.each([
    ["42601", "syntax"],
    ["42P01", "syntax"],
    ["42703", "syntax"],
    ["42501", "permission"],
    ["25006", "permission"],
    ["57014", "timeout"],
    ["08006", "connection"],
    ["23505", "unknown"],
  ] as const)("%s -> %s", (code, kind) => {
    expect(classifySqlState(code)).toBe(kind);
  });

  it("is unknown without a code", () => {
    expect(classifySqlState(undefined)).toBe("unknown");
  });
});

describe("toDataStoreError", () => {
  it("keeps the driver message and SQLSTATE", () => {
    const error = toDataStoreError(pgError('relation "calls" does not exist', "42P01"));
    expect(error).toBeInstanceOf(DataStoreError);
    expect(error.kind).toBe("syntax");
    expect(error.code).toBe("42P01");
    expect(error.message).toBe('relation "calls" does not exist');
  });

  it("finds the SQLSTATE on a wrapped cause", () => {
    const wrapped = new Error("batch failed", { cause: pgError("cannot execute INSERT in a read-only transaction", "25006") });
    expect(toDataStoreError(wrapped).kind).toBe("permission");
  });

  it("maps the client-side guard to a timeout", () => {
    const error = toDataStoreError(new TimeoutError("Query execution timed out", 32000));
    expect(error.kind).toBe("timeout");
    expect(error.message).toBe("Query execution timed out (after 32000ms)");
  });

  it("passes DataStoreError through", () => {
    const original = new DataStoreError("connection", "ECONNRESET");
    expect(toDataStoreError(original)).toBe(original);
  });

  it("handles non-Error values", () => {
    expect(toDataStoreError("boom")).toMatchObject({ kind: "unknown", message: "boom" });
  });
});
