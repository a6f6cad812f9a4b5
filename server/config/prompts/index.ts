/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts are maintained in this single location.
 *
 * Structure:
 * - supervisor.ts: route selection
 * - sqlGeneration.ts: SQL candidate output format, history and error sections
 * - synthesis.ts: answer synthesis for SQL, document and hybrid results
 * - skills.ts: per-skill schema context and response guidance
 */

export * from "./supervisor";
export * from "./sqlGeneration";
export * from "./synthesis";
export * from "./skills";
