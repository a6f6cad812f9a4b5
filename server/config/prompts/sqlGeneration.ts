/**
 * SQL Generation Prompts
 */

export const SQL_OUTPUT_INSTRUCTIONS = `## Output
Return JSON with:
- reasoning: how you mapped the question to tables and filters
- sql: the query (no markdown fences, no trailing commentary)
- explanation: one sentence describing what the query returns
- needs_clarification: true only if the question is too ambiguous to query
- clarification_question: the question to ask the user when needs_clarification is true, otherwise ""`;

export const SQL_HISTORY_HEADER = `## Previous Conversation
Use this to resolve follow-up references such as "that call" or "their email".`;

export const SQL_ERROR_FOOTER = "Please fix the SQL query based on the error above.";
