/**
 * Supervisor
 *
 * Purpose:
 * Chooses the retrieval strategy for a question exactly once. The route is
 * immutable for the rest of the pipeline.
 *
 * Strategy:
 * 1. Fast-path: exact simple greetings go to `conversational` (no LLM cost)
 * 2. One structured LLM call at temperature 0
 * 3. Anything other than a known route, or a failed call, becomes a routing
 *    anomaly and falls back to `conversational`
 *
 * Layer: Decision Layer
 */

import { z } from "zod";
import { ROUTES, type RouteName } from "@shared/schema";
import type { TextCompletionService } from "../llm/textCompletion";
import type { ConversationTurn } from "../memory/conversationMemory";
import { HISTORY_LIMITS } from "../config/constants";
import { SUPERVISOR_ROUTING_PROMPT, SUPERVISOR_USER_TEMPLATE } from "../config/prompts";
import { RoutingAnomaly, getErrorMessage } from "../utils/errorHandler";
import type { RequestLogger } from "../utils/logger";

export const Route = {
  SQL_ONLY: "sql_only",
  DOCUMENT_SEARCH: "document_search",
  HYBRID: "hybrid",
  CONVERSATIONAL: "conversational",
} as const satisfies Record<string, RouteName>;

export type Route = RouteName;

export const routingDecisionSchema = z.object({
  route: z.string(),
  reasoning: z.string().default(""),
  search_terms: z.array(z.string()).default([]),
  conversational_response: z.string().default(""),
});

export type RouteDecisionMethod = "greeting" | "llm" | "fallback";

export type RouteDecision = {
  route: Route;
  reasoning: string;
  searchTerms: string[];
  conversationalResponse: string | null;
  /** Why the supervisor's answer was overridden, if it was. */
  anomaly: string | null;
  method: RouteDecisionMethod;
};

const SIMPLE_GREETINGS = [
  "hello",
  "hi",
  "hi there",
  "hey",
  "hey there",
  "good morning",
  "good afternoon",
  "good evening",
  "thanks",
  "thank you",
];

function normalizeGreeting(question: string): string {
  return question.trim().toLowerCase().replace(/[\s!.?,]+$/, "");
}

export function isSimpleGreeting(question: string): boolean {
  return SIMPLE_GREETINGS.includes(normalizeGreeting(question));
}

export function parseRoute(value: string): Route | null {
  const normalized = value.trim().toLowerCase();
  return ROUTES.find(route => route === normalized) ?? null;
}

function snippet(text: string): string {
  const max = HISTORY_LIMITS.SUPERVISOR_SNIPPET_CHARS;
  return text.length > max ? text.slice(0, max) + "..." : text;
}

export function formatSupervisorContext(history: ConversationTurn[]): string {
  if (history.length === 0) return "No previous context.";
  return history
    .slice(-HISTORY_LIMITS.TURNS_IN_PROMPT)
    .map((turn, i) => `[${i + 1}] Q: ${snippet(turn.question)} A: ${snippet(turn.answer)}`)
    .join("\n");
}

export class Supervisor {
  constructor(private readonly completion: TextCompletionService) {}

  private fallback(anomaly: RoutingAnomaly, logger?: RequestLogger): RouteDecision {
    logger?.warn(`[Supervisor] Routing anomaly: ${anomaly.message}; falling back to conversational`);
    return {
      route: Route.CONVERSATIONAL,
      reasoning: "Fallback after routing anomaly",
      searchTerms: [],
      conversationalResponse: null,
      anomaly: anomaly.message,
      method: "fallback",
    };
  }

  async decide(question: string, history: ConversationTurn[], logger?: RequestLogger): Promise<RouteDecision> {
    if (isSimpleGreeting(question)) {
      logger?.info("[Supervisor] Fast-path: simple greeting detected");
      return {
        route: Route.CONVERSATIONAL,
        reasoning: "Simple greeting - no LLM needed",
        searchTerms: [],
        conversationalResponse: null,
        anomaly: null,
        method: "greeting",
      };
    }

    let output: z.infer<typeof routingDecisionSchema>;
    try {
      output = await this.completion.decide(
        {
          system: SUPERVISOR_ROUTING_PROMPT,
          user: SUPERVISOR_USER_TEMPLATE.replace(/\{(question|context)\}/g, (_match, key: string) =>
            key === "question" ? question : formatSupervisorContext(history),
          ),
          temperature: 0,
        },
        routingDecisionSchema,
      );
    } catch (error) {
      return this.fallback(new RoutingAnomaly(`Routing call failed: ${getErrorMessage(error)}`), logger);
    }

    const route = parseRoute(output.route);
    if (!route) {
      return this.fallback(new RoutingAnomaly(`Supervisor returned unknown route "${output.route}"`), logger);
    }

    logger?.info(`[Supervisor] Route: ${route}`, { route, reasoning: output.reasoning });
    return {
      route,
      reasoning: output.reasoning,
      searchTerms: output.search_terms,
      conversationalResponse: output.conversational_response.trim() || null,
      anomaly: null,
      method: "llm",
    };
  }
}
