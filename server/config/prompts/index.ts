/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts live here so wording changes are reviewable in one place.
 *
 * Structure:
 * - decisionLayer.ts: Intent classification
 * - knowledge.ts: Grounded answers over retrieved snippets
 * - dealflow.ts: Lead extraction, proposals, deal status reasons
 */

export * from "./decisionLayer";
export * from "./knowledge";
export * from "./dealflow";
