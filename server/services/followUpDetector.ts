/**
 * Follow-Up Detection Service
 *
 * Detects short replies that only make sense in light of the previous turn
 * ("yes", "sure, go ahead", "what about Friday?"). The classifier uses the
 * result to let such replies inherit the prior intent.
 *
 * Design:
 * - Pattern rules are injected, not module globals
 * - Separated from intent classification for testability
 */

import type { IntentLabel } from "@shared/schema";

export interface FollowUpResult {
  isFollowUp: true;
  inheritedIntent: IntentLabel;
  reason: string;
}

export interface FollowUpPatternRule {
  pattern: RegExp;
  description: string;
}

export const DEFAULT_FOLLOW_UP_RULES: readonly FollowUpPatternRule[] = [
  { pattern: /^(yes|yeah|yep|yup|sure|ok|okay|k|sounds good|please do|do it|go ahead|absolutely|definitely|correct|right)[.!]*$/i, description: "acknowledgement" },
  { pattern: /^(yes|yeah|sure|ok|okay),?\s+(please|go ahead|do it|that works|sounds good)[.!]*$/i, description: "acknowledgement with confirmation" },
  { pattern: /^(that works|works for me|perfect|great)[.!]*$/i, description: "confirmation" },
  { pattern: /^(what|how)\s+about\b/i, description: "what about X" },
  { pattern: /^(and|also)\b/i, description: "continuation" },
];

// Intents a bare acknowledgement should not carry forward
const NON_INHERITABLE: ReadonlySet<IntentLabel> = new Set<IntentLabel>(["unknown"]);

export class FollowUpDetector {
  private rules: FollowUpPatternRule[];

  constructor(rules: readonly FollowUpPatternRule[] = DEFAULT_FOLLOW_UP_RULES) {
    this.rules = [...rules];
  }

  registerRules(rules: FollowUpPatternRule[]): void {
    this.rules.push(...rules);
  }

  getRuleCount(): number {
    return this.rules.length;
  }

  /**
   * Returns null when there is no previous intent or no rule matches.
   */
  detect(message: string, previousIntent: IntentLabel | undefined): FollowUpResult | null {
    if (!previousIntent || NON_INHERITABLE.has(previousIntent)) {
      return null;
    }

    const trimmed = message.trim();
    if (!trimmed) return null;

    const matchedRule = this.rules.find(rule => rule.pattern.test(trimmed));
    if (!matchedRule) return null;

    console.log(`[FollowUpDetector] Detected: "${matchedRule.description}" → ${previousIntent}`);

    return {
      isFollowUp: true,
      inheritedIntent: previousIntent,
      reason: `Follow-up (${matchedRule.description}) to ${previousIntent}`,
    };
  }
}
