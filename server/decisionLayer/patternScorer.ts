/**
 * Pattern Scorer
 *
 * Cheap, deterministic intent scoring. This is the fallback decision whenever
 * the model is unavailable or returns garbage, so it must never call out.
 *
 * Layer: Decision Layer
 */

import { CLASSIFICATION_CONSTANTS } from "../config/constants";
import { DEFAULT_INTENT_PATTERNS, type IntentPatternTable } from "../config/intentPatterns";
import { INTENT_LABELS, argmax, emptyScores, type IntentLabel, type IntentScores } from "./intent";

export type PatternScoreDetail = {
  scores: IntentScores;
  matched: Array<{ intent: IntentLabel; description: string }>;
};

export class PatternScorer {
  private readonly table: IntentPatternTable;
  private readonly defaultIncrement: number;

  constructor(
    table: IntentPatternTable = DEFAULT_INTENT_PATTERNS,
    defaultIncrement: number = CLASSIFICATION_CONSTANTS.PATTERN_MATCH_INCREMENT,
  ) {
    this.table = table;
    this.defaultIncrement = defaultIncrement;
  }

  score(text: string): IntentScores {
    return this.scoreWithDetail(text).scores;
  }

  scoreWithDetail(text: string): PatternScoreDetail {
    const scores = emptyScores();
    const matched: PatternScoreDetail["matched"] = [];
    const lower = text.toLowerCase().trim();
    if (!lower) {
      return { scores, matched };
    }

    for (const intent of INTENT_LABELS) {
      for (const rule of this.table[intent]) {
        // Reset in case a caller supplied a global regex
        rule.pattern.lastIndex = 0;
        if (rule.pattern.test(lower)) {
          scores[intent] += rule.weight ?? this.defaultIncrement;
          matched.push({ intent, description: rule.description });
        }
      }
    }

    return { scores, matched };
  }

  /**
   * Best pattern label, or "unknown" when nothing matched.
   */
  topSuggestion(text: string): { intent: IntentLabel; score: number } {
    const best = argmax(this.score(text));
    if (best.confidence <= 0) {
      return { intent: "unknown", score: 0 };
    }
    return { intent: best.intent, score: best.confidence };
  }
}
