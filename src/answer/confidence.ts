// ============================================
// Confidence — parse the model's confidence line,
// or estimate from the answer wording
// ============================================

export type ConfidenceAssessment = {
  /** 0-100 */
  confidence: number;
  explanation: string;
};

/**
 * "Confidence: 85% - explanation", tolerating leading symbols (a unicode
 * emoji, a list bullet, an emoji shortcode) and bold or italic markers:
 *   ":bar_chart: **Confidence:** 85% - Clear updates from two people"
 *   "📊 Confidence: 85% - Clear updates"
 *   "_Confidence: 70% – Two messages agree_"
 * Group 1 = number, group 2 = explanation.
 */
export const CONFIDENCE_LINE_PATTERN =
  /^[^\w\n]*?(?::[\w+-]+:[ \t]*)*[*_]*Confidence[*_]*:[*_]*[ \t]*[*_]*(\d{1,3})[ \t]*%[*_]*[ \t]*[-–—][ \t]*(.+?)[ \t]*$/im;

const EMOJI_SHORTCODE = /:[a-z][a-z0-9_+-]*:/gi;
const TRAILING_EMPHASIS = /[*_]+$/;

/**
 * Wording buckets, checked in order. First bucket with a matching phrase wins.
 */
export const CONFIDENCE_HEURISTICS: ReadonlyArray<{
  phrases: readonly string[];
  confidence: number;
  explanation: string;
}> = [
  {
    phrases: ["couldn't find", "don't have", "no information"],
    confidence: 10,
    explanation: "No relevant information found",
  },
  {
    phrases: ["not sure", "unclear", "uncertain"],
    confidence: 30,
    explanation: "Limited or unclear information",
  },
  {
    phrases: ["might", "possibly", "seems"],
    confidence: 55,
    explanation: "Some relevant information but not definitive",
  },
];

export const DEFAULT_CONFIDENCE: ConfidenceAssessment = {
  confidence: 65,
  explanation: "Relevant information found",
};

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * Estimate confidence from hedging and absence wording.
 */
export function estimateConfidence(answer: string): ConfidenceAssessment {
  const lower = answer.toLowerCase();

  for (const bucket of CONFIDENCE_HEURISTICS) {
    if (bucket.phrases.some((phrase) => lower.includes(phrase))) {
      return { confidence: bucket.confidence, explanation: bucket.explanation };
    }
  }

  return { ...DEFAULT_CONFIDENCE };
}

/**
 * Confidence stated by the model, or the wording estimate when the answer has
 * no confidence line. The explanation is never empty.
 */
export function extractConfidence(answer: string): ConfidenceAssessment {
  const match = CONFIDENCE_LINE_PATTERN.exec(answer);

  if (match && match[1]) {
    const confidence = clampConfidence(Number(match[1]));
    const explanation = (match[2] ?? "")
      .replace(EMOJI_SHORTCODE, "")
      .trim()
      .replace(TRAILING_EMPHASIS, "")
      .trim();

    return {
      confidence,
      explanation: explanation || estimateConfidence(answer).explanation,
    };
  }

  return estimateConfidence(answer);
}
