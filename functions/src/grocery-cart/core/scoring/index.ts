import { CandidateProduct } from "../../../types";
import { buildScoringContext, SCORING_RULES } from "./rules";

/**
 * Per-rule contributions for one candidate. Rules that contribute nothing are omitted.
 */
export const explainScore = (
  candidate: CandidateProduct,
  itemName: string,
  category: string
): Record<string, number> => {
  const context = buildScoringContext(candidate, itemName, category);
  const contributions: Record<string, number> = {};
  for (const rule of SCORING_RULES) {
    const value = rule.apply(context);
    if (value !== 0) {
      contributions[rule.name] = value;
    }
  }
  return contributions;
};

/**
 * Heuristic match score of a catalog candidate against a requested item. Higher is
 * better and the result may be negative. Pure: depends only on its arguments.
 */
export const scoreCandidate = (
  candidate: CandidateProduct,
  itemName: string,
  category: string
): number => {
  const context = buildScoringContext(candidate, itemName, category);
  return SCORING_RULES.reduce((sum, rule) => sum + rule.apply(context), 0);
};
