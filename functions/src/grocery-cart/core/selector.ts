import { CandidateProduct, ScoredCandidate } from "../../types";
import { scoreCandidate } from "./scoring";
import { effectivePrice, primaryItem } from "./stock";

// Ranks unpriced candidates after priced ones with the same score.
export const MISSING_PRICE_SENTINEL = 999;

export interface SelectOptions {
  /** Reject the winner when it scores below this floor. No floor when unset. */
  minScore?: number;
}

export const rankCandidates = (
  candidates: CandidateProduct[],
  itemName: string,
  category: string
): ScoredCandidate[] =>
  candidates
    .map((candidate) => ({
      candidate,
      score: scoreCandidate(candidate, itemName, category),
      price: effectivePrice(primaryItem(candidate)) ?? MISSING_PRICE_SENTINEL,
    }))
    .sort((a, b) => b.score - a.score || a.price - b.price);

/**
 * Picks the highest-scoring candidate, cheapest first among equal scores.
 * Expects candidates that already passed the stock filter.
 */
export const selectBest = (
  candidates: CandidateProduct[],
  itemName: string,
  category: string,
  options: SelectOptions = {}
): ScoredCandidate | null => {
  const [best] = rankCandidates(candidates, itemName, category);
  if (!best) {
    return null;
  }
  if (options.minScore !== undefined && best.score < options.minScore) {
    return null;
  }
  return best;
};
