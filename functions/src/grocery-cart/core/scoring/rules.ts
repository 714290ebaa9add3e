import { CandidateProduct } from "../../../types";
import { primaryItem } from "../stock";
import lexicon from "./lexicon.json";
import { SCORE_WEIGHTS } from "./weights";

const FOOD_CATEGORIES = new Set(lexicon.foodCategories);
const SOLID_FOOD_CATEGORIES = new Set(lexicon.solidFoodCategories);
const RAW_INGREDIENT_CATEGORIES = new Set(lexicon.rawIngredientCategories);
const EXPECTED_CATEGORIES: Record<string, string[]> = lexicon.expectedCategories;

export interface ScoringContext {
  description: string;
  brand: string;
  catalogCategories: string[];
  snapEligible: boolean;
  category: string;
  /** Lower-cased requested name. */
  nameLower: string;
  /** Lower-cased requested name without parentheses, so "(fresh)" matches as "fresh". */
  nameClean: string;
  nameWords: string[];
  regularPrice: number | undefined;
}

export interface ScoringRule {
  name: string;
  apply: (context: ScoringContext) => number;
}

export const buildScoringContext = (
  candidate: CandidateProduct,
  itemName: string,
  category: string
): ScoringContext => {
  const nameLower = itemName.toLowerCase();
  const nameClean = nameLower.replace(/[()]/g, "").trim();

  return {
    description: candidate.description.toLowerCase(),
    brand: candidate.brand.toLowerCase(),
    catalogCategories: candidate.categories.map((c) => c.toLowerCase()),
    snapEligible: candidate.snapEligible,
    category,
    nameLower,
    nameClean,
    nameWords: nameClean.split(/\s+/).filter(Boolean),
    regularPrice: primaryItem(candidate)?.price?.regular,
  };
};

const inAnyCatalogCategory = (context: ScoringContext, needle: string) =>
  context.catalogCategories.some((c) => c.includes(needle));

// Present in the description but not something the shopper asked for.
const unrequested = (context: ScoringContext, term: string) =>
  context.description.includes(term) && !context.nameLower.includes(term);

export const foodEligibilityRule: ScoringRule = {
  name: "foodEligibility",
  apply: ({ category, snapEligible }) =>
    FOOD_CATEGORIES.has(category) && !snapEligible ? SCORE_WEIGHTS.notFoodEligible : 0,
};

export const expectedCategoryRule: ScoringRule = {
  name: "expectedCategory",
  apply: (context) => {
    const expected = EXPECTED_CATEGORIES[context.category] ?? [];
    return expected.some((exp) => inAnyCatalogCategory(context, exp))
      ? SCORE_WEIGHTS.expectedCategory
      : 0;
  },
};

export const nonFoodCategoryRule: ScoringRule = {
  name: "nonFoodCategory",
  apply: (context) =>
    lexicon.nonFoodCategories.filter((nf) => inAnyCatalogCategory(context, nf)).length *
    SCORE_WEIGHTS.nonFoodCategory,
};

export const wordOverlapRule: ScoringRule = {
  name: "wordOverlap",
  apply: ({ nameWords, description }) =>
    nameWords.filter((word) => description.includes(word)).length * SCORE_WEIGHTS.wordMatch,
};

export const containsNameRule: ScoringRule = {
  name: "containsName",
  apply: ({ nameClean, description }) =>
    nameClean && description.includes(nameClean) ? SCORE_WEIGHTS.containsName : 0,
};

export const startsWithNameRule: ScoringRule = {
  name: "startsWithName",
  apply: ({ nameClean, nameWords, description }) => {
    const lastWord = nameWords[nameWords.length - 1];
    if (!lastWord) {
      return 0;
    }
    return description.startsWith(nameClean) || description.startsWith(lastWord)
      ? SCORE_WEIGHTS.startsWithName
      : 0;
  },
};

export const junkTermRule: ScoringRule = {
  name: "junkTerm",
  apply: ({ description, brand }) =>
    lexicon.junkTerms.some((junk) => description.includes(junk) || brand.includes(junk))
      ? SCORE_WEIGHTS.junkTerm
      : 0,
};

export const beverageTermRule: ScoringRule = {
  name: "beverageTerm",
  apply: (context) => {
    if (!SOLID_FOOD_CATEGORIES.has(context.category)) {
      return 0;
    }
    return lexicon.beverageTerms.some((term) => unrequested(context, term))
      ? SCORE_WEIGHTS.beverageTerm
      : 0;
  },
};

export const freshnessRule: ScoringRule = {
  name: "freshness",
  apply: ({ nameLower, description }) => {
    if (!nameLower.includes("fresh")) {
      return 0;
    }
    let score = 0;
    if (
      lexicon.preservedTerms.some((term) => description.includes(term)) &&
      !nameLower.includes("dried")
    ) {
      score += SCORE_WEIGHTS.preservedWhenFresh;
    }
    if (description.includes("fresh")) {
      score += SCORE_WEIGHTS.freshInDescription;
    }
    return score;
  },
};

export const preparedFoodRule: ScoringRule = {
  name: "preparedFood",
  apply: (context) => {
    if (!RAW_INGREDIENT_CATEGORIES.has(context.category)) {
      return 0;
    }
    return (
      lexicon.preparedTerms.filter((term) => unrequested(context, term)).length *
      SCORE_WEIGHTS.preparedTerm
    );
  },
};

export const pricingRule: ScoringRule = {
  name: "pricing",
  apply: ({ regularPrice }) => (regularPrice ? SCORE_WEIGHTS.hasRegularPrice : 0),
};

export const SCORING_RULES: readonly ScoringRule[] = [
  foodEligibilityRule,
  expectedCategoryRule,
  nonFoodCategoryRule,
  wordOverlapRule,
  containsNameRule,
  startsWithNameRule,
  junkTermRule,
  beverageTermRule,
  freshnessRule,
  preparedFoodRule,
  pricingRule,
];
