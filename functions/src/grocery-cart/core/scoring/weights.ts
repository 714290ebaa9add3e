// Signed contribution of each scoring signal. Tunable, but the ordering between
// classes (eligibility > junk > non-food category > containment > word match) must hold.
export const SCORE_WEIGHTS = {
  notFoodEligible: -100,
  expectedCategory: 15,
  nonFoodCategory: -30,
  wordMatch: 10,
  containsName: 20,
  startsWithName: 10,
  junkTerm: -50,
  beverageTerm: -20,
  preservedWhenFresh: -15,
  freshInDescription: 10,
  preparedTerm: -10,
  hasRegularPrice: 5,
} as const;
