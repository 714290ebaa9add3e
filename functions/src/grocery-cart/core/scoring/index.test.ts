import { describe, it, expect } from "vitest";
import { makeCandidate, makeItem } from "../../../testing/fake-catalog";
import { explainScore, scoreCandidate } from "./index";

const chickenBreast = makeCandidate({
  description: "Boneless Skinless Chicken Breast",
  categories: ["Meat & Seafood"],
});

describe("scoreCandidate", () => {
  it("adds category, word, containment and pricing signals", () => {
    expect(explainScore(chickenBreast, "chicken breast", "meat")).toEqual({
      expectedCategory: 15,
      wordOverlap: 20,
      containsName: 20,
      pricing: 5,
    });
    expect(scoreCandidate(chickenBreast, "chicken breast", "meat")).toBe(60);
  });

  it("penalizes non-eligible candidates by 100 for food categories", () => {
    const ineligible = { ...chickenBreast, snapEligible: false };

    const difference =
      scoreCandidate(chickenBreast, "chicken breast", "meat") -
      scoreCandidate(ineligible, "chicken breast", "meat");

    expect(difference).toBe(100);
  });

  it("ignores food eligibility outside food categories", () => {
    const ineligible = { ...chickenBreast, snapEligible: false };
    expect(scoreCandidate(ineligible, "chicken breast", "other")).toBe(
      scoreCandidate(chickenBreast, "chicken breast", "other")
    );
  });

  it("is deterministic for identical inputs", () => {
    const first = scoreCandidate(chickenBreast, "chicken breast", "meat");
    const second = scoreCandidate(chickenBreast, "chicken breast", "meat");
    expect(second).toBe(first);
  });

  it("penalizes every non-food catalog category regardless of requested category", () => {
    const candidate = makeCandidate({
      description: "Rice Bath Soak",
      categories: ["Health & Beauty", "Personal Care"],
    });
    expect(explainScore(candidate, "brown rice", "other").nonFoodCategory).toBe(-60);
  });

  it("applies the junk penalty once even when several terms match", () => {
    const candidate = makeCandidate({ description: "Dog Shampoo with Oatmeal", brand: "Pet Care Co" });
    expect(explainScore(candidate, "oatmeal", "pantry").junkTerm).toBe(-50);
  });

  it("checks junk terms against the brand too", () => {
    const candidate = makeCandidate({ description: "Chicken Recipe Dinner", brand: "Puppy Chow" });
    expect(explainScore(candidate, "chicken", "meat").junkTerm).toBe(-50);
  });

  it("applies the beverage penalty once for solid food categories", () => {
    const candidate = makeCandidate({ description: "Ginger Juice Drink Blend" });
    expect(explainScore(candidate, "ginger", "produce").beverageTerm).toBe(-20);
    expect(explainScore(candidate, "ginger", "other").beverageTerm).toBeUndefined();
  });

  it("skips beverage terms the shopper asked for", () => {
    const candidate = makeCandidate({ description: "Ginger Juice" });
    expect(explainScore(candidate, "ginger juice", "produce").beverageTerm).toBeUndefined();
  });

  it("rewards fresh and penalizes preserved products for fresh items", () => {
    const dried = makeCandidate({ description: "Dried Ginger Root" });
    const fresh = makeCandidate({ description: "Fresh Ginger Root" });

    expect(explainScore(dried, "ginger (fresh)", "produce").freshness).toBe(-15);
    expect(explainScore(fresh, "ginger (fresh)", "produce").freshness).toBe(10);
  });

  it("does not penalize dried products when the item asks for dried", () => {
    const candidate = makeCandidate({ description: "Dried Cranberries" });
    expect(explainScore(candidate, "fresh dried cranberries", "pantry").freshness).toBeUndefined();
  });

  it("stacks prepared-food penalties for raw ingredient categories", () => {
    const candidate = makeCandidate({ description: "Broccoli Steam Cups Meal Kit" });
    expect(explainScore(candidate, "broccoli", "produce").preparedFood).toBe(-40);
    expect(explainScore(candidate, "broccoli", "frozen").preparedFood).toBeUndefined();
  });

  it("rewards descriptions that start with the last word of the item", () => {
    const candidate = makeCandidate({ description: "Beef, Ground 80/20" });
    expect(explainScore(candidate, "ground beef", "meat").startsWithName).toBe(10);
  });

  it("gives no pricing bonus without a regular price", () => {
    const candidate = makeCandidate({
      description: "Chicken Breast",
      items: [makeItem({ price: { regular: 0 } })],
    });
    expect(explainScore(candidate, "chicken breast", "meat").pricing).toBeUndefined();
  });
});
