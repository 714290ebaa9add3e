import { describe, it, expect } from "vitest";
import { makeCandidate, makeItem } from "../../testing/fake-catalog";
import { MISSING_PRICE_SENTINEL, rankCandidates, selectBest } from "./selector";

const pricedBroccoli = (id: string, price: { regular?: number; promo?: number }) =>
  makeCandidate({
    id,
    description: "Broccoli Crowns",
    categories: ["Produce"],
    items: [makeItem({ price })],
  });

describe("selectBest", () => {
  it("returns null for an empty candidate list", () => {
    expect(selectBest([], "broccoli", "produce")).toBeNull();
  });

  it("picks the highest score", () => {
    const match = makeCandidate({ id: "match", description: "Broccoli Crowns", categories: ["Produce"] });
    const other = makeCandidate({ id: "other", description: "Cauliflower", categories: ["Produce"] });

    expect(selectBest([other, match], "broccoli", "produce")?.candidate.id).toBe("match");
  });

  it("breaks score ties with the lower price", () => {
    const expensive = pricedBroccoli("expensive", { regular: 3.99 });
    const cheap = pricedBroccoli("cheap", { regular: 2.49 });

    const best = selectBest([expensive, cheap], "broccoli", "produce");

    expect(best?.candidate.id).toBe("cheap");
    expect(best?.price).toBe(2.49);
  });

  it("compares promo prices when breaking ties", () => {
    const onSale = pricedBroccoli("on-sale", { regular: 3.0, promo: 1.5 });
    const regular = pricedBroccoli("regular", { regular: 2.0 });

    expect(selectBest([regular, onSale], "broccoli", "produce")?.candidate.id).toBe("on-sale");
  });

  it("keeps returning a low-confidence winner without a floor", () => {
    const dogFood = makeCandidate({
      id: "dog-food",
      description: "Dog Food",
      categories: ["Pet Care"],
      snapEligible: false,
    });

    const best = selectBest([dogFood], "brown rice", "pantry");

    expect(best?.candidate.id).toBe("dog-food");
    expect(best?.score).toBe(-175);
  });

  it("rejects a winner below the configured floor", () => {
    const dogFood = makeCandidate({ description: "Dog Food", categories: ["Pet Care"] });
    expect(selectBest([dogFood], "brown rice", "pantry", { minScore: 0 })).toBeNull();
  });
});

describe("rankCandidates", () => {
  it("uses the sentinel price for unpriced candidates", () => {
    const unpriced = makeCandidate({ items: [makeItem({ price: undefined })] });
    expect(rankCandidates([unpriced], "broccoli", "produce")[0].price).toBe(MISSING_PRICE_SENTINEL);
  });
});
