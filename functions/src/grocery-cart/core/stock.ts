import { CandidateItem, CandidateProduct } from "../../types";

export const OUT_OF_STOCK_LEVEL = "TEMPORARILY_OUT_OF_STOCK";

export const primaryItem = (candidate: CandidateProduct): CandidateItem | undefined =>
  candidate.items[0];

export const isPurchasable = (candidate: CandidateProduct): boolean => {
  const item = primaryItem(candidate);
  if (!item) {
    return false;
  }
  return item.stockLevel !== OUT_OF_STOCK_LEVEL;
};

export const filterInStock = (candidates: CandidateProduct[]): CandidateProduct[] =>
  candidates.filter(isPurchasable);

export const effectivePrice = (item: CandidateItem | undefined): number | null => {
  const promo = item?.price?.promo;
  if (promo) {
    return promo;
  }
  return item?.price?.regular || null;
};
