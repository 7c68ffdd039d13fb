import catalogue from "../data/promotions.json";

export interface Promotion {
  name: string;
  summary: string;
  context: string;
}

const PROMOTIONS: Promotion[] = catalogue;

export const NO_PROMOTION = "None";

export function listPromotionNames(): string[] {
  return [NO_PROMOTION, ...PROMOTIONS.map((promotion) => promotion.name)];
}

export function findPromotion(name: string): Promotion | null {
  const needle = name.trim().toLowerCase();
  if (!needle) return null;
  return PROMOTIONS.find((promotion) => promotion.name.toLowerCase() === needle) ?? null;
}

/** Background text for the prompt; empty for custom or unknown promotions. */
export function getPromotionContext(name: string): string {
  return findPromotion(name)?.context ?? "";
}

export function getPromotionSummary(name: string): string {
  return findPromotion(name)?.summary ?? "";
}
