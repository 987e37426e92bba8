/**
 * Recommended-quantity rule shared by registration, import, and bulk updates
 */

export interface RecommendedRule {
  multiplier: number;
  floor: number;
}

/**
 * max(floor(quantity × multiplier), floor)
 */
export function deriveRecommended(quantity: number, rule: RecommendedRule): number {
  return Math.max(Math.floor(quantity * rule.multiplier), rule.floor);
}

/**
 * Keep a supplied target unless it is missing or zero
 */
export function resolveRecommended(
  supplied: number | undefined,
  quantity: number,
  rule: RecommendedRule
): number {
  return supplied !== undefined && supplied > 0 ? supplied : deriveRecommended(quantity, rule);
}
