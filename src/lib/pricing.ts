import type { PricingConfig } from '@/types/config';

export type PriceResolution = { ok: true; pricePerDay: number } | { ok: false; error: string };

/**
 * Resolve the daily rate for an estimate.
 *
 * Without an override the configured default applies. An override is taken
 * only when overrides are allowed and it lies within the configured bounds.
 */
export function resolvePricePerDay(pricing: PricingConfig, override?: number | null): PriceResolution {
  if (override === undefined || override === null) {
    return { ok: true, pricePerDay: pricing.defaultPricePerDay };
  }

  if (!pricing.allowAdminOverride) {
    return { ok: false, error: 'Price override is not allowed' };
  }

  if (!Number.isFinite(override) || override < pricing.minPriceOverride || override > pricing.maxPriceOverride) {
    return {
      ok: false,
      error: `Price per day must be between ${pricing.minPriceOverride} and ${pricing.maxPriceOverride}`,
    };
  }

  return { ok: true, pricePerDay: override };
}

export function calculateTotalCost(totalDays: number, pricePerDay: number): number {
  return totalDays * pricePerDay;
}

/**
 * Format an amount with the configured currency symbol, e.g. "€26,600.00"
 */
export function formatCurrency(amount: number, pricing: PricingConfig, fractionDigits = 2): string {
  const formatted = amount.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
  return `${pricing.currencySymbol}${formatted}`;
}
