/**
 * Shipping cost estimation from rate rows
 */

import type { ShippingEstimate, ShippingRate } from '../../types/index.js';
import { round2 } from '../formatting.js';

/** base + per-pound x weight, rounded to cents */
export function calculateShippingCost(rate: Pick<ShippingRate, 'baseRate' | 'perLbRate'>, weightLbs: number): number {
    return round2(rate.baseRate + rate.perLbRate * weightLbs);
}

/**
 * One estimate per rate, cheapest first.
 * Ties keep the faster service first.
 */
export function estimateShipping(rates: readonly ShippingRate[], weightLbs: number): ShippingEstimate[] {
    return rates
        .map(rate => ({
            carrier: rate.carrier,
            serviceType: rate.serviceType,
            estimatedCost: calculateShippingCost(rate, weightLbs),
            estimatedDays: rate.estimatedDays,
        }))
        .sort((a, b) =>
            a.estimatedCost - b.estimatedCost
            || (a.estimatedDays ?? Number.MAX_SAFE_INTEGER) - (b.estimatedDays ?? Number.MAX_SAFE_INTEGER)
        );
}
