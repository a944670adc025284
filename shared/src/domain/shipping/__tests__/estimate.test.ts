import { estimateShipping, calculateShippingCost } from '../estimate.js';
import type { ShippingRate } from '../../../types/index.js';

const rates: ShippingRate[] = [
    { id: 1, carrier: 'FedEx', serviceType: 'express', zipCode: '60601', baseRate: 12.5, perLbRate: 1.25, estimatedDays: 2 },
    { id: 2, carrier: 'UPS', serviceType: 'standard', zipCode: '60601', baseRate: 5.99, perLbRate: 0.5, estimatedDays: 5 },
];

describe('shipping estimate', () => {
    it('adds the per-pound charge to the base rate', () => {
        expect(calculateShippingCost({ baseRate: 5.99, perLbRate: 0.5 }, 4)).toBe(7.99);
    });

    it('lists the cheapest option first', () => {
        expect(estimateShipping(rates, 4)).toEqual([
            { carrier: 'UPS', serviceType: 'standard', estimatedCost: 7.99, estimatedDays: 5 },
            { carrier: 'FedEx', serviceType: 'express', estimatedCost: 17.5, estimatedDays: 2 },
        ]);
    });

    it('returns nothing for no rates', () => {
        expect(estimateShipping([], 4)).toEqual([]);
    });
});
