/**
 * Shipping Rate Queries
 */

import {
    CATCH_ALL_ZIP,
    type ShippingRate,
    type ShippingServiceLevel,
} from '@supportdesk/shared';
import type { KyselyDB } from '../index.js';
import { toShippingRate } from './rowMappers.js';

export interface ShippingRateListParams {
    carrier?: string;
    serviceType?: ShippingServiceLevel;
}

export async function listShippingRates(db: KyselyDB, params: ShippingRateListParams = {}): Promise<ShippingRate[]> {
    let query = db.selectFrom('ShippingRate').selectAll();
    if (params.carrier) {
        const carrier = params.carrier.toLowerCase();
        query = query.where(eb => eb(eb.fn<string>('lower', ['carrier']), '=', carrier));
    }
    if (params.serviceType) query = query.where('serviceType', '=', params.serviceType);

    const rows = await query.orderBy('baseRate').orderBy('id').execute();
    return rows.map(toShippingRate);
}

async function ratesForZip(
    db: KyselyDB,
    zipCode: string,
    serviceLevel?: ShippingServiceLevel
): Promise<ShippingRate[]> {
    let query = db.selectFrom('ShippingRate').selectAll().where('zipCode', '=', zipCode);
    if (serviceLevel) query = query.where('serviceType', '=', serviceLevel);
    const rows = await query.orderBy('id').execute();
    return rows.map(toShippingRate);
}

/**
 * Rates for a destination ZIP code. When the ZIP has no rates of its own
 * the catch-all `*` rates apply.
 */
export async function findShippingRates(
    db: KyselyDB,
    zipCode: string,
    serviceLevel?: ShippingServiceLevel
): Promise<ShippingRate[]> {
    const exact = await ratesForZip(db, zipCode.trim(), serviceLevel);
    if (exact.length > 0) return exact;
    return ratesForZip(db, CATCH_ALL_ZIP, serviceLevel);
}
