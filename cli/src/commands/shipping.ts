import { Command } from 'commander';
import type { ShippingEstimate, ShippingRate } from '@supportdesk/shared';
import { api, buildQuery } from '../api.js';
import { heading, field, error, money, table } from '../format.js';

export function registerShippingCommands(program: Command): void {
  const shipping = program
    .command('shipping')
    .description('Shipping rates and estimates');

  shipping
    .command('rates')
    .description('Show the rate table')
    .option('--carrier <name>', 'Filter by carrier')
    .option('--service <level>', 'standard, express or overnight')
    .action(async (opts: { carrier?: string; service?: string }) => {
      const res = await api<{
        rates: ShippingRate[];
        summary: { totalRates: number; averageBaseRate: number; carriers: number };
      }>(`/api/shipping/rates${buildQuery({ carrier: opts.carrier, serviceType: opts.service })}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      heading(`Shipping rates (${res.data.summary.totalRates})`);
      table(
        res.data.rates.map((r) => ({
          Carrier: r.carrier,
          Service: r.serviceType,
          ZIP: r.zipCode,
          Base: money(r.baseRate),
          'Per lb': money(r.perLbRate),
          Days: r.estimatedDays ?? '—',
        }))
      );
      console.log();
      field('Average base', money(res.data.summary.averageBaseRate));
      field('Carriers', res.data.summary.carriers);
      console.log();
    });

  shipping
    .command('estimate <zip> <weight>')
    .description('Estimate shipping to a ZIP code for a weight in pounds')
    .option('--service <level>', 'standard, express or overnight')
    .action(async (zip: string, weight: string, opts: { service?: string }) => {
      const res = await api<{ zip: string; weightLbs: number; options: ShippingEstimate[] }>(
        `/api/shipping/estimate${buildQuery({ zip, weight, serviceLevel: opts.service })}`
      );
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      heading(`Shipping ${res.data.weightLbs} lb to ${res.data.zip}`);
      table(
        res.data.options.map((o) => ({
          Carrier: o.carrier,
          Service: o.serviceType,
          Cost: money(o.estimatedCost),
          Days: o.estimatedDays ?? '—',
        }))
      );
      console.log();
    });
}
