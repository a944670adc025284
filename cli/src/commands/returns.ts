import { Command } from 'commander';
import { RETURN_STATUSES, type ReturnOrder, type ReturnOrderWithItems } from '@supportdesk/shared';
import { api, buildQuery } from '../api.js';
import { heading, field, error, success, money, statusColor, table } from '../format.js';

interface ReturnSummary {
  totalReturns: number;
  pendingReturns: number;
  approvedReturns: number;
  totalRefunds: number;
}

export function registerReturnCommands(program: Command): void {
  const returns = program
    .command('returns')
    .description('Return requests and refunds');

  returns
    .command('list')
    .description('List returns, newest first')
    .option('--status <status>', `One of: ${RETURN_STATUSES.join(', ')}`)
    .option('--order <id>', 'Only returns of this order')
    .option('--since-days <n>', 'Only returns from the last N days')
    .action(async (opts: { status?: string; order?: string; sinceDays?: string }) => {
      const res = await api<{ returns: ReturnOrder[]; total: number }>(
        `/api/returns${buildQuery({ status: opts.status, orderId: opts.order, sinceDays: opts.sinceDays })}`
      );
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      heading(`Returns (${res.data.total})`);
      table(
        res.data.returns.map((r) => ({
          '#': r.id,
          Order: `#${r.orderId}`,
          Reason: r.reason,
          Refund: money(r.refundTotalAmount),
          Status: statusColor(r.status),
          Date: new Date(r.createdAt).toLocaleDateString('en-US'),
        }))
      );
      console.log();
    });

  returns
    .command('show <id>')
    .description('Show a return and its items')
    .action(async (id: string) => {
      const res = await api<ReturnOrderWithItems>(`/api/returns/${encodeURIComponent(id)}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      const r = res.data;
      heading(`Return #${r.id} (order #${r.orderId})`);
      field('Reason', r.reason);
      field('Status', statusColor(r.status));
      field('Refund total', money(r.refundTotalAmount));
      field('Processed', r.processedAt ? new Date(r.processedAt).toLocaleString('en-US') : null);
      console.log();
      table(
        r.items.map((i) => ({
          Product: i.productName,
          Qty: i.quantity,
          Refund: money(i.refundAmount),
        }))
      );
      console.log();
    });

  returns
    .command('summary')
    .description('Return counts and refund total')
    .option('--since-days <n>', 'Only returns from the last N days')
    .action(async (opts: { sinceDays?: string }) => {
      const res = await api<ReturnSummary>(`/api/returns/summary${buildQuery({ sinceDays: opts.sinceDays })}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      heading('Returns');
      field('Total', res.data.totalReturns);
      field('Pending', res.data.pendingReturns);
      field('Approved', res.data.approvedReturns);
      field('Refunds', money(res.data.totalRefunds));
      console.log();
    });

  returns
    .command('status <id> <status>')
    .description('Change a return status')
    .action(async (id: string, status: string) => {
      const res = await api<ReturnOrder>(`/api/returns/${encodeURIComponent(id)}/status`, {
        method: 'PATCH',
        body: { status },
      });
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      success(`Return #${res.data.id} is now ${res.data.status}`);
    });
}
