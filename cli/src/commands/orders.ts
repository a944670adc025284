import { Command } from 'commander';
import { ORDER_STATUSES, type Order, type OrderWithItems } from '@supportdesk/shared';
import { api, buildQuery } from '../api.js';
import { heading, field, error, success, money, statusColor, table } from '../format.js';

interface OrderSummary {
  totalOrders: number;
  totalRevenue: number;
  averageOrderValue: number;
  pendingOrders: number;
}

export function registerOrderCommands(program: Command): void {
  const orders = program
    .command('orders')
    .description('Order lookups and status updates');

  orders
    .command('list')
    .description('List orders, newest first')
    .option('--status <status>', `One of: ${ORDER_STATUSES.join(', ')}`)
    .action(async (opts: { status?: string }) => {
      const res = await api<{ orders: Order[]; total: number }>(`/api/orders${buildQuery({ status: opts.status })}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      heading(`Orders (${res.data.total})`);
      table(
        res.data.orders.map((o) => ({
          '#': o.id,
          Customer: o.customerName,
          Date: new Date(o.createdAt).toLocaleDateString('en-US'),
          Amount: money(o.totalAmount),
          Status: statusColor(o.status),
        }))
      );
      console.log();
    });

  orders
    .command('show <id>')
    .description('Show an order and its items')
    .action(async (id: string) => {
      const res = await api<OrderWithItems>(`/api/orders/${encodeURIComponent(id)}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      const o = res.data;
      heading(`Order #${o.id}`);
      field('Customer', o.customerName);
      field('Email', o.customerEmail);
      field('Phone', o.customerPhone);
      field('Ship to', o.shippingAddress);
      field('Status', statusColor(o.status));
      field('Total', money(o.totalAmount));
      console.log();
      table(
        o.items.map((i) => ({
          Product: i.productName,
          Qty: i.quantity,
          Price: money(i.priceAtPurchase),
          'Line total': money(i.priceAtPurchase * i.quantity),
        }))
      );
      console.log();
    });

  orders
    .command('summary')
    .description('Order count, revenue and pending orders')
    .option('--status <status>', 'Limit to one status')
    .action(async (opts: { status?: string }) => {
      const res = await api<OrderSummary>(`/api/orders/summary${buildQuery({ status: opts.status })}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      heading('Orders');
      field('Total orders', res.data.totalOrders);
      field('Revenue', money(res.data.totalRevenue));
      field('Average order', money(res.data.averageOrderValue));
      field('Pending', res.data.pendingOrders);
      console.log();
    });

  orders
    .command('status <id> <status>')
    .description('Change an order status')
    .action(async (id: string, status: string) => {
      const res = await api<Order>(`/api/orders/${encodeURIComponent(id)}/status`, {
        method: 'PATCH',
        body: { status },
      });
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      success(`Order #${res.data.id} is now ${res.data.status}`);
    });
}
