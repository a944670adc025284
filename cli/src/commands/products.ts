import { Command } from 'commander';
import type { Product } from '@supportdesk/shared';
import chalk from 'chalk';
import { api, buildQuery } from '../api.js';
import { heading, field, error, money, table } from '../format.js';

function stockCell(qty: number): string {
  if (qty === 0) return chalk.red('0');
  if (qty < 5) return chalk.yellow(String(qty));
  return chalk.green(String(qty));
}

export function registerProductCommands(program: Command): void {
  const products = program
    .command('products')
    .description('Product catalogue');

  products
    .command('list')
    .description('List products')
    .option('-c, --category <category>', 'Filter by category')
    .option('-s, --search <text>', 'Search name and description')
    .action(async (opts: { category?: string; search?: string }) => {
      const res = await api<{ products: Product[]; total: number }>(
        `/api/products${buildQuery({ category: opts.category, search: opts.search })}`
      );
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      heading(`Products (${res.data.total})`);
      table(
        res.data.products.map((p) => ({
          ID: p.id,
          Name: p.name,
          Category: p.category || '—',
          Price: money(p.price),
          Stock: stockCell(p.stockQuantity),
        }))
      );
      console.log();
    });

  products
    .command('categories')
    .description('List product categories')
    .action(async () => {
      const res = await api<{ categories: string[] }>('/api/products/categories');
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      heading('Categories');
      for (const category of res.data.categories) console.log(`  ${category}`);
      console.log();
    });

  products
    .command('show <id>')
    .description('Show one product')
    .action(async (id: string) => {
      const res = await api<Product>(`/api/products/${encodeURIComponent(id)}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      const p = res.data;
      heading(p.name);
      field('ID', p.id);
      field('Category', p.category);
      field('Price', money(p.price));
      field('Stock', p.stockQuantity);
      field('Description', p.description);
      field('Specifications', p.specifications);
      console.log();
    });
}
