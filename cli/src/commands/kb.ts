import { Command } from 'commander';
import type { KnowledgeArticle } from '@supportdesk/shared';
import { api } from '../api.js';
import { heading, field, error, statusColor, table } from '../format.js';

type CollectionInfo =
  | { status: 'disconnected' | 'error'; message: string }
  | { status: 'connected'; name: string; pointsCount: number | null; vectorsCount: number | null };

export function registerKnowledgeBaseCommands(program: Command): void {
  const kb = program
    .command('kb')
    .description('Knowledge base');

  kb
    .command('status')
    .description('Vector store connection and collection size')
    .action(async () => {
      const res = await api<CollectionInfo>('/api/knowledge-base/status');
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      heading('Knowledge base');
      field('Status', statusColor(res.data.status));
      if (res.data.status === 'connected') {
        field('Collection', res.data.name);
        field('Points', res.data.pointsCount);
        field('Vectors', res.data.vectorsCount);
      } else {
        field('Message', res.data.message);
      }
      console.log();
    });

  kb
    .command('articles')
    .description('List the help-centre articles')
    .action(async () => {
      const res = await api<{ articles: KnowledgeArticle[] }>('/api/knowledge-base/articles');
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      heading(`Articles (${res.data.articles.length})`);
      table(res.data.articles.map((a) => ({ ID: a.id, Title: a.title, Category: a.category, URL: a.url })));
      console.log();
    });
}
