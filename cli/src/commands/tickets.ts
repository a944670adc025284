import { Command } from 'commander';
import { TICKET_PRIORITIES, TICKET_STATUSES, type SupportTicket } from '@supportdesk/shared';
import { api, buildQuery } from '../api.js';
import { heading, field, error, success, priorityColor, statusColor, table } from '../format.js';

interface TicketSummary {
  totalTickets: number;
  openTickets: number;
  resolvedTickets: number;
  urgentTickets: number;
}

export function registerTicketCommands(program: Command): void {
  const tickets = program
    .command('tickets')
    .description('Support tickets');

  tickets
    .command('list')
    .description('List tickets, newest first')
    .option('--status <status>', `One of: ${TICKET_STATUSES.join(', ')}`)
    .option('--priority <priority>', `One of: ${TICKET_PRIORITIES.join(', ')}`)
    .action(async (opts: { status?: string; priority?: string }) => {
      const res = await api<{ tickets: SupportTicket[]; total: number }>(
        `/api/tickets${buildQuery({ status: opts.status, priority: opts.priority })}`
      );
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      heading(`Tickets (${res.data.total})`);
      table(
        res.data.tickets.map((t) => ({
          '#': t.id,
          Customer: t.customerName,
          Issue: t.issueDescription.length > 48 ? `${t.issueDescription.slice(0, 47)}…` : t.issueDescription,
          Priority: priorityColor(t.priority),
          Status: statusColor(t.status),
        }))
      );
      console.log();
    });

  tickets
    .command('show <id>')
    .description('Show one ticket')
    .action(async (id: string) => {
      const res = await api<SupportTicket>(`/api/tickets/${encodeURIComponent(id)}`);
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      const t = res.data;
      heading(`Ticket #${t.id}`);
      field('Customer', t.customerName);
      field('Email', t.customerEmail);
      field('Product', t.productId);
      field('Priority', priorityColor(t.priority));
      field('Status', statusColor(t.status));
      field('Assigned to', t.assignedTo);
      field('Opened', new Date(t.createdAt).toLocaleString('en-US'));
      field('Resolved', t.resolvedAt ? new Date(t.resolvedAt).toLocaleString('en-US') : null);
      console.log(`\n  ${t.issueDescription}\n`);
    });

  tickets
    .command('summary')
    .description('Open, resolved and urgent ticket counts')
    .action(async () => {
      const res = await api<TicketSummary>('/api/tickets/summary');
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      heading('Tickets');
      field('Total', res.data.totalTickets);
      field('Open', res.data.openTickets);
      field('Resolved', res.data.resolvedTickets);
      field('Urgent', res.data.urgentTickets);
      console.log();
    });

  tickets
    .command('status <id> <status>')
    .description('Change a ticket status')
    .action(async (id: string, status: string) => {
      const res = await api<SupportTicket>(`/api/tickets/${encodeURIComponent(id)}/status`, {
        method: 'PATCH',
        body: { status },
      });
      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }
      success(`Ticket #${res.data.id} is now ${res.data.status}`);
    });
}
