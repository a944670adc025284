#!/usr/bin/env node

import { Command } from 'commander';
import { registerProductCommands } from './commands/products.js';
import { registerOrderCommands } from './commands/orders.js';
import { registerTicketCommands } from './commands/tickets.js';
import { registerReturnCommands } from './commands/returns.js';
import { registerShippingCommands } from './commands/shipping.js';
import { registerKnowledgeBaseCommands } from './commands/kb.js';
import { registerChatCommands } from './commands/chat.js';

const program = new Command();

program
  .name('supportdesk')
  .description('Support desk CLI: dashboard lookups, status updates and agent chat')
  .version('1.0.0');

// Dashboard views
registerProductCommands(program);
registerOrderCommands(program);
registerTicketCommands(program);
registerReturnCommands(program);
registerShippingCommands(program);
registerKnowledgeBaseCommands(program);

// Agent
registerChatCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parseAsync(args).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
