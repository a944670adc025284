import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import { api } from '../api.js';
import { describeToolCall, error, type ToolCallLine } from '../format.js';

interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

interface ChatReply {
  reply: string;
  toolCalls: ToolCallLine[];
}

const EXIT_WORDS = new Set(['exit', 'quit', 'bye']);

export function registerChatCommands(program: Command): void {
  program
    .command('chat')
    .description('Talk to the support agent (type "exit" to leave)')
    .option('--no-tools', 'Hide the tool calls under each reply')
    .action(async (opts: { tools: boolean }) => {
      const welcome = await api<{ message: string }>('/api/chat/welcome');
      if (welcome.ok) console.log(chalk.cyan(`\n${welcome.data.message}\n`));

      const rl = createInterface({ input: process.stdin, output: process.stdout });
      const history: ChatTurn[] = [];

      try {
        for (;;) {
          const message = (await rl.question(chalk.bold('you › '))).trim();
          if (!message) continue;
          if (EXIT_WORDS.has(message.toLowerCase())) break;

          const res = await api<ChatReply>('/api/chat', { method: 'POST', body: { message, history } });
          if (!res.ok) {
            error(res.error);
            continue;
          }

          if (opts.tools) {
            for (const call of res.data.toolCalls) {
              console.log(chalk.dim(`  ⚙ ${describeToolCall(call)}`));
            }
          }
          console.log(`${chalk.bold.cyan('agent ›')} ${res.data.reply}\n`);

          history.push({ role: 'user', content: message }, { role: 'assistant', content: res.data.reply });
        }
      } finally {
        rl.close();
      }
    });
}
