import type { Command } from 'commander';
import { type CliContext, prepareRequest } from '../cli/shared.js';

export function registerMentionsCommand(program: Command, ctx: CliContext): void {
  program
    .command('mentions')
    .description('Get mentions')
    .action(async (_cmdOpts: unknown, command: Command) => {
      const { config, client } = prepareRequest(ctx, command);
      const result = await client.getMentions(config.limit);
      if (!result.success) {
        ctx.fail(result.error);
      }
      ctx.printResult({ command: 'mentions', kind: 'notifications', notifications: result.notifications }, config);
    });
}
