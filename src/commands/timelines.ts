import type { Command } from 'commander';
import { type CliContext, prepareRequest } from '../cli/shared.js';

export function registerTimelineCommands(program: Command, ctx: CliContext): void {
  program
    .command('home')
    .description('Get home timeline')
    .action(async (_cmdOpts: unknown, command: Command) => {
      const { config, client } = prepareRequest(ctx, command);
      const result = await client.getHomeTimeline(config.limit);
      if (!result.success) {
        ctx.fail(result.error);
      }
      ctx.printResult({ command: 'home', kind: 'statuses', statuses: result.statuses }, config);
    });

  program
    .command('user-tweets')
    .description("Get the authenticated account's own posts")
    .action(async (_cmdOpts: unknown, command: Command) => {
      const { config, client } = prepareRequest(ctx, command);
      const result = await client.getOwnStatuses(config.limit);
      if (!result.success) {
        ctx.fail(result.error);
      }
      ctx.printResult({ command: 'user-tweets', kind: 'statuses', statuses: result.statuses }, config);
    });
}
