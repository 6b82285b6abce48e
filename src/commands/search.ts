import type { Command } from 'commander';
import { type CliContext, prepareRequest } from '../cli/shared.js';
import { ConfigError } from '../lib/errors.js';

export function registerSearchCommand(program: Command, ctx: CliContext): void {
  program
    .command('search')
    .description('Search for posts')
    .argument('[query]', 'Search query')
    .action(async (query: string | undefined, _cmdOpts: unknown, command: Command) => {
      const { config, client } = prepareRequest(ctx, command);
      if (query === undefined) {
        ctx.fail(new ConfigError('search command requires a query argument'));
      }
      const result = await client.searchStatuses(query, config.limit);
      if (!result.success) {
        ctx.fail(result.error);
      }
      ctx.printResult({ command: 'search', kind: 'search', result: result.result }, config);
    });
}
