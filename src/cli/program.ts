import { Command, CommanderError } from 'commander';
import { registerMentionsCommand } from '../commands/mentions.js';
import { registerSearchCommand } from '../commands/search.js';
import { registerTimelineCommands } from '../commands/timelines.js';
import { resolveCliInvocation } from '../lib/cli-args.js';
import { ConfigError } from '../lib/errors.js';
import { DEFAULT_INSTANCE_URL, DEFAULT_LIMIT, DEFAULT_TIMEOUT_SECONDS } from '../lib/mastodon-client-constants.js';
import { COMMAND_NAMES } from '../lib/mastodon-client-types.js';
import { getCliVersion } from '../lib/version.js';
import type { CliContext } from './shared.js';

export const PROGRAM_NAME = 'mastodon-scout';

export const KNOWN_COMMANDS = new Set<string>([...COMMAND_NAMES, 'help']);

export function createProgram(ctx: CliContext): Command {
  const program = new Command();
  const { colors } = ctx;

  program.addHelpText(
    'beforeAll',
    () => `${colors.banner(PROGRAM_NAME)} ${colors.subtitle('— read your Mastodon timelines from the terminal')}`,
  );

  program
    .name(PROGRAM_NAME)
    .description('Read-only Mastodon client: timelines, mentions and search')
    .version(getCliVersion())
    .exitOverride()
    .configureHelp({ showGlobalOptions: true })
    .configureOutput({
      // errors are reported through ctx.fail
      outputError: () => undefined,
    });

  const formatExample = (command: string, description: string): string =>
    `${colors.command(`  ${command}`)}\n${colors.muted(`    ${description}`)}`;

  program.addHelpText(
    'afterAll',
    () =>
      `\n${colors.section('Examples')}\n${[
        formatExample(`${PROGRAM_NAME} home --limit 5`, 'Latest five posts from your home timeline'),
        formatExample(`${PROGRAM_NAME} --json mentions`, 'Mentions as a {"success":true,"data":[...]} envelope'),
        formatExample(`${PROGRAM_NAME} search "rust async"`, 'Search posts on your instance'),
      ].join('\n\n')}\n\n${colors.section('Environment')}\n${colors.muted(
        [
          '  MASTODON_TOKEN          bearer token (MASTODON_ACCESS_TOKEN also accepted)',
          '  MASTODON_INSTANCE       default for --instance',
          '  MASTODON_SCOUT_LIMIT    default for --limit',
          '  MASTODON_SCOUT_TIMEOUT  default for --timeout',
          '  MASTODON_SCOUT_DEBUG    set to 1 to log requests on stderr',
        ].join('\n'),
      )}`,
  );

  program
    .option('--instance <url>', `Mastodon instance URL (default: ${DEFAULT_INSTANCE_URL})`)
    .option('--limit <n>', `Number of items to return (default: ${DEFAULT_LIMIT})`)
    .option('--timeout <seconds>', `Request timeout in seconds (default: ${DEFAULT_TIMEOUT_SECONDS})`)
    .option('--json', 'Output the raw API response in a JSON envelope')
    .option('--plain', 'Plain output (stable, no emoji, no color)')
    .option('--no-emoji', 'Disable emoji output')
    .option('--no-color', 'Disable ANSI colors (or set NO_COLOR)');

  program.hook('preAction', (_thisCommand, actionCommand) => {
    ctx.applyOutputFromCommand(actionCommand);
  });

  program
    .command('help [command]')
    .description('Show help for a command')
    .action((commandName?: string) => {
      if (!commandName) {
        program.outputHelp();
        return;
      }

      const cmd = program.commands.find((c) => c.name() === commandName);
      if (!cmd) {
        ctx.fail(new ConfigError(`unknown command: ${commandName}`));
      }

      cmd.outputHelp();
    });

  registerTimelineCommands(program, ctx);
  registerMentionsCommand(program, ctx);
  registerSearchCommand(program, ctx);

  return program;
}

/**
 * Entry point shared by the binary and the tests. Unknown commands and bare
 * invocations are handled here so they never reach commander.
 */
export async function runProgram(args: string[], ctx: CliContext, program: Command = createProgram(ctx)): Promise<void> {
  const invocation = resolveCliInvocation(args, PROGRAM_NAME);

  if (invocation.kind === 'help') {
    program.outputHelp();
    return;
  }
  if (invocation.kind === 'version') {
    console.log(getCliVersion());
    return;
  }
  if (invocation.kind === 'usage') {
    program.outputHelp({ error: true });
    return process.exit(1);
  }
  if (invocation.kind === 'unknown') {
    return ctx.fail(new ConfigError(`unknown command: ${invocation.command}`));
  }

  try {
    await program.parseAsync(invocation.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        return;
      }
      ctx.fail(new ConfigError(error.message.replace(/^error:\s*/, '')));
    }
    throw error;
  }
}
