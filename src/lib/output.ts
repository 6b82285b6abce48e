export type OutputConfig = {
  plain: boolean;
  emoji: boolean;
  color: boolean;
};

export type OutputEnv = Record<string, string | undefined>;

export const DEFAULT_OUTPUT: OutputConfig = { plain: false, emoji: true, color: false };

function resolveOutputConfig(
  flags: { plain: boolean; noEmoji: boolean; noColor: boolean },
  env: OutputEnv,
  isTty: boolean,
): OutputConfig {
  if (flags.plain) {
    return { plain: true, emoji: false, color: false };
  }
  const noColorEnv = env.NO_COLOR !== undefined && env.NO_COLOR !== '';
  return {
    plain: false,
    emoji: !flags.noEmoji,
    color: isTty && !flags.noColor && !noColorEnv && env.TERM !== 'dumb',
  };
}

export function resolveOutputConfigFromArgv(argv: readonly string[], env: OutputEnv, isTty: boolean): OutputConfig {
  return resolveOutputConfig(
    {
      plain: argv.includes('--plain'),
      noEmoji: argv.includes('--no-emoji'),
      noColor: argv.includes('--no-color'),
    },
    env,
    isTty,
  );
}

export function resolveOutputConfigFromCommander(
  opts: { plain?: boolean; emoji?: boolean; color?: boolean },
  env: OutputEnv,
  isTty: boolean,
): OutputConfig {
  return resolveOutputConfig(
    {
      plain: opts.plain === true,
      noEmoji: opts.emoji === false,
      noColor: opts.color === false,
    },
    env,
    isTty,
  );
}

export function formatBoostLine(booster: string, output: OutputConfig): string {
  return output.emoji ? `🔁 @${booster} boosted` : `boosted by @${booster}`;
}

export function formatStatsLine(
  stats: { replies: number; reblogs: number; favourites: number },
  output: OutputConfig,
): string {
  if (output.emoji) {
    return `💬 ${stats.replies}  🔁 ${stats.reblogs}  ⭐ ${stats.favourites}`;
  }
  return `replies: ${stats.replies}  boosts: ${stats.reblogs}  favourites: ${stats.favourites}`;
}

export function formatUrlLine(url: string, output: OutputConfig): string {
  return output.emoji ? `🔗 ${url}` : `url: ${url}`;
}
