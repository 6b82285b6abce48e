import type { Command } from 'commander';
import kleur from 'kleur';
import { type CredentialResolutionResult, resolveCredentials } from '../lib/credentials.js';
import { ConfigError, describeError } from '../lib/errors.js';
import { MastodonClient } from '../lib/mastodon-client.js';
import { type FetchResult, payloadOf } from '../lib/mastodon-client-types.js';
import { type OutputConfig, resolveOutputConfigFromArgv, resolveOutputConfigFromCommander } from '../lib/output.js';
import { renderEnvelope, renderFailure, renderText } from '../lib/render.js';
import { type RequestConfig, type RequestConfigOptions, resolveRequestConfig } from '../lib/request-config.js';

export type GlobalOptions = RequestConfigOptions & {
  plain?: boolean;
  emoji?: boolean;
  color?: boolean;
};

export type CliContextOptions = {
  env?: Record<string, string | undefined>;
  isTty?: boolean;
};

type Styler = (text: string) => string;

export type CliContext = {
  readonly output: OutputConfig;
  colors: {
    banner: Styler;
    subtitle: Styler;
    section: Styler;
    command: Styler;
    muted: Styler;
    error: Styler;
  };
  applyOutputFromCommand: (command: Command) => void;
  resolveRequestConfigFromOptions: (opts: GlobalOptions) => RequestConfig;
  resolveCredentialsFromEnv: () => CredentialResolutionResult;
  createClient: (accessToken: string, config: RequestConfig) => MastodonClient;
  printResult: (result: FetchResult, config: RequestConfig) => void;
  /** Report a fatal error on both channels and exit 1. */
  fail: (error: unknown) => never;
};

export function createCliContext(normalizedArgs: string[], options: CliContextOptions = {}): CliContext {
  const env = options.env ?? process.env;
  const isTty = options.isTty ?? process.stdout.isTTY === true;
  let output = resolveOutputConfigFromArgv(normalizedArgs, env, isTty);
  kleur.enabled = output.color;

  const wrap =
    (styler: Styler): Styler =>
    (text: string): string =>
      output.color ? styler(text) : text;

  const colors = {
    banner: wrap((t) => kleur.bold().magenta(t)),
    subtitle: wrap((t) => kleur.dim(t)),
    section: wrap((t) => kleur.bold().white(t)),
    command: wrap((t) => kleur.bold().cyan(t)),
    muted: wrap((t) => kleur.gray(t)),
    error: wrap((t) => kleur.bold().red(t)),
  };

  function fail(error: unknown): never {
    const message = describeError(error);
    console.log(renderFailure(message));
    console.error(`${colors.error('Error:')} ${message}`);
    return process.exit(1);
  }

  return {
    get output() {
      return output;
    },
    colors,
    applyOutputFromCommand(command: Command): void {
      const opts = command.optsWithGlobals<GlobalOptions>();
      output = resolveOutputConfigFromCommander(opts, env, isTty);
      kleur.enabled = output.color;
    },
    resolveRequestConfigFromOptions(opts: GlobalOptions): RequestConfig {
      return resolveRequestConfig(opts, env);
    },
    resolveCredentialsFromEnv(): CredentialResolutionResult {
      return resolveCredentials(env);
    },
    createClient(accessToken: string, config: RequestConfig): MastodonClient {
      return new MastodonClient({
        accessToken,
        instanceUrl: config.instanceUrl,
        timeoutMs: config.timeoutSeconds * 1000,
        debug: env.MASTODON_SCOUT_DEBUG === '1',
      });
    },
    printResult(result: FetchResult, config: RequestConfig): void {
      if (config.mode === 'json') {
        console.log(renderEnvelope(payloadOf(result)));
        return;
      }
      console.log(renderText(result, output));
    },
    fail,
  };
}

/**
 * Resolve config and token for a command, exiting on ConfigError before any
 * request is made.
 */
export function prepareRequest(
  ctx: CliContext,
  command: Command,
): { config: RequestConfig; client: MastodonClient } {
  const opts = command.optsWithGlobals<GlobalOptions>();
  let config: RequestConfig;
  try {
    config = ctx.resolveRequestConfigFromOptions(opts);
  } catch (error) {
    return ctx.fail(error);
  }

  const { credentials, warnings } = ctx.resolveCredentialsFromEnv();
  if (!credentials.accessToken) {
    return ctx.fail(new ConfigError(warnings[0] ?? 'Missing access token'));
  }

  return { config, client: ctx.createClient(credentials.accessToken, config) };
}
