#!/usr/bin/env node

/**
 * mastodon-scout - read-only Mastodon CLI
 *
 * Usage:
 *   mastodon-scout home --limit 10
 *   mastodon-scout --json mentions
 *   mastodon-scout search "fediverse"
 */

import { runProgram } from './cli/program.js';
import { createCliContext } from './cli/shared.js';

const rawArgs: string[] = process.argv.slice(2);
const normalizedArgs: string[] = rawArgs[0] === '--' ? rawArgs.slice(1) : rawArgs;

const ctx = createCliContext(normalizedArgs);

await runProgram(normalizedArgs, ctx);
