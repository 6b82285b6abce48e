/**
 * Bearer token resolution for the Mastodon API
 * The token is only ever read from the environment and is never echoed back.
 */

export interface MastodonCredentials {
	accessToken: string | null;
	source: string | null;
}

export interface CredentialResolutionResult {
	credentials: MastodonCredentials;
	warnings: string[];
}

export const TOKEN_ENV_KEYS = ['MASTODON_TOKEN', 'MASTODON_ACCESS_TOKEN'] as const;

function normalizeValue(value: unknown): string | null {
	if (typeof value === 'string') {
		const trimmed = value.trim();
		return trimmed.length > 0 ? trimmed : null;
	}
	return null;
}

/**
 * Resolve the access token from environment variables
 * Priority follows TOKEN_ENV_KEYS order.
 */
export function resolveCredentials(env: Record<string, string | undefined> = process.env): CredentialResolutionResult {
	const warnings: string[] = [];
	const credentials: MastodonCredentials = {
		accessToken: null,
		source: null,
	};

	for (const key of TOKEN_ENV_KEYS) {
		const value = normalizeValue(env[key]);
		if (value) {
			credentials.accessToken = value;
			credentials.source = `env ${key}`;
			break;
		}
	}

	if (!credentials.accessToken) {
		warnings.push('MASTODON_TOKEN environment variable not set');
	}

	return { credentials, warnings };
}
