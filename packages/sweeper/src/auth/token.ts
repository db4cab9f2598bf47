import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { log } from '@workspace/logger';
import type { CurrentUser, MessageApi } from '../api/types.js';
import { AuthError } from '../errors.js';

const TOKEN_ENV_VAR = 'DISCORD_TOKEN';

type TokenSource = 'flag' | 'environment' | 'env-file';

type ResolvedToken = {
  token: string;
  source: TokenSource;
};

type ResolveTokenOptions = {
  flag?: string;
  env?: NodeJS.ProcessEnv;
  envFilePath?: string;
};

/**
 * Token lookup order: `--token`, then the `DISCORD_TOKEN` environment
 * variable, then `DISCORD_TOKEN` in a `.env` file.
 */
function resolveToken(options?: ResolveTokenOptions): ResolvedToken {
  const flag = options?.flag?.trim();
  if (flag) {
    return { token: flag, source: 'flag' };
  }

  const fromEnv = (options?.env ?? process.env)[TOKEN_ENV_VAR]?.trim();
  if (fromEnv) {
    return { token: fromEnv, source: 'environment' };
  }

  const envFilePath = options?.envFilePath ?? '.env';
  if (existsSync(envFilePath)) {
    const fromFile = parse(readFileSync(envFilePath, 'utf-8'))[TOKEN_ENV_VAR]?.trim();
    if (fromFile) {
      return { token: fromFile, source: 'env-file' };
    }
  }

  throw new AuthError(
    `No token found. Pass --token, set ${TOKEN_ENV_VAR}, or add ${TOKEN_ENV_VAR}=... to ${envFilePath}`,
  );
}

/** Confirms the token works and returns the account every search filters on. */
async function verifyIdentity(api: MessageApi): Promise<CurrentUser> {
  const result = await api.getCurrentUser();

  switch (result.kind) {
    case 'ok': {
      const user = result.data;
      const handle =
        user.discriminator !== '0'
          ? `${user.username}#${user.discriminator}`
          : `@${user.username}`;
      log.info(`Logged in as: ${handle} (ID: ${user.id})`);
      return user;
    }
    case 'network-error':
      throw new AuthError(`Token validation network error: ${result.detail}`);
    default:
      throw new AuthError(
        result.status === 401
          ? 'Invalid token (401 Unauthorized)'
          : `Token validation failed (HTTP ${result.status})`,
        result.status,
      );
  }
}

export { TOKEN_ENV_VAR, resolveToken, verifyIdentity };
export type { TokenSource, ResolvedToken, ResolveTokenOptions };
