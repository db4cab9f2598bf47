import { createInterface } from 'node:readline/promises';
import { log } from '@workspace/logger';
import type { Pacer } from '../anti-blocking/pacer.js';
import { DiscordClient } from '../api/discord-client.js';
import type { CurrentUser, MessageApi } from '../api/types.js';
import { resolveToken, verifyIdentity } from '../auth/token.js';

type ActionDependencies = {
  createApi: (token: string) => MessageApi;
  confirm: (question: string) => Promise<boolean>;
  pacer?: Pacer;
  env?: NodeJS.ProcessEnv;
  envFilePath?: string;
};

async function promptConfirmation(question: string): Promise<boolean> {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await prompt.question(question);
    return answer.trim().toLowerCase() === 'yes';
  } finally {
    prompt.close();
  }
}

const defaultDependencies: ActionDependencies = {
  createApi: (token) => new DiscordClient({ token }),
  confirm: promptConfirmation,
};

type Connection = {
  api: MessageApi;
  user: CurrentUser;
};

/** Resolves the token and validates it; throws `AuthError` before anything else runs. */
async function connect(
  tokenFlag: string | undefined,
  dependencies: ActionDependencies,
): Promise<Connection> {
  const { token, source } = resolveToken({
    flag: tokenFlag,
    env: dependencies.env,
    envFilePath: dependencies.envFilePath,
  });
  log.info(`Using token from ${source}`);
  log.info('Validating token...');

  const api = dependencies.createApi(token);
  const user = await verifyIdentity(api);

  return { api, user };
}

export { defaultDependencies, promptConfirmation, connect };
export type { ActionDependencies, Connection };
