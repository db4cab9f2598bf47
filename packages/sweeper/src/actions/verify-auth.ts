import { log } from '@workspace/logger';
import { z } from 'zod';
import { isFatalError } from '../errors.js';
import { optionalPath } from './args.js';
import {
  connect,
  defaultDependencies,
  type ActionDependencies,
} from './dependencies.js';

const verifyAuthArgsSchema = z.object({
  token: optionalPath('Invalid --token'),
});

type VerifyAuthArgs = z.infer<typeof verifyAuthArgsSchema>;

export async function runVerifyAuthAction(
  args: VerifyAuthArgs,
  dependencies: ActionDependencies = defaultDependencies,
): Promise<number> {
  try {
    await connect(args.token, dependencies);
    log.info('Token is valid!');
    return 0;
  } catch (error) {
    if (isFatalError(error)) {
      log.fatal(error.message);
      return 1;
    }
    throw error;
  }
}

export { verifyAuthArgsSchema };
export type { VerifyAuthArgs };
