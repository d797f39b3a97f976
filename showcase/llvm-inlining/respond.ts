#!/usr/bin/env npx tsx
/**
 * Scripted responder
 *
 * Answers every pending request with the current best source, each
 * `cl::init(N)` nudged by up to 20%. Useful for exercising the harness end
 * to end without an agent.
 */

import { join } from 'path';
import { z } from 'zod';
import { extractCodeBlocks, serveRequests } from '../../src/bridge/index.js';
import { createConsoleLogger } from '../../src/logger.js';

const respondEnv = z.object({
  EVOLVE_STATE_DIR: z.string().default(join(process.cwd(), '.evolve', 'llvm-inlining')),
});

function nudge(source: string): string {
  return source.replace(/cl::init\((-?\d+)\)/g, (_, value: string) => {
    const n = Number.parseInt(value, 10);
    const factor = 0.8 + Math.random() * 0.4;
    return `cl::init(${Math.round(n * factor)})`;
  });
}

async function main() {
  const logger = createConsoleLogger('respond');
  const env = respondEnv.parse(process.env);
  const abort = new AbortController();
  process.once('SIGINT', () => abort.abort());

  const directory = join(env.EVOLVE_STATE_DIR, 'prompts');
  logger.info('Watching for requests', { directory });

  const served = await serveRequests(
    directory,
    async ({ requestId, prompt }) => {
      const blocks = extractCodeBlocks(prompt).filter((b) => b.label.length > 0);
      const current = blocks[blocks.length - 1];
      if (!current) {
        throw new Error(`request ${requestId} carries no source`);
      }
      return nudge(current.body);
    },
    { signal: abort.signal, logger }
  );

  logger.info('Stopped', { served });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
