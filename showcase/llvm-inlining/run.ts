#!/usr/bin/env npx tsx
/**
 * LLVM Inlining Evolution Runner
 *
 * Evolves the inline cost heuristic of an LLVM checkout. Candidates arrive
 * through the bridge directory; answer them by hand, with an agent, or with
 * respond.ts.
 *
 * Run with:
 *   EVOLVE_SOURCE_ROOT=~/llvm-project \
 *   EVOLVE_BUILD_DIR=~/llvm-project/build \
 *   EVOLVE_TARGET_FILE=llvm/lib/Analysis/EvolvedInlineCost.cpp \
 *   npx tsx showcase/llvm-inlining/run.ts
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { FileBridge } from '../../src/bridge/index.js';
import { loadConfigFromEnv, loadTaskConfig } from '../../src/config.js';
import { HillClimbController } from '../../src/controller.js';
import { IterationLog } from '../../src/iteration-log.js';
import { createConsoleLogger } from '../../src/logger.js';
import { Orchestrator } from '../../src/orchestrator.js';
import { EvaluationPipeline } from '../../src/pipeline.js';

const here = dirname(fileURLToPath(import.meta.url));

const runEnv = z.object({
  EVOLVE_ITERATIONS: z.coerce.number().int().positive().default(10),
  EVOLVE_RESPONSE_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  EVOLVE_STATE_DIR: z.string().default(join(process.cwd(), '.evolve', 'llvm-inlining')),
});

const INSTRUCTIONS = `Improve computeInlineCost() so that code size shrinks without slowing the
benchmarks down. Keep the function signature and the includes. Expose any new
numeric knob as a cl::opt with a [hyperparam] annotation on the line above it.`;

async function main() {
  const logger = createConsoleLogger('run');
  const env = runEnv.parse(process.env);
  const config = loadConfigFromEnv();
  const task = await loadTaskConfig(join(here, 'task.json'));
  const seed = readFileSync(join(here, 'seed.cpp'), 'utf-8');

  logger.info('Starting', {
    task: task.name,
    target: config.targetFile,
    iterations: env.EVOLVE_ITERATIONS,
    state: env.EVOLVE_STATE_DIR,
  });

  const orchestrator = new Orchestrator({
    bridge: new FileBridge({
      directory: join(env.EVOLVE_STATE_DIR, 'prompts'),
      marker: task.marker,
      logger: createConsoleLogger('bridge'),
    }),
    pipeline: EvaluationPipeline.create(config, task),
    controller: new HillClimbController(seed, { instructions: INSTRUCTIONS }),
    log: new IterationLog(join(env.EVOLVE_STATE_DIR, 'iterations.jsonl'), { logger }),
    logger: createConsoleLogger('orchestrator'),
  });

  // While a candidate is patched in, the pipeline's own guard takes over.
  const abort = new AbortController();
  process.once('SIGINT', () => abort.abort());

  const summary = await orchestrator.run({
    iterations: env.EVOLVE_ITERATIONS,
    responseTimeoutMs: env.EVOLVE_RESPONSE_TIMEOUT_MS,
    signal: abort.signal,
  });

  logger.info('Finished', { ...summary });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
