/**
 * Coordination Bridge
 *
 * File-system channel between the control loop and whatever proposes
 * candidates (a script, a person, an agent). The loop writes
 * `prompt_NNNN.md` and waits for `prompt_NNNN.response.md` next to it.
 * Either side can restart without the other noticing.
 *
 * Both files appear atomically, so a reader that sees a file sees all of it.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { setTimeout as delay } from 'timers/promises';
import { BridgeCancelled, BridgeTimeout, RequestExists, errorMessage } from '../errors.js';
import { isErrnoException, pathExists, writeFileExclusive } from '../fs-utils.js';
import { Logger, silentLogger } from '../logger.js';
import { parseTunables } from '../tuner.js';
import { Candidate, DEFAULT_MARKER, RequestContext } from '../types.js';
import { parseRequestFileName, renderRequest, requestFileName, responseFileName } from './requests.js';
import { formatResponse, parseResponse } from './responses.js';

export { extractCodeBlocks, fenceFor, formatResponse, parseResponse } from './responses.js';
export type { CodeBlock } from './responses.js';
export { parseRequestFileName, renderRequest, requestFileName, responseFileName } from './requests.js';

export const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_LANGUAGE = 'cpp';

export interface FileBridgeOptions {
  directory: string;
  marker?: string;
  language?: string;
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface AwaitResponseOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Sleep that wakes early on abort. Returns false if aborted.
 */
async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
}

async function readIfPresent(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export class FileBridge {
  readonly directory: string;
  private marker: string;
  private language: string;
  private pollIntervalMs: number;
  private logger: Logger;

  constructor(options: FileBridgeOptions) {
    this.directory = options.directory;
    this.marker = options.marker ?? DEFAULT_MARKER;
    this.language = options.language ?? DEFAULT_LANGUAGE;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? silentLogger;
  }

  requestPath(requestId: number): string {
    return join(this.directory, requestFileName(requestId));
  }

  responsePath(requestId: number): string {
    return join(this.directory, responseFileName(requestId));
  }

  /**
   * Publish the request for `requestId`. Existing requests are never replaced.
   */
  async submit(requestId: number, context: RequestContext): Promise<string> {
    const filePath = this.requestPath(requestId);
    try {
      await writeFileExclusive(filePath, renderRequest(context, this.language));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new RequestExists(filePath);
      }
      throw error;
    }
    this.logger.info(`Request ${requestId} written`, { file: filePath });
    return filePath;
  }

  /**
   * Poll for the response to `requestId` and turn it into a candidate.
   */
  async awaitResponse(requestId: number, options: AwaitResponseOptions): Promise<Candidate> {
    const { timeoutMs, signal } = options;
    const filePath = this.responsePath(requestId);
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      if (signal?.aborted) {
        throw new BridgeCancelled(requestId);
      }

      const content = await readIfPresent(filePath);
      if (content !== null) {
        const source = parseResponse(requestId, content);
        this.logger.info(`Response ${requestId} received`, { bytes: source.length });
        return {
          iteration: requestId,
          source,
          tunables: parseTunables(source, this.marker),
        };
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new BridgeTimeout(requestId, timeoutMs);
      }
      if (!(await pause(Math.min(this.pollIntervalMs, remaining), signal))) {
        throw new BridgeCancelled(requestId);
      }
    }
  }

  async hasResponse(requestId: number): Promise<boolean> {
    return pathExists(this.responsePath(requestId));
  }
}

/**
 * Write the response to `requestId` in one step. Responses are never replaced.
 */
export async function writeResponse(
  directory: string,
  requestId: number,
  source: string,
  options: { language?: string; note?: string } = {}
): Promise<string> {
  const filePath = join(directory, responseFileName(requestId));
  await writeFileExclusive(filePath, formatResponse(source, options.language ?? DEFAULT_LANGUAGE, options.note));
  return filePath;
}

export interface PendingRequest {
  requestId: number;
  prompt: string;
}

/**
 * Produces the full replacement source for a request.
 */
export type CandidateGenerator = (request: PendingRequest) => Promise<string>;

export interface ServeOptions {
  signal: AbortSignal;
  pollIntervalMs?: number;
  language?: string;
  logger?: Logger;
}

/**
 * Generator side of the bridge: answer every request that has no response
 * yet, until `signal` aborts. Resolves with the number of responses written.
 * A generator error leaves that request unanswered and is not retried.
 */
export async function serveRequests(
  directory: string,
  generate: CandidateGenerator,
  options: ServeOptions
): Promise<number> {
  const { signal } = options;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const logger = options.logger ?? silentLogger;
  const given = new Set<number>();
  let served = 0;

  while (!signal.aborted) {
    let entries: string[] = [];
    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }

    const pending = entries
      .map(parseRequestFileName)
      .filter((id): id is number => id !== null && !given.has(id))
      .sort((a, b) => a - b);

    for (const requestId of pending) {
      if (signal.aborted) {
        break;
      }
      if (await pathExists(join(directory, responseFileName(requestId)))) {
        given.add(requestId);
        continue;
      }
      const prompt = await fs.readFile(join(directory, requestFileName(requestId)), 'utf-8');
      given.add(requestId);
      try {
        const source = await generate({ requestId, prompt });
        await writeResponse(directory, requestId, source, { language: options.language });
        served++;
        logger.info(`Answered request ${requestId}`);
      } catch (error) {
        logger.error(`Generator failed for request ${requestId}`, { error: errorMessage(error) });
      }
    }

    await pause(pollIntervalMs, signal);
  }

  return served;
}
