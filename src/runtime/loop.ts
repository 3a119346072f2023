import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { decodeRequest, encodeResponse } from './codec.js';
import { dispatch } from './dispatch.js';
import { stderrLogger, type Logger } from '../logger.js';
import type { CapabilityHandler } from '../handlers/types.js';

export interface LoopOptions {
  log?: Logger;
}

export interface LoopStats {
  received: number;   // non-blank lines read
  answered: number;
  dropped: number;    // lines that were not a JSON object
}

function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${line}\n`, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Reads NDJSON requests from `input` until it ends, answering each on
 * `output` before the next line is touched. Resolves once input is
 * exhausted; rejects only if `output` fails.
 */
export async function runAgentLoop(
  input: Readable,
  output: Writable,
  handler: CapabilityHandler,
  options: LoopOptions = {},
): Promise<LoopStats> {
  const log = options.log ?? stderrLogger('agent');
  const stats: LoopStats = { received: 0, answered: 0, dropped: 0 };
  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      if (!line.trim()) continue;
      stats.received++;

      const request = decodeRequest(line);
      if (!request) {
        stats.dropped++;
        log(`dropped malformed line (${line.length} chars)`);
        continue;
      }

      const response = await dispatch(request, handler);
      await writeLine(output, encodeResponse(response));
      stats.answered++;
    }
  } finally {
    lines.close();
  }
  return stats;
}
