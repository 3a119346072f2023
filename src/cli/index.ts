import { Command } from 'commander';
import type { Readable, Writable } from 'stream';
import { loadConfig, type Config } from '../config/index.js';
import { createAgentDeps, type AgentDeps } from '../agents/deps.js';
import { createDefaultRegistry, type AgentRegistry } from '../agents/registry.js';
import { OpenAIEmbedder } from '../cards/embedder.js';
import { createHandler } from '../handlers/create.js';
import { runAgentLoop } from '../runtime/loop.js';
import { quietLogger, stderrLogger, type Logger } from '../logger.js';
import { VERSION } from '../version.js';
import type { CapabilityHandler } from '../handlers/types.js';

export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  env: NodeJS.ProcessEnv;
  registry?: AgentRegistry;
  makeDeps?: (config: Config, log: Logger) => AgentDeps;
}

export function buildProgram(io: CliIO): Command {
  const registry = io.registry ?? createDefaultRegistry();
  const makeDeps = io.makeDeps ?? createAgentDeps;

  const program: Command = new Command();

  function setup(scope: string) {
    const config = loadConfig(io.env);
    const log = config.log.quiet ? quietLogger : stderrLogger(scope);
    return { config, log, deps: makeDeps(config, log) };
  }

  async function loadHandler(key: string): Promise<{ handler: CapabilityHandler; log: Logger }> {
    const factory = registry.get(key);
    if (!factory) {
      program.error(`Unknown agent: ${key} (available: ${registry.list().join(', ')})`);
    }
    const { config, log, deps } = setup(`agent:${key}`);
    const embedder = config.embeddings.enabled
      ? new OpenAIEmbedder(
        { apiKey: config.llm.apiKey, model: config.embeddings.model, baseUrl: config.llm.baseUrl },
        deps.transport,
      )
      : undefined;
    const handler = await createHandler(factory(deps), { embedder, log });
    return { handler, log };
  }

  program
    .name('tool-agent')
    .description('Line-delimited JSON tool agents over stdio')
    .version(VERSION);

  program
    .command('list')
    .description('List the agents this binary can run')
    .action(() => {
      const { deps } = setup('agent');
      for (const key of registry.list()) {
        const factory = registry.get(key);
        if (!factory) continue;
        const { card } = factory(deps);
        io.stdout.write(`${key.padEnd(16)}${card.name}  ${card.description}\n`);
      }
    });

  program
    .command('describe')
    .description('Print an agent\'s service card')
    .argument('<agent>', 'Agent key, see `list`')
    .action(async (key: string) => {
      const { handler } = await loadHandler(key);
      io.stdout.write(`${JSON.stringify(handler.describe())}\n`);
    });

  program
    .command('run')
    .description('Serve requests from stdin until it closes')
    .argument('<agent>', 'Agent key, see `list`')
    .action(async (key: string) => {
      const { handler, log } = await loadHandler(key);
      const card = handler.describe();
      log(`${card.name} ${card.version} ready`);
      const stats = await runAgentLoop(io.stdin, io.stdout, handler, { log });
      log(`input closed: ${stats.answered} answered, ${stats.dropped} dropped`);
    });

  return program;
}
