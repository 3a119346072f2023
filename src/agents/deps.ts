import { createFetchTransport, type HttpTransport } from '../http/transport.js';
import { HuggingFaceCompleter, OpenAICompleter, type TextCompleter } from '../llm/chat.js';
import { execFileRunner, type CommandRunner } from '../system/command.js';
import { tlsConnectProbe, type TlsProbe } from '../system/tls.js';
import type { Config } from '../config/index.js';
import type { Logger } from '../logger.js';

export interface LLMCompleters {
  openai: TextCompleter;
  huggingface: TextCompleter;
}

/** Everything an agent may reach outside the process; faked in tests. */
export interface AgentDeps {
  config: Config;
  transport: HttpTransport;
  runCommand: CommandRunner;
  tlsProbe: TlsProbe;
  completers: LLMCompleters;
  now: () => number;
  log: Logger;
}

export function createAgentDeps(config: Config, log: Logger): AgentDeps {
  const transport = createFetchTransport(config.http);
  return {
    config,
    transport,
    runCommand: execFileRunner,
    tlsProbe: tlsConnectProbe,
    completers: {
      openai: new OpenAICompleter(config.llm, transport),
      huggingface: new HuggingFaceCompleter(config.huggingface, transport),
    },
    now: () => Date.now(),
    log,
  };
}
