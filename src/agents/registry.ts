import { calcAgent } from './calc.js';
import { priceAgent } from './price.js';
import { defiApyAgent } from './defi-apy.js';
import { homeAssistantAgent } from './home-assistant.js';
import { monitorAgent } from './monitor.js';
import { pdfSummarizerAgent } from './pdf-summarizer.js';
import { webScraperAgent } from './web-scraper.js';
import { webhookAgent } from './webhook.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { AgentDeps } from './deps.js';

export type AgentFactory = (deps: AgentDeps) => CapabilityDefinition;

/** Fixed set of agents a process can be started as; there is no discovery. */
export class AgentRegistry {
  private factories = new Map<string, AgentFactory>();

  register(key: string, factory: AgentFactory): void {
    this.factories.set(key, factory);
  }

  get(key: string): AgentFactory | undefined {
    return this.factories.get(key);
  }

  list(): string[] {
    return [...this.factories.keys()];
  }
}

export function createDefaultRegistry(): AgentRegistry {
  const registry = new AgentRegistry();
  registry.register('calc', () => calcAgent());
  registry.register('price', deps => priceAgent(deps));
  registry.register('defi-apy', deps => defiApyAgent(deps));
  registry.register('home-assistant', deps => homeAssistantAgent(deps));
  registry.register('monitor', deps => monitorAgent(deps));
  registry.register('pdf-summarizer', deps => pdfSummarizerAgent(deps));
  registry.register('web-scraper', deps => webScraperAgent(deps));
  registry.register('webhook', deps => webhookAgent(deps));
  return registry;
}
