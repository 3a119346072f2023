export { runAgentLoop } from './runtime/loop.js';
export { dispatch } from './runtime/dispatch.js';
export { decodeRequest, encodeResponse } from './runtime/codec.js';
export { normalizeParams, parseParams, toParamShape } from './runtime/params.js';
export { createHandler } from './handlers/create.js';
export { HandlerError, validationError, upstreamError, unsupportedError } from './handlers/errors.js';
export { buildServiceCard } from './cards/service-card.js';
export { OpenAIEmbedder } from './cards/embedder.js';
export { AgentRegistry, createDefaultRegistry } from './agents/registry.js';
export { createAgentDeps } from './agents/deps.js';
export { createFetchTransport } from './http/transport.js';
export { loadConfig } from './config/index.js';
export { VERSION } from './version.js';
export type * from './types/shared.js';
export type { CapabilityDefinition, CapabilityHandler } from './handlers/types.js';
export type { HttpTransport, HttpRequest, HttpResponse } from './http/transport.js';
export type { AgentDeps } from './agents/deps.js';
