export { resolveConfig, warnOnKeyShape, clientConfigSchema, DEFAULT_BASE_URL, API_KEY_PREFIX, LOG_LEVELS } from './config.js';
export type { ClientConfig, ClientOptions, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export { HttpCollectorTransport, classifyStatus } from './http/collector-transport.js';
export type { HttpCollectorTransportOptions } from './http/collector-transport.js';
export { default as agentStorePlugin, InMemoryAgentStore } from './collector/agent-store.js';
export type { NewAgent, StoredAgent } from './collector/agent-store.js';
