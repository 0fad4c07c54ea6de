/**
 * compbot - Library Entry Point
 *
 * Exports the query coordinator and its parts for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Coordinator
export { QueryCoordinator } from './service/coordinator.js';
export type { QueryRequest, CoordinatorOptions } from './service/coordinator.js';
export { QueryRun } from './service/lifecycle.js';

// Sessions and variants
export { AgentVariantSelector } from './agent/selector.js';
export type { SelectorOptions, BuildOverrides } from './agent/selector.js';
export { ReasoningSession, RunHandle, normalizeAnswer } from './agent/session.js';
export type { SessionConfig, RunOutcome } from './agent/session.js';

// Sinks and channels
export * from './sinks/index.js';
export { CallbackChannel } from './transport/channel.js';
export type { Channel, FrameWriter } from './transport/channel.js';
export { ChannelRegistry, createChannelRegistry } from './transport/registry.js';

// Data
export { OrkgComparisonSource } from './dataset/orkg.js';
export { CachingDatasetSource } from './dataset/source.js';
export type { DatasetSource } from './dataset/source.js';
export { createTable, tableShape, renderMarkdown, toDocument } from './dataset/table.js';

// Backends
export { AiSdkBackend, createOpenAIBackend } from './llm/provider.js';
export { modelProfile } from './llm/models.js';

// Prompts and configuration
export { renderPrompt, INSTRUCTIONS, APOLOGY } from './prompts/index.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';
