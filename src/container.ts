import { AppConfig, loadConfig } from './config.js';
import { AgentVariantSelector } from './agent/selector.js';
import { CachingDatasetSource, DatasetSource } from './dataset/source.js';
import { OrkgComparisonSource } from './dataset/orkg.js';
import { createOpenAIBackend } from './llm/provider.js';
import { QueryCoordinator } from './service/coordinator.js';
import { ChannelRegistry, createChannelRegistry } from './transport/registry.js';
import type { BackendFactory } from './types/index.js';

export interface ServerContainer {
    config: AppConfig;
    source: DatasetSource;
    registry: ChannelRegistry;
    selector: AgentVariantSelector;
    coordinator: QueryCoordinator;
}

export interface ContainerOverrides {
    source?: DatasetSource;
    backendFactory?: BackendFactory;
}

export function createContainer(
    config: AppConfig = loadConfig(),
    overrides: ContainerOverrides = {}
): ServerContainer {
    let source: DatasetSource = overrides.source ?? new OrkgComparisonSource(config.orkgHost);
    if (config.cacheTtlMs > 0) {
        source = new CachingDatasetSource(source, { max: config.cacheMax, ttlMs: config.cacheTtlMs });
    }

    const registry = createChannelRegistry();

    const selector = new AgentVariantSelector(overrides.backendFactory ?? createOpenAIBackend, {
        modelId: config.model,
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        maxSteps: config.maxAgentSteps,
        structuredTimeoutMs: config.structuredTimeoutMs,
    });

    const coordinator = new QueryCoordinator(source, selector, registry, {
        pushSendTimeoutMs: config.pushSendTimeoutMs,
        verbose: config.verbose,
    });

    return { config, source, registry, selector, coordinator };
}
