/**
 * MCP Resources
 *
 * Browsable descriptions of the agent strategies and the instruction wrapper.
 */

import { INSTRUCTIONS } from '../prompts/index.js';
import { STRATEGY_TAGS } from '../types/index.js';

/**
 * Resource definition
 */
export interface Resource {
    uri: string;
    name: string;
    description: string;
    mimeType: string;
}

export const RESOURCES: Resource[] = [
    {
        uri: 'compbot://strategies',
        name: 'Agent Strategies',
        description: 'Strategy tags accepted by the query tools and how each one reads the table',
        mimeType: 'application/json',
    },
    {
        uri: 'compbot://prompts/instructions',
        name: 'Question Instructions',
        description: 'Fixed text every question is wrapped in before it reaches the agent',
        mimeType: 'text/plain',
    },
];

const STRATEGY_NOTES: Record<typeof STRATEGY_TAGS[number], { reads: string; bounded: boolean }> = {
    TABULAR: {
        reads: 'Table rendered into the prompt, with describe_table and get_cells tools for rows that did not fit',
        bounded: false,
    },
    STRUCTURED: {
        reads: 'Table exposed as a JSON document explored with json_list_keys and json_get_value',
        bounded: true,
    },
};

function getStrategyInfo(): string {
    const strategies = STRATEGY_TAGS.map(tag => ({ tag, ...STRATEGY_NOTES[tag] }));
    return JSON.stringify({ strategies }, null, 2);
}

export function listResources(): Resource[] {
    return RESOURCES;
}

/**
 * Resource body by URI; null when unknown
 */
export function getResourceContent(uri: string): string | null {
    switch (uri) {
        case 'compbot://strategies':
            return getStrategyInfo();
        case 'compbot://prompts/instructions':
            return INSTRUCTIONS;
        default:
            return null;
    }
}
