/**
 * Prompt templates.
 *
 * The instruction wrapper is prepended to every question before it reaches a
 * reasoning session. The variant system prompts describe how each strategy
 * sees the table. The MCP prompts expose the wrapper to clients.
 */

import type { RenderedTable } from '../dataset/table.js';

export const APOLOGY = 'Sorry!, I do not know.';

export const INSTRUCTIONS = `This is a table of data extracted from the ORKG that represents a comparison of several research papers.
The rows are properties of the papers, and the columns are the papers (contributions) themselves.

The questions will need you to look into the values, sometimes across multiple columns.
The cells could contain multiple values and not just a single value.

If there is a date in there you might need to parse it to find answers about the year or the month.

If you do not know the answer, reply as follows:
"${APOLOGY}"

Return all output as a string.

Lets think step by step.

Below is the query.
Query:
`;

/**
 * A question with the instruction wrapper applied. Only renderPrompt builds these.
 */
export interface RenderedPrompt {
    readonly query: string;
    readonly text: string;
}

export function renderPrompt(query: string): RenderedPrompt {
    return Object.freeze({ query, text: INSTRUCTIONS + query });
}

export function tabularSystemPrompt(rendered: RenderedTable): string {
    const coverage = rendered.rowsShown === rendered.totalRows
        ? `The full table (${rendered.totalRows} rows) is:`
        : `The first ${rendered.rowsShown} of ${rendered.totalRows} rows are shown below; use get_cells to read the others:`;
    return `You are working with a comparison table of research contributions.
Each row is a property and each column is a compared contribution.
Use describe_table for exact labels and get_cells to look up specific cells.
Answer with a single string once you have what you need.

${coverage}
${rendered.text}`;
}

export const STRUCTURED_SYSTEM_PROMPT = `You are an agent designed to interact with a JSON document describing a comparison of research contributions.
The top-level keys are the compared contributions; under each, the keys are the properties of that contribution.
Always begin by calling json_list_keys with the path [] to see the top-level keys.
Only use keys you have already seen in a json_list_keys result; do not guess keys.
If json_get_value says a value is a large dictionary, list its keys instead.
Do not make up any information that is not contained in the document.
Answer with a single string once you have what you need.`;

// ==================== MCP PROMPTS ====================

/**
 * Prompt argument definition
 */
export interface PromptArgument {
    name: string;
    description: string;
    required: boolean;
}

/**
 * Prompt definition
 */
export interface Prompt {
    name: string;
    description: string;
    arguments: PromptArgument[];
}

/**
 * Prompt message (for GetPrompt response)
 */
export interface PromptMessage {
    role: 'user' | 'assistant';
    content: {
        type: 'text';
        text: string;
    };
}

/**
 * GetPrompt response
 */
export interface GetPromptResult {
    description: string;
    messages: PromptMessage[];
}

export const PROMPTS: Prompt[] = [
    {
        name: 'ask-comparison',
        description: 'Wrap a question about an ORKG comparison in the instructions the comparison agents use',
        arguments: [
            { name: 'question', description: 'The question to ask', required: true },
            { name: 'comparison_id', description: 'Comparison the question is about', required: false },
        ],
    },
    {
        name: 'compare-contributions',
        description: 'Ask how the contributions of a comparison differ on one property',
        arguments: [
            { name: 'property', description: 'Property (row label) to compare on', required: true },
        ],
    },
];

export function listPrompts(): Prompt[] {
    return PROMPTS;
}

/**
 * Get a prompt by name with arguments filled in; null for unknown names
 * or missing required arguments.
 */
export function getPrompt(name: string, args: Record<string, string>): GetPromptResult | null {
    switch (name) {
        case 'ask-comparison': {
            if (!args.question) return null;
            const prefix = args.comparison_id ? `[Comparison ${args.comparison_id}]\n` : '';
            return {
                description: 'Comparison question',
                messages: [
                    { role: 'user', content: { type: 'text', text: prefix + renderPrompt(args.question).text } },
                ],
            };
        }
        case 'compare-contributions': {
            if (!args.property) return null;
            const question = `How do the contributions differ in "${args.property}"? List each contribution with its value.`;
            return {
                description: 'Property comparison',
                messages: [
                    { role: 'user', content: { type: 'text', text: renderPrompt(question).text } },
                ],
            };
        }
        default:
            return null;
    }
}
