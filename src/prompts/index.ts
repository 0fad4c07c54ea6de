/**
 * Prompts Module
 *
 * Exports the instruction wrapper and the MCP prompt handlers.
 */

export {
    APOLOGY,
    INSTRUCTIONS,
    PROMPTS,
    STRUCTURED_SYSTEM_PROMPT,
    listPrompts,
    getPrompt,
    renderPrompt,
    tabularSystemPrompt,
} from './templates.js';

export type {
    Prompt,
    PromptArgument,
    PromptMessage,
    GetPromptResult,
    RenderedPrompt,
} from './templates.js';
