import { createOpenAI } from '@ai-sdk/openai';
import { generateText, streamText } from 'ai';
import type { LanguageModel } from 'ai';
import type {
    BackendFactory,
    BackendOptions,
    ReasoningBackend,
    ReasoningRequest,
} from '../types/llm.js';

const OBSERVATION_PREVIEW_CHARS = 500;

/**
 * The parts of an agent step that end up in a thought.
 */
export interface StepSummary {
    text: string;
    toolCalls: Array<{ toolName: string; args: unknown }>;
    toolResults: Array<{ toolName: string; result: unknown }>;
}

function preview(value: unknown): string {
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    return text.length > OBSERVATION_PREVIEW_CHARS
        ? `${text.slice(0, OBSERVATION_PREVIEW_CHARS)}...`
        : text;
}

/**
 * Render one tool-calling step as a thought: the model's reasoning text, then
 * one Action/Observation pair per tool call.
 */
export function describeStep(step: StepSummary): string {
    const lines: string[] = [];
    const reasoning = step.text.trim();
    if (reasoning) {
        lines.push(`Thought: ${reasoning}`);
    }
    step.toolCalls.forEach((call, index) => {
        lines.push(`Action: ${call.toolName} ${JSON.stringify(call.args)}`);
        const result = step.toolResults[index];
        if (result) {
            lines.push(`Observation: ${preview(result.result)}`);
        }
    });
    return lines.join('\n');
}

function finalAnswer(text: string, finishReason: string, maxSteps: number): string {
    if (text.trim()) {
        return text;
    }
    if (finishReason === 'tool-calls') {
        throw new Error(`agent stopped after ${maxSteps} steps without a final answer`);
    }
    throw new Error(`model returned no answer (finish reason: ${finishReason})`);
}

/**
 * Reasoning backend on the Vercel AI SDK: a tool-calling agent loop where every
 * tool-calling step is reported through onStep and the last text is the answer.
 */
export class AiSdkBackend implements ReasoningBackend {
    readonly modelId: string;
    readonly streaming: boolean;

    constructor(
        private readonly model: LanguageModel,
        options: { modelId: string; streaming: boolean }
    ) {
        this.modelId = options.modelId;
        this.streaming = options.streaming;
    }

    async run(request: ReasoningRequest): Promise<string> {
        return this.streaming ? this.runStreamed(request) : this.runGenerated(request);
    }

    private async onStepFinish(request: ReasoningRequest, step: StepSummary): Promise<void> {
        if (request.onStep && step.toolCalls.length > 0) {
            await request.onStep(describeStep(step));
        }
    }

    private async runGenerated(request: ReasoningRequest): Promise<string> {
        const result = await generateText({
            model: this.model,
            system: request.system,
            prompt: request.prompt,
            tools: request.tools,
            maxSteps: request.maxSteps,
            abortSignal: request.abortSignal,
            onStepFinish: step => this.onStepFinish(request, step),
        });
        return finalAnswer(result.text, result.finishReason, request.maxSteps);
    }

    private async runStreamed(request: ReasoningRequest): Promise<string> {
        const result = streamText({
            model: this.model,
            system: request.system,
            prompt: request.prompt,
            tools: request.tools,
            maxSteps: request.maxSteps,
            abortSignal: request.abortSignal,
            onStepFinish: step => this.onStepFinish(request, step),
        });

        for await (const part of result.fullStream) {
            if (part.type === 'error') {
                throw part.error instanceof Error ? part.error : new Error(String(part.error));
            }
        }
        return finalAnswer(await result.text, await result.finishReason, request.maxSteps);
    }
}

/**
 * OpenAI (or any OpenAI-compatible endpoint) through @ai-sdk/openai.
 */
export const createOpenAIBackend: BackendFactory = (options: BackendOptions) => {
    const openai = createOpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
    });
    return new AiSdkBackend(openai(options.modelId), {
        modelId: options.modelId,
        streaming: options.streaming,
    });
};
