/**
 * Tests for the AI SDK backend (mock language model, no network)
 */

import { simulateReadableStream } from 'ai';
import type { LanguageModel } from 'ai';
import { createTabularTools } from '../src/agent/tools.js';
import { AiSdkBackend, createOpenAIBackend, describeStep } from '../src/llm/provider.js';
import { sampleTable } from './fixtures.js';

const RAW_CALL = { rawPrompt: null, rawSettings: {} };
const USAGE = { promptTokens: 10, completionTokens: 5 };

type GenerateFn = LanguageModel['doGenerate'];
type StreamFn = LanguageModel['doStream'];
type StreamPart = Awaited<ReturnType<StreamFn>>['stream'] extends ReadableStream<infer P> ? P : never;

const unscripted = async (): Promise<never> => {
    throw new Error('not scripted');
};

/**
 * Language model that answers from the given functions and never touches the network.
 */
class ScriptedModel implements LanguageModel {
    readonly specificationVersion = 'v1';
    readonly provider = 'scripted';
    readonly modelId = 'scripted-model';
    readonly defaultObjectGenerationMode = undefined;

    constructor(
        private readonly generate: GenerateFn = unscripted,
        private readonly stream: StreamFn = unscripted
    ) { }

    doGenerate(options: Parameters<GenerateFn>[0]): ReturnType<GenerateFn> {
        return this.generate(options);
    }

    doStream(options: Parameters<StreamFn>[0]): ReturnType<StreamFn> {
        return this.stream(options);
    }
}

function request(onStep?: (thought: string) => Promise<void>) {
    return {
        system: 'system',
        prompt: 'question',
        tools: createTabularTools(sampleTable(), 1000),
        maxSteps: 3,
        onStep,
    };
}

describe('describeStep', () => {
    test('renders reasoning, actions and shortened observations', () => {
        const thought = describeStep({
            text: ' looking at years ',
            toolCalls: [{ toolName: 'get_cells', args: { properties: ['Year'] } }],
            toolResults: [{ toolName: 'get_cells', result: 'x'.repeat(600) }],
        });

        expect(thought).toBe([
            'Thought: looking at years',
            'Action: get_cells {"properties":["Year"]}',
            `Observation: ${'x'.repeat(500)}...`,
        ].join('\n'));
    });

    test('omits the thought line when the model said nothing', () => {
        expect(describeStep({
            text: '',
            toolCalls: [{ toolName: 'describe_table', args: {} }],
            toolResults: [{ toolName: 'describe_table', result: 'ok' }],
        })).toBe('Action: describe_table {}\nObservation: ok');
    });
});

describe('AiSdkBackend', () => {
    test('runs the tool loop and reports each tool-calling step', async () => {
        let calls = 0;
        const model = new ScriptedModel(async () => {
            calls++;
            if (calls === 1) {
                return {
                    rawCall: RAW_CALL,
                    finishReason: 'tool-calls',
                    usage: USAGE,
                    text: '',
                    toolCalls: [{
                        toolCallType: 'function',
                        toolCallId: 'call-1',
                        toolName: 'get_cells',
                        args: '{"properties":["Accuracy"]}',
                    }],
                };
            }
            return { rawCall: RAW_CALL, finishReason: 'stop', usage: USAGE, text: 'Paper A' };
        });
        const thoughts: string[] = [];
        const backend = new AiSdkBackend(model, { modelId: 'mock', streaming: false });

        const answer = await backend.run(request(async thought => { thoughts.push(thought); }));

        expect(answer).toBe('Paper A');
        expect(calls).toBe(2);
        expect(thoughts).toHaveLength(1);
        expect(thoughts[0].split('\n')[0]).toBe('Action: get_cells {"properties":["Accuracy"]}');
        expect(thoughts[0]).toContain('| Accuracy | 0.91 |  |');
    });

    test('fails when the model gives no answer', async () => {
        const model = new ScriptedModel(
            async () => ({ rawCall: RAW_CALL, finishReason: 'length', usage: USAGE, text: '' })
        );
        const backend = new AiSdkBackend(model, { modelId: 'mock', streaming: false });

        await expect(backend.run(request())).rejects.toThrow('model returned no answer (finish reason: length)');
    });

    test('passes model errors through', async () => {
        const model = new ScriptedModel(async () => {
            throw new Error('rate limited');
        });
        const backend = new AiSdkBackend(model, { modelId: 'mock', streaming: false });

        await expect(backend.run(request())).rejects.toThrow('rate limited');
    });

    test('streams the answer text', async () => {
        const model = new ScriptedModel(unscripted, async () => ({
            rawCall: RAW_CALL,
            stream: simulateReadableStream<StreamPart>({
                chunks: [
                    { type: 'text-delta', textDelta: 'Paper ' },
                    { type: 'text-delta', textDelta: 'A' },
                    { type: 'finish', finishReason: 'stop', usage: USAGE },
                ],
            }),
        }));
        const backend = new AiSdkBackend(model, { modelId: 'mock', streaming: true });

        await expect(backend.run(request())).resolves.toBe('Paper A');
    });
});

describe('createOpenAIBackend', () => {
    test('builds a backend without contacting the API', () => {
        const backend = createOpenAIBackend({ modelId: 'gpt-4', streaming: true, apiKey: 'test-secret' });

        expect(backend.modelId).toBe('gpt-4');
        expect(backend.streaming).toBe(true);
    });
});
