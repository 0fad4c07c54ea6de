/**
 * Comparison Query Server
 *
 * MCP server answering natural-language questions about ORKG comparisons.
 * Includes: query-comparison, stream-comparison, push-comparison,
 * describe-comparison, and push channel management tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
    ListPromptsRequestSchema,
    GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { listResources, getResourceContent } from './resources/index.js';
import { listPrompts, getPrompt } from './prompts/index.js';

import {
    ChatException,
    createGenericError,
    serializeChatError,
} from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, ServerContainer } from './container.js';
import type { FrameWriter } from './transport/channel.js';

export const SERVER_NAME = 'compbot';
export const SERVER_VERSION = '0.3.0';

interface ToolContext {
    container: ServerContainer;
    onProgress?: (progress: number, message: string) => void;
    channelWriter: (channelId: string) => FrameWriter;
}

type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<object> | object;

const toolHandlers: Record<string, ToolHandler> = {
    // ==================== QUERY TOOLS ====================
    'query-comparison': (args, { container }) =>
        Handlers.queryComparisonHandler(args, container.coordinator),

    'stream-comparison': (args, { container, onProgress }) =>
        Handlers.streamComparisonHandler(args, container.coordinator,
            onProgress && ((thought, index) => onProgress(index, thought))),

    'push-comparison': (args, { container }) =>
        Handlers.pushComparisonHandler(args, container.coordinator),

    'describe-comparison': (args, { container }) =>
        Handlers.describeComparisonHandler(args, container.source),

    // ==================== CHANNEL TOOLS ====================
    'open-channel': (args, { container, channelWriter }) =>
        Handlers.openChannelHandler(args, container.registry, channelWriter),

    'close-channel': (args, { container }) =>
        Handlers.closeChannelHandler(args, container.registry),

    'list-channels': (_args, { container }) =>
        Handlers.listChannelsHandler(container.registry),
};

function reportNotificationFailure(error: unknown): void {
    console.error('Failed to send notification:', error instanceof Error ? error.message : error);
}

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
                prompts: {},
                logging: {},
            },
        }
    );

    // Push channels deliver each frame as a log message from logger "channel/<id>"
    const channelWriter = (channelId: string): FrameWriter => payload =>
        server.notification({
            method: 'notifications/message',
            params: {
                level: 'info',
                logger: `channel/${channelId}`,
                data: payload,
            },
        });

    // Handle list_tools request
    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    // ==================== MCP RESOURCES HANDLERS ====================

    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        return {
            resources: listResources().map(r => ({
                uri: r.uri,
                name: r.name,
                description: r.description,
                mimeType: r.mimeType,
            })),
        };
    });

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        const { uri } = request.params;
        const content = getResourceContent(uri);

        if (content === null) {
            throw createGenericError('INVALID_ARGUMENT', `Resource not found: ${uri}`);
        }

        const resource = listResources().find(r => r.uri === uri);
        return {
            contents: [
                {
                    uri,
                    mimeType: resource?.mimeType ?? 'text/plain',
                    text: content,
                },
            ],
        };
    });

    // ==================== MCP PROMPTS HANDLERS ====================

    server.setRequestHandler(ListPromptsRequestSchema, async () => {
        return {
            prompts: listPrompts().map(p => ({
                name: p.name,
                description: p.description,
                arguments: p.arguments,
            })),
        };
    });

    server.setRequestHandler(GetPromptRequestSchema, async (request) => {
        const { name, arguments: promptArgs } = request.params;
        const result = getPrompt(name, promptArgs ?? {});

        if (result === null) {
            throw createGenericError('INVALID_ARGUMENT', `Prompt not found or missing arguments: ${name}`);
        }

        return {
            description: result.description,
            messages: result.messages,
        };
    });

    // Handle call_tool request
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: rawArgs } = request.params;
        const args = rawArgs ?? {};

        try {
            const handler = toolHandlers[name];
            if (!handler) {
                throw createGenericError('INVALID_ARGUMENT', `Unknown tool: ${name}`);
            }

            const progressToken = request.params._meta?.progressToken;
            const onProgress = progressToken !== undefined ? (progress: number, message: string) => {
                server.notification({
                    method: 'notifications/progress',
                    params: {
                        progressToken,
                        progress,
                        message,
                    },
                }).catch(reportNotificationFailure);
            } : undefined;

            const result = await handler(args, { container, onProgress, channelWriter });

            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(result, null, 2),
                    },
                ],
            };
        } catch (error) {
            if (error instanceof ChatException) {
                return {
                    content: [
                        {
                            type: 'text',
                            text: JSON.stringify(serializeChatError(error.error), null, 2),
                        },
                    ],
                    isError: true,
                };
            }

            const errorMessage = error instanceof Error ? error.message : String(error);
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify({
                            error: errorMessage,
                            type: error instanceof Error ? error.constructor.name : 'Error',
                        }),
                    },
                ],
                isError: true,
            };
        }
    });

    server.onclose = () => container.registry.closeAll();

    return server;
}

/**
 * Run the MCP server
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`${SERVER_NAME} ${SERVER_VERSION} listening on stdio`);
}
