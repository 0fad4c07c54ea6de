#!/usr/bin/env node
/**
 * compbot - Entry Point
 *
 * Starts the MCP server on stdio.
 */

import 'dotenv/config';
import { runServer, SERVER_NAME, SERVER_VERSION } from './server.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
compbot MCP server - questions about ORKG comparison tables

Usage: compbot-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Query Tools:
  - query-comparison     Answer a question, return only the answer
  - stream-comparison    Answer a question, return thoughts and answer
  - push-comparison      Answer a question, pushing thoughts to a channel
  - describe-comparison  Show the shape and labels of a comparison

Channel Tools:
  - open-channel         Open a push channel (frames arrive as log messages)
  - close-channel        Close a push channel
  - list-channels        List open channels

MCP Capabilities:
  - Resources: agent strategies, question instructions
  - Prompts: ask-comparison, compare-contributions

Environment:
  ORKG_HOST, OPENAI_API_KEY, OPENAI_BASE_URL, OPENAI_MODEL, VERBOSE,
  STRUCTURED_TIMEOUT_MS, MAX_AGENT_STEPS, PUSH_SEND_TIMEOUT_MS,
  DATASET_CACHE_TTL_SECONDS, DATASET_CACHE_MAX

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`${SERVER_NAME} version ${SERVER_VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error instanceof Error ? error.message : error);
        process.exit(1);
    }
}

void main();
