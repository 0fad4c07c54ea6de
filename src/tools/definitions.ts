import { Tool } from '@modelcontextprotocol/sdk/types.js';

const comparisonIdSchema = {
    type: 'string',
    description: "ORKG comparison ID, e.g. 'R1234'",
};

const questionSchema = {
    type: 'string',
    description: 'Natural-language question about the comparison table',
};

const strategySchema = {
    type: 'string',
    enum: ['TABULAR', 'STRUCTURED'],
    description: "Agent strategy: 'TABULAR' (table embedded in the prompt, default) or 'STRUCTURED' (agent explores the table as a JSON document, time-bounded). Case-insensitive.",
};

const modelSchema = {
    type: 'string',
    description: 'Model ID for this query. Defaults to OPENAI_MODEL.',
};

export const TOOLS: Tool[] = [
    // ==================== QUERY TOOLS ====================
    {
        name: 'query-comparison',
        description: `Answer a question about an ORKG comparison and return only the answer.

**When to use:** You need the answer and not the agent's intermediate reasoning.
**When NOT to use:** You want to watch the reasoning (use stream-comparison).

**Example:**
  comparison_id: "R1234"
  question: "Which paper reports the highest accuracy?"
  → Returns: { answer: "..." }

**Common issues:**
- "Sorry!, I do not know." means the table does not hold the answer
- DATASET_UNAVAILABLE means the ID is wrong or the comparison is empty`,
        inputSchema: {
            type: 'object',
            properties: {
                comparison_id: comparisonIdSchema,
                question: questionSchema,
                strategy: strategySchema,
                model: modelSchema,
            },
            required: ['comparison_id', 'question'],
        },
    },
    {
        name: 'stream-comparison',
        description: `Answer a question and return the answer together with every intermediate thought.

Thoughts are also sent as progress notifications while the agent works, when the request carries a progress token.`,
        inputSchema: {
            type: 'object',
            properties: {
                comparison_id: comparisonIdSchema,
                question: questionSchema,
                strategy: strategySchema,
                model: modelSchema,
            },
            required: ['comparison_id', 'question'],
        },
    },
    {
        name: 'push-comparison',
        description: `Answer a question, sending each thought and the answer to an open channel as they happen.

**Workflow:**
1. open-channel → get channel_id
2. push-comparison with that channel_id; frames arrive as log notifications
3. close-channel when done

The answer is returned even if the channel stops accepting frames.`,
        inputSchema: {
            type: 'object',
            properties: {
                comparison_id: comparisonIdSchema,
                question: questionSchema,
                channel_id: {
                    type: 'string',
                    description: 'Channel ID from open-channel',
                },
                strategy: strategySchema,
                model: modelSchema,
            },
            required: ['comparison_id', 'question', 'channel_id'],
        },
    },
    {
        name: 'describe-comparison',
        description: `Fetch a comparison and report its shape and labels without asking anything.

**When to use:** Check that a comparison exists and see which properties it covers before asking.`,
        inputSchema: {
            type: 'object',
            properties: {
                comparison_id: comparisonIdSchema,
            },
            required: ['comparison_id'],
        },
    },

    // ==================== CHANNEL TOOLS ====================
    {
        name: 'open-channel',
        description: 'Open a push channel. Frames sent to it reach this client as notifications/message with logger "channel/<id>".',
        inputSchema: {
            type: 'object',
            properties: {
                channel_id: {
                    type: 'string',
                    description: 'Channel ID to use. A random one is generated when omitted.',
                },
            },
        },
    },
    {
        name: 'close-channel',
        description: 'Close a push channel. Queries still pushing to it stop delivering thoughts but keep running.',
        inputSchema: {
            type: 'object',
            properties: {
                channel_id: {
                    type: 'string',
                    description: 'Channel ID to close',
                },
            },
            required: ['channel_id'],
        },
    },
    {
        name: 'list-channels',
        description: 'List open push channels.',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },
];
