#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline';
import boxen from 'boxen';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { createContainer, ServerContainer } from './container.js';
import { parseCliArgs, CliArgs } from './cliArgs.js';
import { tableShape } from './dataset/table.js';
import { SERVER_VERSION } from './server.js';
import type { DeliveryMode } from './types/index.js';
import { ChatException, STRATEGY_TAGS } from './types/index.js';

const HELP = `
compbot CLI v${SERVER_VERSION}

Usage:
  compbot ask <comparison-id> <question...>   Ask one question
  compbot describe <comparison-id>            Show the table's shape and labels
  compbot repl <comparison-id>                Ask questions interactively

Options:
  --strategy=<tag>   Agent strategy (${STRATEGY_TAGS.join(', ').toLowerCase()}); default tabular
  --model=<id>       Model to use instead of OPENAI_MODEL
  --stream           Print thoughts as they arrive (pull)
  --push             Print thoughts through a console push channel
  --help, -h         Show this help
  --version, -v      Show version

Examples:
  compbot ask R1234 "Which dataset is used most often?"
  compbot ask --strategy=structured --stream R1234 What is the earliest publication year?
  compbot repl R1234
`;

const FrameSchema = z.object({
    kind: z.enum(['thought', 'answer']),
    text: z.string(),
});

const CONSOLE_CHANNEL = 'console';

interface AskOptions {
    strategy: string;
    model?: string;
    delivery: DeliveryMode;
}

function printError(error: unknown): void {
    if (error instanceof ChatException) {
        console.error(chalk.red(`✗ ${error.code}: ${error.message}`));
        if (error.error.suggestion) {
            console.error(chalk.yellow(`  ${error.error.suggestion}`));
        }
        return;
    }
    console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
}

function printThought(text: string): void {
    console.log(chalk.dim(text));
    console.log();
}

function printAnswer(answer: string): void {
    console.log(boxen(answer, { padding: 1, borderColor: 'green', borderStyle: 'round' }));
}

async function ask(
    container: ServerContainer,
    comparisonId: string,
    question: string,
    options: AskOptions
): Promise<void> {
    const request = { comparisonId, question, strategy: options.strategy, model: options.model };

    switch (options.delivery) {
        case 'NONE': {
            const spinner = ora(`Reasoning over ${comparisonId} (${options.strategy.toLowerCase()})...`).start();
            try {
                const answer = await container.coordinator.execute(request, { mode: 'NONE' });
                spinner.succeed('Done');
                printAnswer(answer);
            } catch (error) {
                spinner.fail('Failed');
                throw error;
            }
            return;
        }
        case 'PULL': {
            const events = await container.coordinator.execute(request, { mode: 'PULL' });
            for await (const event of events) {
                if (event.kind === 'thought') {
                    printThought(event.text);
                } else {
                    printAnswer(event.text);
                }
            }
            return;
        }
        case 'PUSH': {
            const { registry } = container;
            if (!registry.has(CONSOLE_CHANNEL)) {
                registry.open(payload => {
                    const frame = FrameSchema.parse(JSON.parse(payload));
                    if (frame.kind === 'thought') {
                        printThought(frame.text);
                    }
                }, CONSOLE_CHANNEL);
            }
            const answer = await container.coordinator.execute(request, {
                mode: 'PUSH',
                channelId: CONSOLE_CHANNEL,
            });
            printAnswer(answer);
            return;
        }
    }
}

async function describe(container: ServerContainer, comparisonId: string): Promise<void> {
    const spinner = ora(`Fetching ${comparisonId}...`).start();
    const table = await container.source.fetch(comparisonId).finally(() => spinner.stop());
    const shape = tableShape(table);

    console.log(chalk.bold(`Comparison ${table.id}`));
    console.log(`${shape.rows} properties × ${shape.columns} contributions, ` +
        `${shape.filledCells} filled cells (${shape.multiValuedCells} multi-valued)`);
    console.log(chalk.bold('\nProperties:'));
    table.properties.forEach((p, i) => console.log(`  ${i + 1}. ${p}`));
    console.log(chalk.bold('\nContributions:'));
    table.items.forEach((item, i) => console.log(`  ${i + 1}. ${item}`));
}

function runRepl(container: ServerContainer, comparisonId: string, initial: AskOptions): Promise<void> {
    const options: AskOptions = { ...initial };

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: chalk.green(`compbot[${comparisonId}]> `),
    });

    console.log(chalk.bold.blue(`compbot REPL v${SERVER_VERSION}`));
    console.log(chalk.gray(`Comparison ${comparisonId}, model ${options.model ?? container.selector.defaultModel}`));
    console.log(chalk.gray('Type a question, or .help for commands.\n'));

    const handleLine = async (trimmed: string): Promise<void> => {
        if (trimmed === '.help') {
            console.log('Commands:');
            console.log('  <question>             Ask about the comparison');
            console.log('  .strategy <tag>        Switch strategy (tabular, structured)');
            console.log('  .model <id>            Switch model');
            console.log('  .mode <none|pull|push> Switch delivery mode');
            console.log('  .describe              Show the table\'s shape and labels');
            console.log('  .quit, .exit, .q       Exit REPL');
        } else if (trimmed.startsWith('.strategy ')) {
            options.strategy = trimmed.slice(10).trim();
            console.log(chalk.gray(`Strategy: ${options.strategy}`));
        } else if (trimmed.startsWith('.model ')) {
            options.model = trimmed.slice(7).trim();
            console.log(chalk.gray(`Model: ${options.model}`));
        } else if (trimmed.startsWith('.mode ')) {
            const mode = trimmed.slice(6).trim().toUpperCase();
            if (mode === 'NONE' || mode === 'PULL' || mode === 'PUSH') {
                options.delivery = mode;
                console.log(chalk.gray(`Delivery: ${mode.toLowerCase()}`));
            } else {
                console.log(chalk.yellow('Delivery mode must be none, pull or push'));
            }
        } else if (trimmed === '.describe') {
            await describe(container, comparisonId);
        } else if (trimmed.startsWith('.')) {
            console.log(chalk.yellow('Unknown command. Use .help for the list.'));
        } else if (trimmed) {
            await ask(container, comparisonId, trimmed, options);
        }
    };

    return new Promise(resolve => {
        rl.prompt();
        rl.on('line', line => {
            const trimmed = line.trim();
            if (trimmed === '.quit' || trimmed === '.exit' || trimmed === '.q') {
                rl.close();
                return;
            }
            rl.pause();
            handleLine(trimmed)
                .catch(printError)
                .finally(() => {
                    rl.resume();
                    rl.prompt();
                });
        });
        rl.on('close', () => resolve());
    });
}

async function main(args: CliArgs): Promise<void> {
    if (args.help || !args.command) {
        console.log(HELP);
        return;
    }

    if (args.version) {
        console.log(SERVER_VERSION);
        return;
    }

    const [comparisonId, ...rest] = args.positional;
    if (!comparisonId) {
        throw new Error('comparison ID argument required');
    }

    const container = createContainer();
    const options: AskOptions = { strategy: args.strategy, model: args.model, delivery: args.delivery };

    try {
        switch (args.command) {
            case 'ask': {
                const question = rest.join(' ').trim();
                if (!question) {
                    throw new Error('question argument required');
                }
                await ask(container, comparisonId, question, options);
                break;
            }
            case 'describe':
                await describe(container, comparisonId);
                break;
            case 'repl':
                await runRepl(container, comparisonId, options);
                break;
            default:
                console.log(HELP);
                throw new Error(`Unknown command: ${args.command}`);
        }
    } finally {
        container.registry.closeAll();
    }
}

Promise.resolve()
    .then(() => main(parseCliArgs(process.argv.slice(2))))
    .catch(error => {
        printError(error);
        process.exitCode = 1;
    });
