import type { DeliveryMode } from './types/index.js';
import { createGenericError } from './types/index.js';

export interface CliArgs {
    command?: string;
    /** Arguments after the command */
    positional: string[];
    strategy: string;
    model?: string;
    delivery: DeliveryMode;
    help: boolean;
    version: boolean;
}

/**
 * Split argv into command, positionals and flags. `--strategy` and `--model`
 * take `=value` or the next argument.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
    const result: CliArgs = {
        positional: [],
        strategy: 'TABULAR',
        delivery: 'NONE',
        help: false,
        version: false,
    };
    let stream = false;
    let push = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        let flag = arg;
        let inline: string | undefined;
        const eq = arg.indexOf('=');
        if (arg.startsWith('--') && eq > 0) {
            flag = arg.slice(0, eq);
            inline = arg.slice(eq + 1);
        }

        switch (flag) {
            case '--help':
            case '-h':
                result.help = true;
                break;
            case '--version':
            case '-v':
                result.version = true;
                break;
            case '--stream':
                stream = true;
                break;
            case '--push':
                push = true;
                break;
            case '--strategy':
            case '--model': {
                const value = inline ?? argv[++i];
                if (value === undefined || value === '') {
                    throw createGenericError('INVALID_ARGUMENT', `${flag} needs a value`);
                }
                if (flag === '--strategy') {
                    result.strategy = value;
                } else {
                    result.model = value;
                }
                break;
            }
            default:
                if (arg.startsWith('-')) {
                    throw createGenericError('INVALID_ARGUMENT', `Unknown option: ${arg}`);
                }
                if (result.command === undefined) {
                    result.command = arg;
                } else {
                    result.positional.push(arg);
                }
        }
    }

    if (stream && push) {
        throw createGenericError('INVALID_ARGUMENT', '--stream and --push cannot be combined');
    }
    result.delivery = stream ? 'PULL' : push ? 'PUSH' : 'NONE';
    return result;
}
