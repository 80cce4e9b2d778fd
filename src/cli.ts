#!/usr/bin/env node
import 'reflect-metadata';
import { runAnalyzeCommand } from './presentation/cli/AnalyzeCommand';
import { runReplayCommand } from './presentation/cli/ReplayCommand';
import { Logger, parseLogLevel } from './shared/logger/Logger';
import { ParityPolicies } from './config/indicator.config';

const USAGE = [
    'Usage:',
    '  demark analyze <bars.json> [--parity]',
    '  demark replay <bars.json> <entryIndex> [entryPrice] [--parity]',
    '',
    '  --parity  count Countdown from the Setup-9 bar itself'
].join('\n');

async function main() {
    const logger = Logger.getInstance();
    logger.setLogLevel(parseLogLevel(process.env.LOG_LEVEL));

    const argv = process.argv.slice(2);
    const overrides = argv.includes('--parity') ? { policies: ParityPolicies } : undefined;
    const args = argv.filter(arg => arg !== '--parity');
    const [mode, file] = args;

    if (!mode || !file) {
        console.log(USAGE);
        process.exitCode = 1;
        return;
    }

    try {
        if (mode === 'analyze') {
            await runAnalyzeCommand({ file, overrides });
        } else if (mode === 'replay') {
            const entryIndex = parseInt(args[2], 10);
            const entryPrice = args[3] !== undefined ? parseFloat(args[3]) : undefined;
            if (Number.isNaN(entryIndex) || (entryPrice !== undefined && Number.isNaN(entryPrice))) {
                console.log(USAGE);
                process.exitCode = 1;
                return;
            }
            await runReplayCommand({ file, entryIndex, entryPrice, overrides });
        } else {
            console.log(USAGE);
            process.exitCode = 1;
        }
    } catch (error) {
        logger.error('Command failed', error);
        process.exit(1);
    }
}

main().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
});
