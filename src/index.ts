#!/usr/bin/env node
import dotenv from 'dotenv';
import { handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { handleInitCli } from './core/init-cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { handleRunCli } from './core/run-cli.js';
import { handleSimulateCli } from './core/simulate-cli.js';
import { handleStatusCli } from './core/status-cli.js';
import { handleValidateCli } from './core/validate-cli.js';
import { errorMessage } from './utils/errors.js';

dotenv.config();

type CommandHandler = (argv: string[]) => Promise<boolean>;

const HANDLERS: CommandHandler[] = [
    handleValidateCli,
    handleInitCli,
    handleSimulateCli,
    handleStatusCli,
    handleLogsCli,
    handleRunCli,
];

async function main(argv: string[]): Promise<void> {
    if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
        return;
    }
    for (const handler of HANDLERS) {
        if (await handler(argv)) return;
    }
}

main(process.argv.slice(2)).catch((err) => {
    console.error(`[dirwatch] ${errorMessage(err)}`);
    process.exitCode = 1;
});
