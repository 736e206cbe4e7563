#!/usr/bin/env node
import { closeDatabase, initDatabase } from './db';
import { validateCriticalConfig } from './config';
import { runServeCommand } from './cli/commands/serveCommand';
import { runFiltersCommand, runPurgeSessionsCommand, runWaitCommand } from './cli/commands/utilCommands';

function printHelp(): void {
    console.log('Usage: outreach-orchestrator <command> [options]');
    console.log('Commands:');
    console.log('  serve [--port <n>]                          start the HTTP API and the task runner');
    console.log('  wait <task_id> [--timeout <sec>]            block until the task reaches a terminal state');
    console.log('  wait --session <session_id> [--timeout <sec>]  block until the search session is ready');
    console.log('  filters                                     list the company filter values');
    console.log('  purge-sessions                              delete expired sessions');
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const command = args[0];
    const commandArgs = args.slice(1);

    if (!command || command === 'help' || command === '--help') {
        printHelp();
        return;
    }

    const configErrors = validateCriticalConfig();
    if (configErrors.length > 0) {
        throw new Error(`invalid configuration:\n- ${configErrors.join('\n- ')}`);
    }
    await initDatabase();

    switch (command) {
        case 'serve':
            await runServeCommand(commandArgs);
            break;
        case 'wait':
            await runWaitCommand(commandArgs);
            break;
        case 'filters':
            await runFiltersCommand();
            break;
        case 'purge-sessions':
            await runPurgeSessionsCommand();
            break;
        default:
            printHelp();
            process.exitCode = 1;
            break;
    }
}

main()
    .catch((error) => {
        console.error('[FATAL]', error instanceof Error ? error.message : error);
        process.exitCode = 1;
    })
    .finally(async () => {
        await closeDatabase();
    });
