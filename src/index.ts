#!/usr/bin/env node
import 'dotenv/config';
import { handleHelpCli, runCli } from './core/cli.js';

const argv = process.argv.slice(2);

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

try {
    process.exitCode = await runCli(argv);
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[relay-send] Run aborted: ${message}`);
    process.exitCode = 1;
}
