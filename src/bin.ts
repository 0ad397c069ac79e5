#!/usr/bin/env node
import { runCli } from './cli.js';

try {
    process.exitCode = await runCli(process.argv.slice(2));
} catch (err: unknown) {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
}
