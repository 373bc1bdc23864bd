#!/usr/bin/env node
/**
 * bin/switchboard.ts — entry point for the `switchboard` CLI command.
 */

const { program } = await import('../commands/index.js');
await program.parseAsync();
