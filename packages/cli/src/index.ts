#!/usr/bin/env tsx
import { Command } from 'commander';
import { displayError } from './display.js';
import { registerCheckUrlCommand } from './commands/check-url.js';
import { registerServeCommand } from './commands/serve.js';
import { registerSnapshotCommand } from './commands/snapshot.js';

const program = new Command();

program
	.name('tagsight')
	.description('Vision-grounded browser control for agents, with SSRF-safe navigation')
	.version('0.1.0');

registerServeCommand(program);
registerCheckUrlCommand(program);
registerSnapshotCommand(program);

program.parseAsync().catch((error: unknown) => {
	displayError(error instanceof Error ? error.message : String(error));
	process.exitCode = 1;
});
