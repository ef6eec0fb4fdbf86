import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { z } from 'zod';
import { BrowserController, Config, type MarkMode, MarkModeSchema, type OperationResult, userId } from '@tagsight/core';
import { displayError, formatMarksTable, type MarkRow, Spinner } from '../display.js';

const MarkRowsSchema = z.array(
	z.object({
		id: z.number(),
		tag: z.string(),
		text: z.string(),
		capability: z.string(),
	}),
);

interface SnapshotOptions {
	output: string;
	width?: string;
	height?: string;
	mode?: string;
}

export function marksFromResult(result: OperationResult): MarkRow[] {
	const parsed = MarkRowsSchema.safeParse(result.data?.elements);
	return parsed.success ? parsed.data : [];
}

function parseMode(value: string | undefined): MarkMode | undefined {
	if (value === undefined) return undefined;
	const parsed = MarkModeSchema.safeParse(value);
	if (!parsed.success) {
		throw new Error(`Unknown mark mode "${value}"; use one of ${MarkModeSchema.options.join(', ')}`);
	}
	return parsed.data;
}

export function registerSnapshotCommand(program: Command): void {
	program
		.command('snapshot')
		.description('Open a URL once, save the tagged screenshot and list the marked elements')
		.argument('<url>', 'URL to open')
		.option('-o, --output <file>', 'Where to write the PNG', 'snapshot.png')
		.option('--width <px>', 'Viewport width in CSS pixels')
		.option('--height <px>', 'Viewport height in CSS pixels')
		.option('--mode <mode>', 'Marking mode: minimal, balanced or all')
		.action(async (url: string, options: SnapshotOptions) => {
			const config = Config.load({
				overrides: {
					viewport: {
						width: options.width ? Number(options.width) : undefined,
						height: options.height ? Number(options.height) : undefined,
					},
					marking: { mode: parseMode(options.mode) },
				},
			});
			const controller = BrowserController.create(config);
			const spinner = new Spinner(`Opening ${url}`);

			try {
				spinner.start();
				const result = await controller.navigate(userId('cli'), url);
				spinner.stop();

				if (!result.ok || !result.image) {
					displayError(result.message);
					process.exitCode = 1;
					return;
				}

				const outputPath = path.resolve(options.output);
				fs.writeFileSync(outputPath, result.image);

				console.log(result.message);
				console.log(chalk.green('Screenshot saved:'), outputPath);
				console.log('');
				console.log(formatMarksTable(marksFromResult(result)));
			} finally {
				spinner.stop();
				await controller.shutdown();
			}
		});
}
