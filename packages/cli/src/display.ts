import chalk from 'chalk';
import type { ValidationVerdict } from '@tagsight/core';

// ── Spinner ──

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/** Progress indicator on stderr, so stdout stays clean for piping. */
export class Spinner {
	private intervalId: ReturnType<typeof setInterval> | null = null;
	private frameIndex = 0;
	private message: string;

	constructor(message: string) {
		this.message = message;
	}

	start(): void {
		if (this.intervalId || !process.stderr.isTTY) return;
		this.frameIndex = 0;

		this.intervalId = setInterval(() => {
			const frame = SPINNER_FRAMES[this.frameIndex % SPINNER_FRAMES.length];
			process.stderr.write(`\r${chalk.cyan(frame)} ${this.message}`);
			this.frameIndex++;
		}, 80);
	}

	update(message: string): void {
		this.message = message;
	}

	stop(): void {
		if (!this.intervalId) return;
		clearInterval(this.intervalId);
		this.intervalId = null;
		// Clear the spinner line
		process.stderr.write('\r\x1b[K');
	}
}

// ── Verdicts ──

export function formatVerdict(url: string, verdict: ValidationVerdict): string {
	const status = verdict.safe ? chalk.green('SAFE') : chalk.red('BLOCKED');
	return `${status} ${url}\n  ${chalk.dim('reason:')} ${verdict.reason}`;
}

// ── Marks table ──

export interface MarkRow {
	id: number;
	tag: string;
	text: string;
	capability: string;
}

const CAPABILITY_COLORS: Record<string, (text: string) => string> = {
	inputable: chalk.green,
	canvasLike: chalk.blue,
	clickable: chalk.red,
};

export function formatMarksTable(rows: readonly MarkRow[], textWidth = 50): string {
	if (rows.length === 0) return chalk.dim('No elements marked.');

	const idWidth = Math.max(2, ...rows.map((row) => String(row.id).length));
	const tagWidth = Math.max(3, ...rows.map((row) => row.tag.length));
	const capWidth = Math.max(10, ...rows.map((row) => row.capability.length));

	const header = `${'ID'.padStart(idWidth)}  ${'TAG'.padEnd(tagWidth)}  ${'KIND'.padEnd(capWidth)}  TEXT`;
	const lines = rows.map((row) => {
		const color = CAPABILITY_COLORS[row.capability] ?? chalk.white;
		const text = row.text.length > textWidth ? `${row.text.slice(0, textWidth)}...` : row.text;
		return (
			`${String(row.id).padStart(idWidth)}  ${row.tag.padEnd(tagWidth)}  ` +
			`${color(row.capability.padEnd(capWidth))}  ${text}`
		);
	});
	return [chalk.bold(header), ...lines].join('\n');
}

// ── Helpers ──

export function displayError(message: string): void {
	console.error(chalk.red('Error:'), message);
}
