import type { Command } from 'commander';
import {
	BridgeServer,
	BrowserController,
	CommandExecutor,
	Config,
	createLogger,
	errorMessage,
	parseLogLevel,
	setGlobalLogLevel,
	setLogColors,
	setLogStream,
	userId,
} from '@tagsight/core';

const logger = createLogger('serve');

interface ServeOptions {
	user: string;
	sweep?: string;
	logLevel?: string;
}

export function registerServeCommand(program: Command): void {
	program
		.command('serve')
		.description('Run the MCP server on stdin/stdout')
		.option('-u, --user <id>', 'User to act for when a call names none', 'agent')
		.option('--sweep <seconds>', 'Reclaim idle sessions on a timer, not only at the next call')
		.option('--log-level <level>', 'debug, info, warn or error')
		.action(async (options: ServeOptions) => {
			// stdout carries JSON-RPC
			setLogStream('stderr');
			setLogColors(process.stderr.isTTY === true);
			const level = parseLogLevel(options.logLevel ?? process.env.TAGSIGHT_LOG_LEVEL);
			if (level !== undefined) setGlobalLogLevel(level);

			const config = Config.load();
			const sweepSeconds = options.sweep ? Number(options.sweep) : 0;
			const controller = BrowserController.create(config, {
				sweepIntervalMs: sweepSeconds > 0 ? sweepSeconds * 1000 : undefined,
			});
			const server = new BridgeServer({
				tools: new CommandExecutor(controller),
				defaultUser: userId(options.user),
			});

			const stop = (signal: string) => {
				logger.info(`Received ${signal}, closing the browser`);
				controller
					.shutdown()
					.catch((error: unknown) => logger.error(`Shutdown failed: ${errorMessage(error)}`))
					.finally(() => process.exit(0));
			};
			process.once('SIGINT', () => stop('SIGINT'));
			process.once('SIGTERM', () => stop('SIGTERM'));

			try {
				await server.serve(process.stdin, process.stdout);
			} finally {
				await controller.shutdown();
			}
		});
}
