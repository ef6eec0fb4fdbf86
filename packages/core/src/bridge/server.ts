import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import type { CommandExecutor } from '../commands/executor.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import { type UserId, userId } from '../types.js';
import { BridgeAdapter } from './adapter.js';

const logger = createLogger('mcp-server');

export const PROTOCOL_VERSION = '2024-11-05';

export const JsonRpcErrorCode = {
	ParseError: -32700,
	InvalidRequest: -32600,
	MethodNotFound: -32601,
	InvalidParams: -32602,
	InternalError: -32603,
} as const;

// ── JSON-RPC types ──

type RequestId = string | number;

const MCPRequestSchema = z.object({
	jsonrpc: z.literal('2.0'),
	id: z.union([z.string(), z.number()]).nullish(),
	method: z.string(),
	params: z.record(z.unknown()).optional(),
});

export type MCPRequest = z.infer<typeof MCPRequestSchema>;

export interface MCPResponse {
	jsonrpc: '2.0';
	id: RequestId | null;
	result?: unknown;
	error?: { code: number; message: string; data?: unknown };
}

const MetaSchema = z.object({ userId: z.string().min(1).optional() }).passthrough();

const ToolCallParamsSchema = z.object({
	name: z.string(),
	arguments: z.record(z.unknown()).optional(),
	_meta: MetaSchema.optional(),
});

export interface BridgeServerOptions {
	tools: CommandExecutor;
	/** Acts for this user when a call carries no `_meta.userId`. */
	defaultUser: UserId;
	name?: string;
	version?: string;
}

/**
 * MCP (Model Context Protocol) server exposing the browser tools over
 * newline-delimited JSON-RPC 2.0. Implements initialize, tools/list,
 * tools/call and ping.
 */
export class BridgeServer {
	private adapter: BridgeAdapter;
	private tools: CommandExecutor;
	private defaultUser: UserId;
	private name: string;
	private version: string;

	constructor(options: BridgeServerOptions) {
		this.tools = options.tools;
		this.adapter = new BridgeAdapter(options.tools);
		this.defaultUser = options.defaultUser;
		this.name = options.name ?? 'tagsight';
		this.version = options.version ?? '0.1.0';
	}

	// ── Transport ──

	/** Reads requests from `input` line by line until it ends; answers on `output`. */
	async serve(input: Readable, output: Writable): Promise<void> {
		const lines = createInterface({ input, crlfDelay: Infinity });
		const inflight = new Set<Promise<void>>();

		logger.info(`MCP server ready on stdio (default user ${this.defaultUser})`);

		for await (const line of lines) {
			if (!line.trim()) continue;
			const task = this.handleLine(line)
				.then((response) => {
					if (response) output.write(`${JSON.stringify(response)}\n`);
				})
				.catch((error: unknown) => {
					logger.error(`Failed to answer request: ${errorMessage(error)}`);
				})
				.finally(() => {
					inflight.delete(task);
				});
			inflight.add(task);
		}

		await Promise.all(inflight);
		logger.info('Input closed, MCP server stopping');
	}

	async handleLine(line: string): Promise<MCPResponse | null> {
		let message: unknown;
		try {
			message = JSON.parse(line);
		} catch (error) {
			return failure(null, JsonRpcErrorCode.ParseError, `Parse error: ${errorMessage(error)}`);
		}
		return this.handleMessage(message);
	}

	// ── Request dispatcher ──

	async handleMessage(message: unknown): Promise<MCPResponse | null> {
		const parsed = MCPRequestSchema.safeParse(message);
		if (!parsed.success) {
			return failure(null, JsonRpcErrorCode.InvalidRequest, 'Invalid request');
		}

		const request = parsed.data;
		// JSON-RPC notifications have no `id` field and get no answer
		if (request.id === undefined || request.id === null) {
			this.handleNotification(request);
			return null;
		}

		return this.handleRequest(request, request.id);
	}

	async handleRequest(request: MCPRequest, id: RequestId): Promise<MCPResponse> {
		try {
			switch (request.method) {
				case 'initialize':
					return success(id, {
						protocolVersion: PROTOCOL_VERSION,
						capabilities: { tools: {} },
						serverInfo: { name: this.name, version: this.version },
					});
				case 'tools/list':
					return success(id, { tools: this.adapter.getToolDefinitions() });
				case 'tools/call':
					return await this.handleToolsCall(request, id);
				case 'ping':
					return success(id, {});
				default:
					return failure(id, JsonRpcErrorCode.MethodNotFound, `Method not found: ${request.method}`);
			}
		} catch (error) {
			logger.error(`${request.method} failed: ${errorMessage(error)}`);
			return failure(id, JsonRpcErrorCode.InternalError, errorMessage(error));
		}
	}

	private handleNotification(message: MCPRequest): void {
		switch (message.method) {
			case 'notifications/initialized':
				logger.debug('Client confirmed initialization');
				break;
			case 'notifications/cancelled':
				logger.debug(`Client cancelled request ${String(message.params?.requestId)}`);
				break;
			default:
				logger.debug(`Ignoring notification ${message.method}`);
		}
	}

	private async handleToolsCall(request: MCPRequest, id: RequestId): Promise<MCPResponse> {
		const params = ToolCallParamsSchema.safeParse(request.params ?? {});
		if (!params.success) {
			return failure(id, JsonRpcErrorCode.InvalidParams, 'tools/call needs a tool name');
		}

		const { name, arguments: args = {} } = params.data;
		const toolName = this.adapter.parseToolName(name);
		if (!toolName || !this.tools.catalog.has(toolName)) {
			return failure(id, JsonRpcErrorCode.InvalidParams, `Unknown tool: ${name}`);
		}

		const user = this.callerOf(params.data._meta, args);
		logger.debug(`${name} called by ${user}`);
		const result = await this.tools.execute(toolName, args, user);
		return success(id, this.adapter.toToolResult(result));
	}

	/** `_meta.userId` on the call, then inside the arguments, then the default user. */
	private callerOf(meta: z.infer<typeof MetaSchema> | undefined, args: Record<string, unknown>): UserId {
		if (meta?.userId) return userId(meta.userId);
		const nested = MetaSchema.safeParse(args._meta);
		if (nested.success && nested.data.userId) return userId(nested.data.userId);
		return this.defaultUser;
	}
}

function success(id: RequestId, result: unknown): MCPResponse {
	return { jsonrpc: '2.0', id, result };
}

function failure(id: RequestId | null, code: number, message: string): MCPResponse {
	return { jsonrpc: '2.0', id, error: { code, message } };
}
