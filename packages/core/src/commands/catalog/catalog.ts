import type { z } from 'zod';
import type { OperationResult } from '../../controller/types.js';
import { InvalidArgumentError, SchemaViolationError } from '../../errors.js';
import type { ToolContext } from '../types.js';
import type { CatalogEntry, CatalogOptions, CatalogTool } from './types.js';

export class CommandCatalog {
	private tools = new Map<string, CatalogTool>();
	private options: CatalogOptions;

	constructor(options?: CatalogOptions) {
		this.options = options ?? {};
	}

	register<Schema extends z.ZodTypeAny>(entry: CatalogEntry<Schema>): void {
		if (this.options.excludeTools?.includes(entry.name)) return;
		if (
			this.options.includeTools &&
			this.options.includeTools.length > 0 &&
			!this.options.includeTools.includes(entry.name)
		) {
			return;
		}

		this.tools.set(entry.name, {
			name: entry.name,
			description: entry.description,
			schema: entry.schema,
			invoke: async (args, context) => {
				const parsed = entry.schema.safeParse(args ?? {});
				if (!parsed.success) {
					throw toSchemaViolation(parsed.error);
				}
				return entry.handler(parsed.data, context);
			},
		});
	}

	unregister(name: string): void {
		this.tools.delete(name);
	}

	get(name: string): CatalogTool | undefined {
		return this.tools.get(name);
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	getAll(): CatalogTool[] {
		return [...this.tools.values()];
	}

	getNames(): string[] {
		return [...this.tools.keys()];
	}

	get size(): number {
		return this.tools.size;
	}

	/**
	 * Validates `args` against the tool's schema and runs it. Throws
	 * `SchemaViolationError` for bad arguments and `InvalidArgumentError`
	 * for an unknown tool; everything else is the handler's result.
	 */
	async execute(name: string, args: unknown, context: ToolContext): Promise<OperationResult> {
		const tool = this.tools.get(name);
		if (!tool) {
			throw new InvalidArgumentError(`Unknown tool "${name}"; available: ${this.getNames().join(', ')}`);
		}
		return tool.invoke(args, context);
	}
}

function toSchemaViolation(error: z.ZodError): SchemaViolationError {
	const [first] = error.issues;
	const field = first && first.path.length > 0 ? first.path.join('.') : 'arguments';
	const issues = error.issues.map((issue) =>
		issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
	);
	return new SchemaViolationError(field, issues);
}
