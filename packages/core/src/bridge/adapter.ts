import { z, type ZodTypeAny } from 'zod';
import type { CommandExecutor } from '../commands/executor.js';
import type { OperationResult } from '../controller/types.js';

export const TOOL_PREFIX = 'browser_';

export interface MCPToolDefinition {
	name: string;
	description: string;
	inputSchema: Record<string, unknown>;
}

export type MCPContent = { type: 'text'; text: string } | { type: 'image'; data: string; mimeType: 'image/png' };

export interface MCPToolResult {
	content: MCPContent[];
	isError: boolean;
}

/** Presents the command catalog as MCP tools and operation results as MCP content. */
export class BridgeAdapter {
	private tools: CommandExecutor;

	constructor(tools: CommandExecutor) {
		this.tools = tools;
	}

	getToolDefinitions(): MCPToolDefinition[] {
		return this.tools.catalog.getAll().map((tool) => ({
			name: `${TOOL_PREFIX}${tool.name}`,
			description: tool.description,
			inputSchema: this.zodToJsonSchema(tool.schema),
		}));
	}

	getToolNames(): string[] {
		return this.tools.catalog.getNames().map((name) => `${TOOL_PREFIX}${name}`);
	}

	parseToolName(mcpToolName: string): string | null {
		if (mcpToolName.startsWith(TOOL_PREFIX)) {
			return mcpToolName.slice(TOOL_PREFIX.length);
		}
		return null;
	}

	toToolResult(result: OperationResult): MCPToolResult {
		const content: MCPContent[] = [{ type: 'text', text: result.message }];
		if (result.data && Object.keys(result.data).length > 0) {
			content.push({ type: 'text', text: JSON.stringify(result.data) });
		}
		for (const image of [result.image, ...(result.images ?? [])]) {
			if (image) {
				content.push({ type: 'image', data: image.toString('base64'), mimeType: 'image/png' });
			}
		}
		return { content, isError: !result.ok };
	}

	private zodToJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
		const jsonSchema: Record<string, unknown> = { type: 'object' };

		if (schema instanceof z.ZodObject) {
			const shape: Record<string, ZodTypeAny> = schema.shape;
			const properties: Record<string, unknown> = {};
			const required: string[] = [];

			for (const [key, fieldSchema] of Object.entries(shape)) {
				properties[key] = this.fieldToJsonSchema(fieldSchema);
				if (!fieldSchema.isOptional()) {
					required.push(key);
				}
			}

			jsonSchema.properties = properties;
			if (required.length > 0) {
				jsonSchema.required = required;
			}
		}

		return jsonSchema;
	}

	private fieldToJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
		const field = this.describeType(schema);
		if (schema.description) {
			field.description = schema.description;
		}
		return field;
	}

	private describeType(schema: ZodTypeAny): Record<string, unknown> {
		if (schema instanceof z.ZodString) {
			return { type: 'string' };
		}
		if (schema instanceof z.ZodNumber) {
			const field: Record<string, unknown> = { type: schema.isInt ? 'integer' : 'number' };
			if (schema.minValue !== null) field.minimum = schema.minValue;
			if (schema.maxValue !== null) field.maximum = schema.maxValue;
			return field;
		}
		if (schema instanceof z.ZodBoolean) {
			return { type: 'boolean' };
		}
		if (schema instanceof z.ZodEnum) {
			return { type: 'string', enum: schema.options };
		}
		if (schema instanceof z.ZodArray) {
			return { type: 'array', items: this.fieldToJsonSchema(schema.element) };
		}
		if (schema instanceof z.ZodOptional) {
			return this.fieldToJsonSchema(schema.unwrap());
		}
		if (schema instanceof z.ZodDefault) {
			return { ...this.fieldToJsonSchema(schema.removeDefault()), default: schema._def.defaultValue() };
		}
		if (schema instanceof z.ZodLiteral) {
			return { const: schema.value };
		}
		return { type: 'object' };
	}
}
