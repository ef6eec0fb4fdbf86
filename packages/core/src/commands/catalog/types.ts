import type { z } from 'zod';
import type { OperationResult } from '../../controller/types.js';
import type { ToolContext } from '../types.js';

export interface CatalogEntry<Schema extends z.ZodTypeAny> {
	name: string;
	description: string;
	schema: Schema;
	handler: (params: z.infer<Schema>, context: ToolContext) => Promise<OperationResult>;
}

/** A registered entry with its argument type erased behind validation. */
export interface CatalogTool {
	name: string;
	description: string;
	schema: z.ZodTypeAny;
	invoke: (args: unknown, context: ToolContext) => Promise<OperationResult>;
}

export interface CatalogOptions {
	excludeTools?: string[];
	includeTools?: string[];
}
