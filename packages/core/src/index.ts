// tagsight - vision-grounded browser control for agents

export { BrowserController, type BrowserControllerDeps, type CreateControllerOptions } from './controller/controller.js';
export {
	type OperationResult,
	type ImageDelivery,
	type OutboundImage,
	type ConfirmAction,
	type SendImagesRequest,
} from './controller/types.js';

export { CommandExecutor } from './commands/executor.js';
export { CommandCatalog } from './commands/catalog/catalog.js';
export { type CatalogEntry, type CatalogTool, type CatalogOptions } from './commands/catalog/types.js';
export { type ToolContext } from './commands/types.js';

export { BridgeServer, type BridgeServerOptions, type MCPRequest, type MCPResponse, PROTOCOL_VERSION } from './bridge/server.js';
export { BridgeAdapter, TOOL_PREFIX, type MCPToolDefinition, type MCPToolResult, type MCPContent } from './bridge/adapter.js';

export {
	UrlValidator,
	withDefaultScheme,
	compileDomainPattern,
	resolveAllAddresses,
	type ValidationVerdict,
	type HostResolver,
	type UrlValidatorOptions,
} from './security/url-validator.js';
export { downloadImage, type FetchLike, type ImageDownloadOptions } from './security/image-download.js';
export { classifyIp, type IpClassification, type IpFamily } from './security/ip-ranges.js';

export * from './viewport/index.js';
export * from './page/index.js';
export * from './config/index.js';

export {
	TagsightError,
	SecurityRejectionError,
	RedirectBlockedError,
	SessionConflictError,
	SessionClosedError,
	EngineFailureError,
	LaunchFailedError,
	NavigationFailedError,
	MarkingFailedError,
	ElementNotFoundError,
	InvalidArgumentError,
	PendingScreenshotError,
	SchemaViolationError,
	classifyError,
	errorMessage,
	type ErrorKind,
} from './errors.js';

export {
	createLogger,
	Logger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	setLogColors,
	setLogStream,
	parseLogLevel,
	type LogStream,
} from './logging.js';

export { timed, type TimingResult } from './telemetry.js';

export {
	type UserId,
	type ElementId,
	userId,
	elementId,
	type Result,
	ok,
	err,
	type Position,
	type Rect,
	type Size,
	LogLevel,
} from './types.js';
