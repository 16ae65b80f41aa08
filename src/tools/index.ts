/**
 * Tools - Tool abstraction, registry, argument validation and batch execution
 */

export {
  BaseTool,
  FunctionTool,
  defineTool,
  renderValue,
  type Tool,
  type ToolSchema,
  type ToolHandler,
  type FunctionToolOptions,
} from './tool.js';

export {
  validateArguments,
  type JSONSchema,
  type JSONSchemaProperty,
  type JSONSchemaType,
  type ValidationResult,
} from './schema-validator.js';

export { ToolFailure, type ToolError, type ToolErrorKind } from './tool-errors.js';

export {
  parseArguments,
  renderToolResult,
  type ToolCallRequest,
  type ToolCallResult,
  type ToolCallSuccess,
  type ToolCallFailure,
  type ParsedArguments,
} from './tool-call.js';

export { ToolRegistry } from './tool-registry.js';

export { RegistryToolExecutor, type ToolExecutor, type ToolExecutorConfig } from './tool-executor.js';

export {
  BUILTIN_TOOLS,
  ECHO_TOOL,
  ADD_NUMBERS_TOOL,
  CURRENT_TIME_TOOL,
  SLEEP_TOOL,
  createBuiltinRegistry,
} from './builtin-tools.js';
