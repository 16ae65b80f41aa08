import { validateArguments, type JSONSchema } from './schema-validator.js';
import { ToolFailure } from './tool-errors.js';

/**
 * What the model sees of a tool: its name, what it does and what it takes
 */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly parameters: JSONSchema;
}

/**
 * A named, schema-described unit of executable capability.
 *
 * Implementations must be safe to run concurrently with other calls. A tool
 * wrapping a stateful resource is responsible for that resource's locking.
 */
export interface Tool<TResult = unknown> {
  readonly name: string;
  readonly schema: ToolSchema;
  /**
   * Runs the tool. Rejects with a {@link ToolFailure} to report a specific
   * failure kind; any other rejection is treated as `execution_failed`.
   */
  run(args: Record<string, unknown>, signal: AbortSignal): Promise<TResult>;
  /** Renders a result for inclusion in a tool result message */
  returnValueAsString(result: TResult): string;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Default rendering: strings as-is, nothing as empty, everything else as JSON
 */
export function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  return JSON.stringify(value);
}

/**
 * Base class that validates arguments against the schema before executing
 */
export abstract class BaseTool<TResult = unknown> implements Tool<TResult> {
  readonly schema: ToolSchema;

  protected constructor(schema: ToolSchema) {
    this.schema = deepFreeze(structuredClone(schema));
  }

  get name(): string {
    return this.schema.name;
  }

  async run(args: Record<string, unknown>, signal: AbortSignal): Promise<TResult> {
    const validation = validateArguments(this.schema.parameters, args);
    if (!validation.valid) {
      throw new ToolFailure(
        'invalid_arguments',
        `Parameter validation failed: ${validation.errors.join('; ')}`,
        validation.errors,
      );
    }
    return this.execute(args, signal);
  }

  returnValueAsString(result: TResult): string {
    return renderValue(result);
  }

  /**
   * Does the actual work once arguments have passed validation
   */
  protected abstract execute(args: Record<string, unknown>, signal: AbortSignal): Promise<TResult>;
}

export type ToolHandler<TResult> = (args: Record<string, unknown>, signal: AbortSignal) => Promise<TResult>;

export interface FunctionToolOptions<TResult> {
  render?: (result: TResult) => string;
}

/**
 * Tool backed by a plain async function
 */
export class FunctionTool<TResult = unknown> extends BaseTool<TResult> {
  private readonly handler: ToolHandler<TResult>;
  private readonly render?: (result: TResult) => string;

  constructor(schema: ToolSchema, handler: ToolHandler<TResult>, options: FunctionToolOptions<TResult> = {}) {
    super(schema);
    this.handler = handler;
    this.render = options.render;
  }

  override returnValueAsString(result: TResult): string {
    return this.render ? this.render(result) : super.returnValueAsString(result);
  }

  protected execute(args: Record<string, unknown>, signal: AbortSignal): Promise<TResult> {
    return this.handler(args, signal);
  }
}

export function defineTool<TResult>(
  schema: ToolSchema,
  handler: ToolHandler<TResult>,
  options?: FunctionToolOptions<TResult>,
): FunctionTool<TResult> {
  return new FunctionTool(schema, handler, options);
}
