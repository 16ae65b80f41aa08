/**
 * JSON Schema subset used to describe tool parameters
 */
export type JSONSchemaType = 'object' | 'string' | 'number' | 'integer' | 'boolean' | 'array';

export interface JSONSchema {
  type: 'object';
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
}

export interface JSONSchemaProperty {
  type: JSONSchemaType;
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: JSONSchemaProperty;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function matchesType(value: unknown, type: JSONSchemaType): boolean {
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
    default:
      return typeof value === type;
  }
}

/**
 * Checks the properties of an object value against its schema, appending
 * every problem found to `errors`.
 */
function validateObject(
  path: string,
  value: Record<string, unknown>,
  schema: Pick<JSONSchemaProperty, 'properties' | 'required' | 'additionalProperties'>,
  errors: string[],
): void {
  const prefix = path ? `${path}.` : '';

  for (const required of schema.required ?? []) {
    if (!Object.hasOwn(value, required) || value[required] === undefined) {
      errors.push(`Missing required parameter: '${prefix}${required}'`);
    }
  }

  for (const [key, child] of Object.entries(value)) {
    // Own keys only, so names like `toString` never resolve to Object.prototype
    const properties = schema.properties ?? {};
    const childSchema = Object.hasOwn(properties, key) ? properties[key] : undefined;
    if (!childSchema) {
      if (schema.additionalProperties === false) {
        errors.push(`Unknown parameter: '${prefix}${key}'`);
      }
      continue;
    }
    if (child === undefined) continue;
    validateValue(`${prefix}${key}`, child, childSchema, errors);
  }
}

function validateValue(path: string, value: unknown, schema: JSONSchemaProperty, errors: string[]): void {
  if (!matchesType(value, schema.type)) {
    errors.push(`Parameter '${path}' must be of type '${schema.type}', got '${typeOf(value)}'`);
    return;
  }

  if (schema.enum && typeof value === 'string' && !schema.enum.includes(value)) {
    errors.push(`Parameter '${path}' must be one of: ${schema.enum.join(', ')}`);
    return;
  }

  if (Array.isArray(value) && schema.items) {
    const items = schema.items;
    value.forEach((item: unknown, index) => validateValue(`${path}[${index}]`, item, items, errors));
    return;
  }

  if (isRecord(value) && schema.type === 'object') {
    validateObject(path, value, schema, errors);
  }
}

/**
 * Validates tool arguments against the tool's parameter schema
 */
export function validateArguments(schema: JSONSchema, args: Record<string, unknown>): ValidationResult {
  const errors: string[] = [];
  validateObject('', args, schema, errors);
  return errors.length > 0 ? { valid: false, errors } : { valid: true };
}
