import { describe, it, expect, beforeEach } from 'vitest';
import { ToolRegistry } from './tool-registry.js';
import { defineTool, type ToolSchema } from './tool.js';

function schemaFor(name: string): ToolSchema {
  return {
    name,
    description: `Tool ${name}`,
    parameters: { type: 'object', properties: {}, required: [] },
  };
}

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  it('should register a tool', () => {
    const tool = defineTool(schemaFor('test_tool'), async () => 'result');

    registry.register(tool);

    expect(registry.has('test_tool')).toBe(true);
    expect(registry.get('test_tool')).toBe(tool);
    expect(registry.size).toBe(1);
  });

  it('should throw when registering a duplicate name', () => {
    registry.register(defineTool(schemaFor('test_tool'), async () => 'a'));

    expect(() => registry.register(defineTool(schemaFor('test_tool'), async () => 'b'))).toThrow(
      "Tool 'test_tool' is already registered",
    );
  });

  it('should list tools and schemas in registration order', () => {
    registry.register(defineTool(schemaFor('zeta'), async () => 'z'));
    registry.register(defineTool(schemaFor('alpha'), async () => 'a'));
    registry.register(defineTool(schemaFor('mid'), async () => 'm'));

    expect(registry.list().map(t => t.name)).toEqual(['zeta', 'alpha', 'mid']);
    expect(registry.schemas()).toEqual([schemaFor('zeta'), schemaFor('alpha'), schemaFor('mid')]);
  });

  it('should unregister a tool', () => {
    registry.register(defineTool(schemaFor('test_tool'), async () => 'result'));

    expect(registry.unregister('test_tool')).toBe(true);
    expect(registry.has('test_tool')).toBe(false);
    expect(registry.unregister('test_tool')).toBe(false);
  });

  it('should accept initial tools in the constructor', () => {
    const seeded = new ToolRegistry([
      defineTool(schemaFor('one'), async () => 1),
      defineTool(schemaFor('two'), async () => 2),
    ]);

    expect(seeded.list().map(t => t.name)).toEqual(['one', 'two']);
  });

  it('should return undefined for an unknown name', () => {
    expect(registry.get('missing')).toBeUndefined();
  });
});
