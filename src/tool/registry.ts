// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, parameter validation, dispatch, and the schema handed to the model.
 */

import type {
  ModelTool,
  Tool,
  ToolDefinition,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.ts';

function validateParameterType(value: unknown, expectedType: ToolParameterType): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
  }
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(`tool already registered: ${tool.definition.name}`);
      }
      tools.set(tool.definition.name, tool);
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    async dispatch(name: string, params: Record<string, unknown>): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return { success: false, error: `Unknown function: ${name}` };
      }

      for (const param of tool.definition.parameters) {
        if (param.required && !(param.name in params)) {
          return { success: false, error: `missing required parameter: ${param.name}` };
        }
      }

      for (const param of tool.definition.parameters) {
        if (!(param.name in params)) {
          continue;
        }
        const value = params[param.name];
        if (!validateParameterType(value, param.type)) {
          return {
            success: false,
            error: `invalid type for parameter ${param.name}: expected ${param.type}, got ${describeType(value)}`,
          };
        }
        if (param.enum_values && !param.enum_values.includes(String(value))) {
          return {
            success: false,
            error: `invalid value for parameter ${param.name}: expected one of ${param.enum_values.join(', ')}`,
          };
        }
      }

      try {
        return await tool.handler(params);
      } catch (error) {
        return {
          success: false,
          error: `handler error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },

    assertComplete(names: ReadonlyArray<string>): void {
      const expected = new Set(names);
      const missing = names.filter((name) => !tools.has(name));
      const extra = Array.from(tools.keys()).filter((name) => !expected.has(name));

      if (missing.length > 0 || extra.length > 0) {
        const parts = [
          missing.length > 0 ? `missing: ${missing.join(', ')}` : '',
          extra.length > 0 ? `unexpected: ${extra.join(', ')}` : '',
        ].filter(Boolean);
        throw new Error(`tool registry out of sync (${parts.join('; ')})`);
      }
    },

    toModelTools(): Array<ModelTool> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, unknown> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = {
            type: param.type,
            description: param.description,
            ...(param.enum_values && { enum: param.enum_values }),
          };

          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          input_schema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };
}
