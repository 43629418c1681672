// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolHandler,
  Tool,
  ModelTool,
  ToolRegistry,
} from './types.ts';

export { createToolRegistry } from './registry.ts';
export {
  createCurrencyTools,
  toToolResult,
  CURRENCY_TOOL_NAMES,
  type CurrencyToolName,
} from './builtin/currency.ts';
