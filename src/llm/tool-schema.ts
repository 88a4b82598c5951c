/**
 * Tool Schema
 *
 * Describes loop tools in OpenAI Chat Completions function-calling format.
 * Tool names must match ^[a-zA-Z0-9_-]{1,64}$ for provider compatibility.
 */

/**
 * Every loop tool argument is a string.
 */
export type ToolParameterType = 'string';

/**
 * Parameter declaration for a tool.
 */
export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
}

/**
 * JSON Schema property definition for OpenAI tools.
 */
export interface OpenAIPropertySchema {
  type: ToolParameterType;
  description?: string;
}

/**
 * OpenAI Chat Completions tool format.
 */
export interface OpenAIChatTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, OpenAIPropertySchema>;
      /** Required parameters. Omitted when empty for provider compatibility. */
      required?: string[];
      additionalProperties?: boolean;
    };
  };
}

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Build an OpenAI tool definition from a name, description and parameter list.
 */
export function toOpenAITool(
  name: string,
  description: string,
  parameters: ToolParameter[]
): OpenAIChatTool {
  if (!TOOL_NAME_PATTERN.test(name)) {
    throw new Error(`Invalid tool name: ${name}`);
  }

  const properties: Record<string, OpenAIPropertySchema> = {};
  for (const param of parameters) {
    properties[param.name] = { type: param.type, description: param.description };
  }

  const result: OpenAIChatTool = {
    type: 'function',
    function: {
      name,
      description,
      parameters: {
        type: 'object',
        properties,
        additionalProperties: false,
      },
    },
  };

  const required = parameters.filter((p) => p.required).map((p) => p.name);
  if (required.length > 0) {
    result.function.parameters.required = required;
  }

  return result;
}
