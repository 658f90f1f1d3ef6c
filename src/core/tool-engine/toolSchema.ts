/**
 * Model-facing capability schema and its mapping onto provider tool formats.
 */

import { ulid } from "ulid";
import { z } from "zod";
import { CapabilityDefinition, CapabilityDescription, CapabilityParameter, JsonValue } from "../types";
import { buildArgumentSchema } from "./validator";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const ParameterTypeSchema = z.enum(["string", "number", "integer", "boolean", "object", "array"]);

export const BackendKindSchema = z.enum(["in-process", "sandboxed", "remote-server", "peer-agent"]);

export const CapabilityParameterSchema = z.object({
  name: z.string().min(1).max(100),
  type: ParameterTypeSchema,
  description: z.string().default(""),
  required: z.boolean().default(false),
  default: JsonValueSchema.optional(),
  enum: z.array(JsonValueSchema).optional(),
});

export const CapabilityDefinitionSchema = z.object({
  id: z.string().min(1).optional(),
  name: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[a-zA-Z0-9_-]+$/, "name may only contain letters, digits, '_' and '-'"),
  description: z.string().min(1).max(1000),
  backendKind: BackendKindSchema,
  parameters: z.array(CapabilityParameterSchema).default([]),
  resultHint: z.string().optional(),
  metadata: z.record(z.string()).optional(),
});

export type CapabilityDefinitionInput = z.input<typeof CapabilityDefinitionSchema>;

/**
 * Validates a definition and assigns an id when none is given. Throws a ZodError when invalid.
 */
export function defineCapability(input: CapabilityDefinitionInput): CapabilityDefinition {
  const parsed = CapabilityDefinitionSchema.parse(input);
  return { ...parsed, id: parsed.id ?? ulid() };
}

const PropertySchema = z.object({
  type: ParameterTypeSchema,
  description: z.string().default(""),
  default: JsonValueSchema.optional(),
  enum: z.array(JsonValueSchema).optional(),
});

export const CapabilityDescriptionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  parameters: z.record(PropertySchema),
  required: z.array(z.string()),
});

export const FunctionToolSchema = z.object({
  type: z.literal("function"),
  function: z.object({
    name: z.string().min(1),
    description: z.string().default(""),
    parameters: z
      .object({
        type: z.literal("object"),
        properties: z.record(PropertySchema).default({}),
        required: z.array(z.string()).default([]),
      })
      .default({ type: "object" }),
  }),
});

export interface FunctionTool {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface AnthropicTool {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export function describeCapability(def: CapabilityDefinition): CapabilityDescription {
  const parameters: CapabilityDescription["parameters"] = {};
  for (const p of def.parameters) {
    parameters[p.name] = {
      type: p.type,
      description: p.description,
      ...(p.default !== undefined ? { default: p.default } : {}),
      ...(p.enum !== undefined ? { enum: p.enum } : {}),
    };
  }
  return {
    name: def.name,
    description: def.resultHint ? `${def.description} Returns: ${def.resultHint}` : def.description,
    parameters,
    required: def.parameters.filter((p) => p.required).map((p) => p.name),
  };
}

/**
 * Rebuilds the ordered parameter list from a description. Key order of `parameters` is kept.
 */
export function parametersFromDescription(desc: CapabilityDescription): CapabilityParameter[] {
  const required = new Set(desc.required);
  return Object.entries(desc.parameters).map(([name, prop]) => ({
    name,
    type: prop.type,
    description: prop.description,
    required: required.has(name),
    ...(prop.default !== undefined ? { default: prop.default } : {}),
    ...(prop.enum !== undefined ? { enum: prop.enum } : {}),
  }));
}

export function toFunctionTool(desc: CapabilityDescription): FunctionTool {
  return {
    type: "function",
    function: {
      name: desc.name,
      description: desc.description,
      parameters: buildArgumentSchema(parametersFromDescription(desc)),
    },
  };
}

export function toAnthropicTool(desc: CapabilityDescription): AnthropicTool {
  return {
    name: desc.name,
    description: desc.description,
    input_schema: buildArgumentSchema(parametersFromDescription(desc)),
  };
}

/**
 * Parses a provider function tool back into a description. Throws a ZodError on malformed input.
 */
export function fromFunctionTool(tool: unknown): CapabilityDescription {
  const parsed = FunctionToolSchema.parse(tool);
  const params = parsed.function.parameters;
  return {
    name: parsed.function.name,
    description: parsed.function.description,
    parameters: params.properties,
    required: params.required,
  };
}
