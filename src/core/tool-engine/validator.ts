import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import { CapabilityParameter } from "../types";

const ajv = new Ajv({ allErrors: true, useDefaults: true, strict: false });

export interface ArgumentCheck {
  valid: boolean;
  /** Arguments with declared defaults filled in. */
  value: Record<string, unknown>;
  errors: string[];
}

export type ArgumentValidator = (args: Record<string, unknown>) => ArgumentCheck;

/**
 * JSON Schema for a capability's argument object.
 */
export function buildArgumentSchema(parameters: CapabilityParameter[]): Record<string, unknown> {
  const properties: Record<string, Record<string, unknown>> = {};
  for (const p of parameters) {
    const prop: Record<string, unknown> = { type: p.type, description: p.description };
    if (p.default !== undefined) prop.default = p.default;
    if (p.enum !== undefined) prop.enum = p.enum;
    properties[p.name] = prop;
  }
  return {
    type: "object",
    properties,
    required: parameters.filter((p) => p.required).map((p) => p.name),
  };
}

export function compileArgumentValidator(parameters: CapabilityParameter[]): ArgumentValidator {
  const validate: ValidateFunction = ajv.compile(buildArgumentSchema(parameters));
  return (args) => {
    // ajv writes defaults into the object it validates; never touch the caller's copy.
    const value = { ...args };
    const valid = validate(value);
    return { valid, value, errors: valid ? [] : formatErrors(validate.errors) };
  };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || "(root)"} ${e.message ?? "is invalid"}`.trim());
}
