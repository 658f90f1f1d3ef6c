/**
 * Built-in in-process capabilities for smoke runs.
 */

import { CapabilityCatalog } from "../tool-engine";

export function registerBuiltinTools(catalog: CapabilityCatalog, now: () => number = Date.now): void {
  catalog.register(
    {
      name: "add",
      description: "Adds two numbers.",
      backendKind: "in-process",
      parameters: [
        { name: "a", type: "number", description: "First addend", required: true },
        { name: "b", type: "number", description: "Second addend", required: true },
      ],
      resultHint: "the sum as a number",
    },
    { kind: "in-process", handler: (args) => Number(args.a) + Number(args.b) }
  );

  catalog.register(
    {
      name: "echo",
      description: "Returns the given text unchanged.",
      backendKind: "in-process",
      parameters: [{ name: "text", type: "string", description: "Text to echo", required: true }],
    },
    { kind: "in-process", handler: (args) => String(args.text) }
  );

  catalog.register(
    {
      name: "current_time",
      description: "Returns the current time as an ISO-8601 string.",
      backendKind: "in-process",
      parameters: [],
    },
    { kind: "in-process", handler: () => new Date(now()).toISOString() }
  );
}
