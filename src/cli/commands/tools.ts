import { Command } from "commander";
import { printTable } from "../utils/printTable";
import { nodeFor } from "../utils/createNode";
import { toAnthropicTool, toFunctionTool } from "../../core/tool-engine";

type ToolFormat = "table" | "json" | "openai" | "anthropic";

function parseFormat(value: string): ToolFormat {
  if (value === "table" || value === "json" || value === "openai" || value === "anthropic") return value;
  throw new Error(`Unknown format: ${value} (table, json, openai, anthropic)`);
}

export function toolsCommand(): Command {
  const cmd = new Command("tools");
  cmd
    .description("List capabilities, including those imported from remote tool servers")
    .option("-f, --format <format>", "table | json | openai | anthropic", "table")
    .action(async (opts: { format: string }, command: Command) => {
      const format = parseFormat(opts.format);
      const node = nodeFor(command);
      await node.start();
      try {
        const descriptions = node.catalog.describeAll();
        if (format === "json") {
          console.log(JSON.stringify(descriptions, null, 2));
        } else if (format === "openai") {
          console.log(JSON.stringify(descriptions.map(toFunctionTool), null, 2));
        } else if (format === "anthropic") {
          console.log(JSON.stringify(descriptions.map(toAnthropicTool), null, 2));
        } else {
          printTable(
            ["NAME", "BACKEND", "PARAMETERS", "DESCRIPTION"],
            node.catalog.list().map((def) => [
              def.name,
              def.backendKind,
              def.parameters.map((p) => (p.required ? p.name : `${p.name}?`)).join(", "),
              def.description,
            ])
          );
        }
      } finally {
        await node.stop();
      }
    });
  return cmd;
}
