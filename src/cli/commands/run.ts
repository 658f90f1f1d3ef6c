/**
 * meshwork run "<task>"
 */

import { Command } from "commander";
import { nodeFor } from "../utils/createNode";

export function runCommand(): Command {
  const cmd = new Command("run");
  cmd
    .description("Run one task through the coordinator and print the answer")
    .argument("<task>", "task for the agent")
    .option("--json", "print the full result as JSON")
    .action(async (task: string, opts: { json?: boolean }, command: Command) => {
      const node = nodeFor(command);
      await node.start();
      try {
        const result = await node.coordinator.handle(task);
        if (opts.json) {
          console.log(
            JSON.stringify(
              {
                requestId: result.requestId,
                mode: result.mode,
                answer: result.answer,
                attempts: result.attempts,
                turns: result.run?.turns,
                modelCalls: result.run?.modelCalls,
              },
              null,
              2
            )
          );
        } else {
          console.log(result.answer);
        }
      } finally {
        await node.stop();
        await node.logger.flush();
      }
    });
  return cmd;
}
