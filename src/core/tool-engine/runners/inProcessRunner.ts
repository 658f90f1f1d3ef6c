import { InvalidBindingError } from "../../errors";
import type { BackendExecutor, ExecutionRequest } from "./index";

export class InProcessExecutor implements BackendExecutor {
  readonly kind = "in-process" as const;

  async execute({ definition, binding, invocation, signal }: ExecutionRequest): Promise<unknown> {
    if (binding?.kind !== "in-process") {
      throw new InvalidBindingError(definition.name, "in-process capability has no handler");
    }
    return binding.handler(invocation.arguments, { invocationId: invocation.id, signal });
  }
}
