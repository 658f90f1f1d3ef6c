/**
 * Capability catalog and dispatcher.
 * - one definition per name, frozen at registration
 * - one executor per backend kind
 * - dispatch validates arguments, enforces a timeout and never throws for backend failures
 */

import type { CollaborationContext } from "../collaboration/context";
import {
  CapabilityNotFoundError,
  DuplicateCapabilityError,
  ExecutorAlreadyBoundError,
  InvalidBindingError,
  MeshworkError,
  NoExecutorForBackendError,
  TimeoutError,
  toError,
} from "../errors";
import { EventBus } from "../eventBus";
import { MeshLogger } from "../logger";
import {
  BackendKind,
  CapabilityDefinition,
  CapabilityDescription,
  CapabilityError,
  CapabilityInvocation,
  CapabilityOutcome,
  ExecutorBinding,
} from "../types";
import { BackendExecutor, SandboxedExecutor, screenSandboxCode } from "./runners";
import { CapabilityDefinitionInput, defineCapability, describeCapability } from "./toolSchema";
import { ArgumentValidator, compileArgumentValidator } from "./validator";

export * from "./runners";
export * from "./toolSchema";
export { InvocationPool } from "./toolExecutionPool";

interface CatalogEntry {
  definition: CapabilityDefinition;
  binding?: ExecutorBinding;
  validate: ArgumentValidator;
}

export interface CatalogOptions {
  eventBus?: EventBus;
  logger?: MeshLogger;
  /** Used when an invocation carries no timeout. */
  defaultTimeoutMs?: number;
  /** How many settled outcomes are remembered for duplicate invocation ids. */
  outcomeCacheSize?: number;
}

export interface DispatchOptions {
  collaboration?: CollaborationContext;
  signal?: AbortSignal;
}

export class CapabilityCatalog {
  private entries = new Map<string, CatalogEntry>();
  private executors = new Map<BackendKind, BackendExecutor>();
  private outcomes = new Map<string, CapabilityOutcome>();
  private inFlight = new Map<string, Promise<CapabilityOutcome>>();
  private readonly eventBus?: EventBus;
  private readonly logger: MeshLogger;
  private readonly defaultTimeoutMs: number;
  private readonly outcomeCacheSize: number;

  constructor(options: CatalogOptions = {}) {
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? MeshLogger.silent();
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.outcomeCacheSize = options.outcomeCacheSize ?? 1000;
  }

  /**
   * Registers a capability. Throws DuplicateCapabilityError on a name collision, a ZodError on a
   * malformed definition and InvalidBindingError when the binding does not fit its backend kind.
   */
  register(input: CapabilityDefinitionInput, binding?: ExecutorBinding): CapabilityDefinition {
    const definition = defineCapability(input);
    if (this.entries.has(definition.name)) {
      throw new DuplicateCapabilityError(definition.name);
    }
    this.checkBinding(definition, binding);

    const frozen: CapabilityDefinition = Object.freeze({
      ...definition,
      parameters: definition.parameters.map((p) => Object.freeze({ ...p })),
      metadata: definition.metadata ? Object.freeze({ ...definition.metadata }) : undefined,
    });
    this.entries.set(frozen.name, { definition: frozen, binding, validate: compileArgumentValidator(frozen.parameters) });
    this.logger.debug("Capability registered", { capability: frozen.name, backendKind: frozen.backendKind });
    return frozen;
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  /**
   * Binds the executor for a backend kind. Throws ExecutorAlreadyBoundError on a second binding.
   */
  registerBackend(kind: BackendKind, executor: BackendExecutor): void {
    if (executor.kind !== kind) {
      throw new MeshworkError(`Executor for "${executor.kind}" cannot serve "${kind}"`, "EXECUTOR_KIND_MISMATCH", 500);
    }
    if (this.executors.has(kind)) {
      throw new ExecutorAlreadyBoundError(kind);
    }
    if (executor instanceof SandboxedExecutor) {
      for (const { definition, binding } of this.entries.values()) {
        if (binding?.kind === "sandboxed") executor.validate(definition.name, binding.code);
      }
    }
    this.executors.set(kind, executor);
  }

  get(name: string): CapabilityDefinition | undefined {
    return this.entries.get(name)?.definition;
  }

  list(): CapabilityDefinition[] {
    return [...this.entries.values()].map((e) => e.definition);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Model-facing description of every capability, in registration order.
   */
  describeAll(filter?: (def: CapabilityDefinition) => boolean): CapabilityDescription[] {
    return this.list()
      .filter((def) => (filter ? filter(def) : true))
      .map(describeCapability);
  }

  /**
   * Runs one invocation. Throws CapabilityNotFoundError or NoExecutorForBackendError for
   * configuration problems; every backend failure comes back as a non-success outcome.
   * A repeated invocation id gets the first dispatch's outcome without running the backend again.
   */
  async dispatch(invocation: CapabilityInvocation, options: DispatchOptions = {}): Promise<CapabilityOutcome> {
    const entry = this.entries.get(invocation.capabilityName);
    if (!entry) throw new CapabilityNotFoundError(invocation.capabilityName);
    const executor = this.executors.get(entry.definition.backendKind);
    if (!executor) throw new NoExecutorForBackendError(entry.definition.backendKind, entry.definition.name);

    const settled = this.outcomes.get(invocation.id);
    if (settled) return this.replay(invocation, settled);
    const pending = this.inFlight.get(invocation.id);
    if (pending) return pending;

    const run = this.run(entry, executor, invocation, options).then((outcome) => {
      this.remember(invocation.id, outcome);
      return outcome;
    });
    this.inFlight.set(invocation.id, run);
    try {
      return await run;
    } finally {
      this.inFlight.delete(invocation.id);
    }
  }

  private async run(
    entry: CatalogEntry,
    executor: BackendExecutor,
    invocation: CapabilityInvocation,
    options: DispatchOptions
  ): Promise<CapabilityOutcome> {
    const { definition } = entry;
    const started = Date.now();
    const fail = (error: CapabilityError): CapabilityOutcome => {
      const elapsedMs = Date.now() - started;
      this.eventBus?.emit("CapabilityErrorEvent", {
        invocationId: invocation.id,
        capability: definition.name,
        code: error.code,
        message: error.message,
      });
      this.logger.traceCapability(definition.name, invocation.arguments, elapsedMs, false, error.message);
      return { invocationId: invocation.id, success: false, error, elapsedMs };
    };

    const check = entry.validate(invocation.arguments);
    if (!check.valid) {
      return fail({
        code: "INVALID_ARGUMENTS",
        message: `Invalid arguments for ${definition.name}: ${check.errors.join("; ")}`,
        capability: definition.name,
        details: { errors: check.errors },
      });
    }

    this.eventBus?.emit("CapabilityInvocationEvent", {
      invocationId: invocation.id,
      capability: definition.name,
      backendKind: definition.backendKind,
    });

    const timeoutMs = invocation.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(`Capability ${definition.name} timed out after ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
    });

    try {
      const result = await Promise.race([
        executor.execute({
          definition,
          binding: entry.binding,
          invocation: { ...invocation, arguments: check.value },
          signal: controller.signal,
          collaboration: options.collaboration,
        }),
        timeout,
      ]);
      const elapsedMs = Date.now() - started;
      this.eventBus?.emit("CapabilityResultEvent", {
        invocationId: invocation.id,
        capability: definition.name,
        elapsedMs,
        cached: false,
      });
      this.logger.traceCapability(definition.name, invocation.arguments, elapsedMs, true);
      return { invocationId: invocation.id, success: true, result, elapsedMs };
    } catch (e) {
      return fail(toCapabilityError(definition.name, toError(e)));
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  private replay(invocation: CapabilityInvocation, outcome: CapabilityOutcome): CapabilityOutcome {
    if (outcome.success) {
      this.eventBus?.emit("CapabilityResultEvent", {
        invocationId: invocation.id,
        capability: invocation.capabilityName,
        elapsedMs: outcome.elapsedMs,
        cached: true,
      });
    }
    return outcome;
  }

  private remember(id: string, outcome: CapabilityOutcome): void {
    this.outcomes.set(id, outcome);
    while (this.outcomes.size > this.outcomeCacheSize) {
      const oldest = this.outcomes.keys().next();
      if (oldest.done) break;
      this.outcomes.delete(oldest.value);
    }
  }

  private checkBinding(definition: CapabilityDefinition, binding: ExecutorBinding | undefined): void {
    const kind = definition.backendKind;
    if (binding && binding.kind !== kind) {
      throw new InvalidBindingError(definition.name, `binding is for "${binding.kind}" but capability runs on "${kind}"`);
    }
    if (!binding && kind !== "peer-agent") {
      throw new InvalidBindingError(definition.name, `"${kind}" capabilities need a binding`);
    }
    if (binding?.kind === "sandboxed") {
      try {
        screenSandboxCode(binding.code);
      } catch (e) {
        throw new InvalidBindingError(definition.name, toError(e).message);
      }
      const sandbox = this.executors.get("sandboxed");
      if (sandbox instanceof SandboxedExecutor) sandbox.validate(definition.name, binding.code);
    }
  }
}

function toCapabilityError(capability: string, error: Error): CapabilityError {
  if (error instanceof TimeoutError) {
    return { code: "TIMEOUT", message: error.message, capability };
  }
  if (error instanceof MeshworkError) {
    return { code: error.code, message: error.message, capability, details: error.details };
  }
  return { code: "CAPABILITY_EXECUTION_FAILED", message: error.message, capability };
}
