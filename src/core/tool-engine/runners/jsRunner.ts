/**
 * Sandboxed JavaScript capabilities on node's `vm`.
 *
 * Capability code is a function body receiving `args` and returning the result. It runs in a fresh
 * context with no access to `require`, `process` or the host's globals, under a wall-clock timeout.
 * `vm` is not a security boundary on its own, hence the screening at registration.
 */

import { Script, createContext } from "node:vm";
import { InvalidBindingError } from "../../errors";
import type { BackendExecutor, ExecutionRequest } from "./index";

const MAX_CODE_LENGTH = 20_000;

const FORBIDDEN_PATTERNS = [
  /child_process|\bspawn\s*\(|\bfork\s*\(/,
  /\bprocess\s*\./,
  /\brequire\s*\(/,
  /\bimport\s*\(/,
  /while\s*\(\s*true\s*\)/,
  /\beval\s*\(/,
  /\bFunction\s*\(/,
  /\bconstructor\s*\.\s*constructor\b/,
];

/**
 * Throws when code is too large or contains a forbidden pattern.
 */
export function screenSandboxCode(code: string): void {
  if (code.length > MAX_CODE_LENGTH) {
    throw new Error(`code too large (max ${MAX_CODE_LENGTH} characters)`);
  }
  for (const pattern of FORBIDDEN_PATTERNS) {
    if (pattern.test(code)) {
      throw new Error(`code contains prohibited pattern: ${pattern}`);
    }
  }
}

export interface SandboxRunner {
  /** Throws on code that cannot run here. */
  validate(code: string): void;
  run(code: string, args: Record<string, unknown>, signal: AbortSignal): Promise<unknown>;
}

export interface SandboxRunnerConfig {
  timeoutMs: number;
}

export class VmSandboxRunner implements SandboxRunner {
  private scripts = new Map<string, Script>();

  constructor(private readonly config: SandboxRunnerConfig = { timeoutMs: 1000 }) {}

  validate(code: string): void {
    screenSandboxCode(code);
    this.compile(code);
  }

  async run(code: string, args: Record<string, unknown>, signal: AbortSignal): Promise<unknown> {
    if (signal.aborted) throw new Error("Sandbox run aborted");
    const script = this.compile(code);
    // Arguments cross the realm boundary as JSON so no host object leaks in.
    const context = createContext({ __args: JSON.stringify(args) });
    const raw: unknown = script.runInContext(context, { timeout: this.config.timeoutMs });
    const settled: unknown = await raw;
    if (typeof settled !== "string") return undefined;
    return JSON.parse(settled);
  }

  private compile(code: string): Script {
    const cached = this.scripts.get(code);
    if (cached) return cached;
    const script = new Script(
      `(() => { const args = JSON.parse(__args); const __out = (function (args) {\n${code}\n})(args); ` +
        `return Promise.resolve(__out).then((v) => v === undefined ? undefined : JSON.stringify(v)); })()`,
      { filename: "capability.vm.js" }
    );
    this.scripts.set(code, script);
    return script;
  }
}

export class SandboxedExecutor implements BackendExecutor {
  readonly kind = "sandboxed" as const;

  constructor(private readonly runner: SandboxRunner = new VmSandboxRunner()) {}

  /** Used at registration so unrunnable code is rejected before any dispatch. */
  validate(capability: string, code: string): void {
    try {
      this.runner.validate(code);
    } catch (e) {
      throw new InvalidBindingError(capability, e instanceof Error ? e.message : String(e));
    }
  }

  async execute({ definition, binding, invocation, signal }: ExecutionRequest): Promise<unknown> {
    if (binding?.kind !== "sandboxed") {
      throw new InvalidBindingError(definition.name, "sandboxed capability has no code");
    }
    return this.runner.run(binding.code, invocation.arguments, signal);
  }
}
