import fs from "fs";
import os from "os";
import path from "path";
import { createCli } from "../../src/cli";

describe("meshwork CLI", () => {
  let dir: string;
  let configFile: string;
  let output: string[];
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "meshwork-cli-"));
    configFile = path.join(dir, "meshwork.config.json");
    fs.writeFileSync(configFile, JSON.stringify({ agent: { id: "cli-agent" }, logger: { level: "silent" } }));
    output = [];
    logSpy = jest.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(" "));
    });
  });

  afterEach(() => {
    logSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    await createCli().exitOverride().parseAsync(["node", "meshwork", "--config", configFile, "--log-level", "silent", ...args]);
  }

  test("registers the subcommands", () => {
    expect(createCli().commands.map((c) => c.name())).toEqual(["serve", "run", "tools", "peers"]);
  });

  test("run prints the answer", async () => {
    await run("run", 'CALL: add {"a":2,"b":3}');
    expect(output).toEqual(["Results: add = 5"]);
  });

  test("run --json prints the whole result", async () => {
    await run("run", "--json", "hello");

    expect(JSON.parse(output.join("\n"))).toEqual({
      requestId: expect.any(String),
      mode: "local",
      answer: "Mock response: hello",
      attempts: [],
      turns: 1,
      modelCalls: 1,
    });
  });

  test("tools prints the catalog in a provider format", async () => {
    await run("tools", "--format", "openai");

    const tools: unknown = JSON.parse(output.join("\n"));
    expect(tools).toEqual(
      expect.arrayContaining([expect.objectContaining({ type: "function", function: expect.objectContaining({ name: "add" }) })])
    );
  });

  test("tools rejects an unknown format", async () => {
    await expect(run("tools", "--format", "yaml")).rejects.toThrow("Unknown format: yaml (table, json, openai, anthropic)");
  });
});
