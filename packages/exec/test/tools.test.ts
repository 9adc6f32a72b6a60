import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer, createLogger } from "@procmux/core";

import { ExecService } from "../src/core/services/ExecService.js";
import { registerAllTools } from "../src/tools/index.js";

describe("MCP tools", () => {
  let service: ExecService;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    service = new ExecService({}, undefined, createLogger("test", { level: "silent" }));
    server = new McpServer({ name: "procmux-test", version: "0.0.0" });
    registerAllTools(server, { service });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "procmux-test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    service.dispose();
    await client.close();
    await server.close();
  });

  it("lists every tool", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      "get_output",
      "list_commands",
      "run_command",
      "start_command",
      "wait_command",
      "write_stdin",
    ]);
  });

  it("run_command returns the result", async () => {
    const response = await client.callTool({
      name: "run_command",
      arguments: { command: ["sh", "-c", "echo out; echo err >&2; exit 4"], label: "mixed" },
    });

    expect(response).toMatchObject({
      content: [{ type: "text", text: "[✗ exit 4] mixed\nstdout:\nout\n\nstderr:\nerr" }],
      structuredContent: {
        success: true,
        result: { command: ["sh", "-c", "echo out; echo err >&2; exit 4"], stdout: "out\n", stderr: "err\n", exitCode: 4, success: false },
      },
    });
    expect(JSON.stringify(response)).not.toContain("stdoutBytes");
  });

  it("reports a launch failure as an error payload", async () => {
    const response = await client.callTool({
      name: "run_command",
      arguments: { command: ["procmux-no-such-binary"] },
    });

    expect(response).toMatchObject({ structuredContent: { success: false } });
    expect(JSON.stringify(response)).toContain("Failed to launch procmux-no-such-binary");
  });

  it("drives an interactive command by id", async () => {
    const started = await client.callTool({ name: "start_command", arguments: { command: ["cat"] } });
    const [managed] = service.list();
    expect(started).toMatchObject({ structuredContent: { success: true, process: { id: managed.id, status: "running" } } });

    const written = await client.callTool({
      name: "write_stdin",
      arguments: { id: managed.id, data: "hello\n", close: true },
    });
    expect(written).toMatchObject({
      content: [{ type: "text", text: "Written\nstdin closed" }],
      structuredContent: { success: true, written: true, closed: true },
    });

    const waited = await client.callTool({ name: "wait_command", arguments: { id: managed.id } });
    expect(waited).toMatchObject({
      content: [{ type: "text", text: "[✓] cat\nstdout:\nhello" }],
      structuredContent: { success: true, result: { stdout: "hello\n", exitCode: 0 } },
    });

    const output = await client.callTool({ name: "get_output", arguments: { id: managed.id, stream: "stdout" } });
    expect(output).toMatchObject({
      structuredContent: { success: true, stdout: "hello\n", stderr: "", process: { status: "exited", exitCode: 0 } },
    });

    const listed = await client.callTool({ name: "list_commands", arguments: {} });
    expect(listed).toMatchObject({
      content: [{ type: "text", text: `[exited:0] cat (id: ${managed.id}, pid: ${managed.pid})` }],
    });
  });

  it("rejects unknown ids", async () => {
    const response = await client.callTool({ name: "wait_command", arguments: { id: "missing" } });

    expect(response).toMatchObject({
      content: [{ type: "text", text: "Error: Unknown process: missing" }],
      structuredContent: { success: false, error: "Unknown process: missing" },
    });
  });
});
