import { describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";

import { silentLogger } from "../src/logger.js";
import { textResponse } from "../src/mcp.js";
import { bootstrapServer } from "../src/server.js";

describe("bootstrapServer", () => {
  it("serves registered tools and runs the lifecycle hooks in order", async () => {
    const events: string[] = [];
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    const running = await bootstrapServer({
      config: { name: "test-server", version: "1.0.0" },
      createServices: () => ({ reply: "pong" }),
      registerTools: (server, services) => {
        events.push("register");
        server.registerTool("ping", { description: "Answer with the reply" }, async () => textResponse(services.reply));
      },
      onStartup: () => {
        events.push("startup");
      },
      onShutdown: () => {
        events.push("shutdown");
      },
      logger: silentLogger,
      transport: serverTransport,
    });

    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);

    const listed = await client.listTools();
    expect(listed.tools.map((tool) => tool.name)).toEqual(["ping"]);
    expect(await client.callTool({ name: "ping", arguments: {} })).toMatchObject({
      content: [{ type: "text", text: "pong" }],
    });

    await running.close();
    await running.close();
    expect(events).toEqual(["register", "startup", "shutdown"]);
    await client.close();
  });

  it("fails before connecting when startup fails", async () => {
    const [, serverTransport] = InMemoryTransport.createLinkedPair();

    await expect(
      bootstrapServer({
        config: { name: "test-server", version: "1.0.0" },
        createServices: () => ({}),
        registerTools: () => {},
        onStartup: () => {
          throw new Error("no workspace");
        },
        logger: silentLogger,
        transport: serverTransport,
      })
    ).rejects.toThrow("no workspace");
  });
});
