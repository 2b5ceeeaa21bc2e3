import fs from "fs";
import http from "http";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import {
  ActionOutcome,
  CaptureCache,
  DeviceCollaborator,
  KeyParams,
  Logger,
  SurfaceRect,
  WorkerPool,
} from "@tapflow/orchestrator";
import { createApp, isWorkerScope } from "../src/app";

class StubDevice implements DeviceCollaborator {
  keys: string[] = [];
  /** When set, key presses wait for it before returning. */
  hold?: Promise<void>;

  async listTargets(): Promise<string[]> {
    return ["emulator-5554"];
  }

  async getSurface(): Promise<SurfaceRect> {
    return { x: 0, y: 0, width: 100, height: 100 };
  }

  async sendClick(): Promise<ActionOutcome> {
    return { ok: true };
  }

  async sendKey(_targetId: string, params: KeyParams): Promise<ActionOutcome> {
    this.keys.push(params.key);
    if (this.hold) {
      await this.hold;
    }
    return { ok: true };
  }

  async sendText(): Promise<ActionOutcome> {
    return { ok: true };
  }

  async sendHotkey(): Promise<ActionOutcome> {
    return { ok: true };
  }
}

const servers: http.Server[] = [];

afterEach(() => {
  for (const server of servers.splice(0)) {
    server.closeAllConnections();
    server.close();
  }
});

async function startServer(logger: Logger = Logger.silent()) {
  const scriptsDir = fs.mkdtempSync(path.join(os.tmpdir(), "control-server-app-"));
  fs.writeFileSync(
    path.join(scriptsDir, "keys.script.json"),
    JSON.stringify({
      sequence: [
        { type: "KeyPress", id: "a", name: "home", key: "HOME" },
        { type: "KeyPress", id: "b", name: "enter", key: "ENTER" },
      ],
    }),
  );
  const device = new StubDevice();
  const pool = new WorkerPool({
    device,
    captureCache: new CaptureCache({
      providers: [
        {
          name: "blank",
          capture: async () => ({ width: 1, height: 1, data: new Uint8Array(4) }),
        },
      ],
    }),
    logger,
  });
  const app = createApp({ pool, device, scriptsDir, logger, keepAliveMs: 60_000 });

  const server = await new Promise<http.Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  servers.push(server);
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return { baseUrl: `http://127.0.0.1:${address.port}`, device, pool, scriptsDir };
}

interface StreamEvent {
  event: string;
  data: unknown;
}

/** Splits a server-sent event stream into its event blocks. */
class EventReader {
  private buffer = "";
  private readonly decoder = new TextDecoder();

  constructor(private readonly read: () => Promise<{ done: boolean; value?: Uint8Array }>) {}

  async next(): Promise<StreamEvent> {
    while (!this.buffer.includes("\n\n")) {
      const chunk = await this.read();
      if (chunk.done || !chunk.value) {
        throw new Error("stream ended");
      }
      this.buffer += this.decoder.decode(chunk.value, { stream: true });
    }
    const end = this.buffer.indexOf("\n\n");
    const [eventLine, dataLine] = this.buffer.slice(0, end).split("\n");
    this.buffer = this.buffer.slice(end + 2);
    return { event: eventLine.slice("event: ".length), data: JSON.parse(dataLine.slice("data: ".length)) };
  }
}

function openStream(response: Response): EventReader {
  const reader = response.body?.getReader();
  if (!reader) {
    throw new Error("expected a response body");
  }
  return new EventReader(() => reader.read());
}

function post(url: string, body?: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

const WorkersBodySchema = z.object({ workers: z.array(z.object({ status: z.string() })) });

async function waitForStatus(baseUrl: string, status: string): Promise<void> {
  for (let attempt = 0; attempt < 100; attempt += 1) {
    const response = await fetch(`${baseUrl}/api/workers`);
    const body = WorkersBodySchema.parse(await response.json());
    if (body.workers.some((worker) => worker.status === status)) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(`worker never reached ${status}`);
}

describe("isWorkerScope", () => {
  it("matches whole worker scopes", () => {
    expect(isWorkerScope("worker:emulator-1", "emulator-1")).toBe(true);
    expect(isWorkerScope("run:42:worker:emulator-1", "emulator-1")).toBe(true);
    expect(isWorkerScope("worker:emulator-10", "emulator-1")).toBe(false);
    expect(isWorkerScope("worker:192.168.1.20:5555", "192.168.1.20")).toBe(false);
  });
});

describe("control server", () => {
  it("reports health and targets", async () => {
    const { baseUrl } = await startServer();

    expect(await (await fetch(`${baseUrl}/api/health`)).json()).toEqual({ ok: true });
    expect(await (await fetch(`${baseUrl}/api/targets`)).json()).toEqual({ targets: ["emulator-5554"] });
  });

  it("lists scripts in the scripts directory", async () => {
    const { baseUrl } = await startServer();

    expect(await (await fetch(`${baseUrl}/api/scripts`)).json()).toEqual({
      scripts: [
        {
          path: "keys.script.json",
          valid: true,
          topLevelCommands: 2,
          totalCommands: 2,
          labels: ["home", "enter"],
          maxIterations: 10_000,
        },
      ],
    });
  });

  it("starts a worker and runs the script to completion", async () => {
    const { baseUrl, device } = await startServer();

    const response = await post(`${baseUrl}/api/workers/emulator-5554/start`, { scriptPath: "keys.script.json" });
    expect(response.status).toBe(202);
    expect(await response.json()).toMatchObject({ status: "Running" });

    await waitForStatus(baseUrl, "Completed");
    expect(device.keys).toEqual(["HOME", "ENTER"]);

    expect(await (await fetch(`${baseUrl}/api/workers`)).json()).toMatchObject({
      workers: [{ targetId: "emulator-5554", status: "Completed", iterations: 2, currentCommandId: "b" }],
    });
  });

  it("rejects bad start requests", async () => {
    const { baseUrl } = await startServer();

    const missing = await post(`${baseUrl}/api/workers/emulator-5554/start`, {});
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ error: "scriptPath is required" });

    const escape = await post(`${baseUrl}/api/workers/emulator-5554/start`, { scriptPath: "../escape.script.json" });
    expect(escape.status).toBe(400);
    expect(await escape.json()).toEqual({
      error: "Script path must stay inside the scripts directory",
      issues: ["../escape.script.json"],
    });

    const unknown = await post(`${baseUrl}/api/workers/emulator-5554/start`, { scriptPath: "nope.script.json" });
    expect(unknown.status).toBe(404);
  });

  it("answers 404 for controls on unknown workers", async () => {
    const { baseUrl } = await startServer();

    const response = await post(`${baseUrl}/api/workers/emulator-9999/pause`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'No worker for target "emulator-9999"' });
    expect((await fetch(`${baseUrl}/api/workers/emulator-9999/stream`)).status).toBe(404);
  });

  it("streams the current status first", async () => {
    const { baseUrl } = await startServer();
    await post(`${baseUrl}/api/workers/emulator-5554/start`, { scriptPath: "keys.script.json" });
    await waitForStatus(baseUrl, "Completed");

    const controller = new AbortController();
    const response = await fetch(`${baseUrl}/api/workers/emulator-5554/stream`, { signal: controller.signal });
    expect(response.headers.get("content-type")).toBe("text/event-stream");

    const events = openStream(response);
    const first = await events.next();
    controller.abort();

    expect(first).toEqual({
      event: "status",
      data: {
        targetId: "emulator-5554",
        status: "Completed",
        iterations: 2,
        currentCommandId: "b",
      },
    });
  });

  it("streams log lines from the requested worker only", async () => {
    const logger = Logger.create({ sinks: [] });
    const { baseUrl, pool } = await startServer(logger);
    pool.worker("emulator-1");
    pool.worker("emulator-10");

    const controller = new AbortController();
    const response = await fetch(`${baseUrl}/api/workers/emulator-1/stream`, { signal: controller.signal });
    const events = openStream(response);
    expect((await events.next()).event).toBe("status");

    logger.child("worker:emulator-10").info("from ten");
    logger.child("worker:emulator-1").info("from one");
    const next = await events.next();
    controller.abort();

    expect(next).toEqual({ event: "log", data: { level: "info", line: "[worker:emulator-1] from one" } });
  });

  it("starts a worker once when two start requests race", async () => {
    const { baseUrl, device } = await startServer();
    let release = (): void => undefined;
    device.hold = new Promise<void>((resolve) => {
      release = resolve;
    });

    const responses = await Promise.all([
      post(`${baseUrl}/api/workers/emulator-5554/start`, { scriptPath: "keys.script.json" }),
      post(`${baseUrl}/api/workers/emulator-5554/start`, { scriptPath: "keys.script.json" }),
    ]);
    expect(responses.map((response) => response.status).sort()).toEqual([202, 409]);

    release();
    await waitForStatus(baseUrl, "Completed");
    expect(device.keys).toEqual(["HOME", "ENTER"]);
  });

  it("pauses, resumes and stops known workers without error", async () => {
    const { baseUrl } = await startServer();
    await post(`${baseUrl}/api/workers/emulator-5554/start`, { scriptPath: "keys.script.json" });
    await waitForStatus(baseUrl, "Completed");

    for (const control of ["pause", "resume", "stop"]) {
      const response = await post(`${baseUrl}/api/workers/emulator-5554/${control}`);
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: "Completed" });
    }
  });
});
