import fs from "fs";
import fsPromises from "fs/promises";
import path from "path";
import { LogRecord } from "../logging/logger";
import { WorkerEvent, WorkerReport } from "./worker";

export interface RunArtifacts {
  runId: string;
  runDir: string;
  eventsPath: string;
  reportPath: string;
  createdAt: string;
}

export type EventLogEntry =
  | { type: "log"; record: LogRecord }
  | { type: "worker"; event: WorkerEvent };

export interface RunReport {
  runId: string;
  script: string;
  createdAt: string;
  finishedAt: string;
  workers: WorkerReport[];
}

export class ArtifactManager {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  async createRunFolder(runId?: string): Promise<RunArtifacts> {
    const createdAt = new Date().toISOString();
    const safeTimestamp = createdAt.replace(/[:.]/g, "-");
    const safeRunId = (runId ?? "run").replace(/[^A-Za-z0-9._-]/g, "_");
    const runDir = path.resolve(this.baseDir, `${safeTimestamp}_${safeRunId}`);

    await fsPromises.mkdir(runDir, { recursive: true });

    return {
      runId: safeRunId,
      runDir,
      eventsPath: path.join(runDir, "events.jsonl"),
      reportPath: path.join(runDir, "report.json"),
      createdAt,
    };
  }

  async writeReport(artifacts: RunArtifacts, report: RunReport): Promise<void> {
    await fsPromises.writeFile(artifacts.reportPath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
  }
}

/** Append-only JSONL file of log records and worker events. */
export class EventLog {
  private readonly stream: fs.WriteStream;

  constructor(filePath: string) {
    this.stream = fs.createWriteStream(filePath, { flags: "a" });
  }

  append(entry: EventLogEntry): void {
    this.stream.write(`${JSON.stringify({ time: new Date().toISOString(), ...entry })}\n`);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
