import { WorkerStatus } from "@tapflow/orchestrator";

export type ScriptSummary =
  | {
      path: string;
      valid: true;
      topLevelCommands: number;
      totalCommands: number;
      labels: string[];
      maxIterations: number;
    }
  | {
      path: string;
      valid: false;
      issues: string[];
    };

export interface StreamStatus {
  targetId: string;
  status: WorkerStatus;
  iterations: number;
  currentCommandId: string | null;
}
