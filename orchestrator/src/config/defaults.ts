import fs from "fs";
import path from "path";
import { z } from "zod";
import { formatSchemaIssues } from "@tapflow/shared";
import { Size, SurfaceRect } from "../runtime/coordinates";
import { ConfigurationError, errorMessage } from "../runtime/errors";
import { LogLevel } from "../logging/logger";

export interface AdbConfig {
  executable: string;
  commandTimeoutMs: number;
}

export interface ResolutionConfig {
  queryTimeoutMs: number;
}

export interface CaptureConfig {
  ttlMs: number;
  providerTimeoutMs: number;
}

export interface RuntimeConfig {
  pollIntervalMs: number;
  actionTimeoutMs: number;
  defaultMaxIterations: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface TargetConfig {
  id: string;
  surface?: SurfaceRect;
  resolution?: Size;
}

export interface TapflowConfig {
  adb: AdbConfig;
  resolution: ResolutionConfig;
  capture: CaptureConfig;
  runtime: RuntimeConfig;
  logging: LoggingConfig;
  targets: TargetConfig[];
}

export const defaultConfig: TapflowConfig = {
  adb: {
    executable: "adb",
    commandTimeoutMs: 10_000,
  },
  resolution: {
    queryTimeoutMs: 5_000,
  },
  capture: {
    ttlMs: 1_000,
    providerTimeoutMs: 3_000,
  },
  runtime: {
    pollIntervalMs: 100,
    actionTimeoutMs: 10_000,
    defaultMaxIterations: 10_000,
  },
  logging: {
    level: "info",
  },
  targets: [],
};

const positiveInt = z.number().int().positive();

const SizeSchema = z.object({ width: positiveInt, height: positiveInt });

const ConfigFileSchema = z
  .object({
    adb: z
      .object({ executable: z.string().min(1), commandTimeoutMs: positiveInt })
      .partial(),
    resolution: z.object({ queryTimeoutMs: positiveInt }).partial(),
    capture: z
      .object({ ttlMs: z.number().int().nonnegative(), providerTimeoutMs: positiveInt })
      .partial(),
    runtime: z
      .object({
        pollIntervalMs: positiveInt,
        actionTimeoutMs: positiveInt,
        defaultMaxIterations: positiveInt,
      })
      .partial(),
    logging: z.object({ level: z.enum(["debug", "info", "warn", "error"]) }).partial(),
    targets: z.array(
      z.object({
        id: z.string().min(1),
        surface: z
          .object({
            x: z.number().int(),
            y: z.number().int(),
            width: positiveInt,
            height: positiveInt,
          })
          .optional(),
        resolution: SizeSchema.optional(),
      }),
    ),
  })
  .partial()
  .strict();

export function parseConfig(input: unknown, source = "config"): TapflowConfig {
  const parsed = ConfigFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}`, formatSchemaIssues(parsed.error));
  }
  const overrides = parsed.data;

  return {
    adb: { ...defaultConfig.adb, ...(overrides.adb ?? {}) },
    resolution: { ...defaultConfig.resolution, ...(overrides.resolution ?? {}) },
    capture: { ...defaultConfig.capture, ...(overrides.capture ?? {}) },
    runtime: { ...defaultConfig.runtime, ...(overrides.runtime ?? {}) },
    logging: { ...defaultConfig.logging, ...(overrides.logging ?? {}) },
    targets: overrides.targets ?? defaultConfig.targets,
  };
}

export function loadConfig(configPath?: string): TapflowConfig {
  if (!configPath) {
    return defaultConfig;
  }

  const resolved = path.resolve(configPath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config ${resolved}`, [errorMessage(error)]);
  }
  return parseConfig(parsed, `config ${resolved}`);
}

export function targetConfig(config: TapflowConfig, targetId: string): TargetConfig | undefined {
  return config.targets.find((target) => target.id === targetId);
}
