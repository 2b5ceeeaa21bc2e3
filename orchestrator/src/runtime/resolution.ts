import { TimeoutError, errorMessage, withTimeout } from "./errors";
import { Size } from "./coordinates";
import { Logger } from "../logging/logger";

/** One way of asking a device for its display size; null means "answered, but no size found". */
export interface ResolutionProbe {
  readonly name: string;
  query(deviceId: string): Promise<Size | null>;
}

export interface ResolutionAttempt {
  probe: string;
  outcome: "timeout" | "transport" | "unparsed";
  message: string;
}

export type ResolutionRecord =
  | { kind: "resolved"; width: number; height: number; source: string }
  | { kind: "unresolved"; reason: string; attempts: ResolutionAttempt[] };

export interface ResolutionQueryOptions {
  timeoutMs?: number;
  refresh?: boolean;
}

const DEVICE_ID = /^[A-Za-z0-9._:-]+$/;
const MAX_DEVICE_ID_LENGTH = 128;

export function isValidDeviceId(deviceId: string): boolean {
  return deviceId.length > 0 && deviceId.length <= MAX_DEVICE_ID_LENGTH && DEVICE_ID.test(deviceId);
}

type ResolvedRecord = Extract<ResolutionRecord, { kind: "resolved" }>;

/**
 * Process-wide resolution lookup. Resolved sizes are cached per device and a
 * device never has more than one lookup in flight. Unresolved lookups are
 * not cached, so the next query asks the device again.
 */
export class DeviceResolutionService {
  private readonly probes: ResolutionProbe[];
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private readonly records = new Map<string, ResolvedRecord>();
  private readonly inFlight = new Map<string, Promise<ResolutionRecord>>();

  constructor(probes: ResolutionProbe[], options: { timeoutMs?: number; logger?: Logger } = {}) {
    this.probes = probes;
    this.defaultTimeoutMs = options.timeoutMs ?? 5_000;
    this.logger = options.logger ?? Logger.silent();
  }

  async queryResolution(
    deviceId: string,
    options: ResolutionQueryOptions = {},
  ): Promise<ResolutionRecord> {
    if (!isValidDeviceId(deviceId)) {
      return { kind: "unresolved", reason: `Malformed device id "${deviceId}"`, attempts: [] };
    }

    const pending = this.inFlight.get(deviceId);
    if (pending) {
      return pending;
    }

    const cached = this.records.get(deviceId);
    if (cached && !options.refresh) {
      return cached;
    }

    const lookup = this.lookup(deviceId, options.timeoutMs ?? this.defaultTimeoutMs).finally(() => {
      this.inFlight.delete(deviceId);
    });
    this.inFlight.set(deviceId, lookup);
    return lookup;
  }

  cached(deviceId: string): ResolutionRecord | undefined {
    return this.records.get(deviceId);
  }

  forget(deviceId: string): void {
    this.records.delete(deviceId);
  }

  private async lookup(deviceId: string, timeoutMs: number): Promise<ResolutionRecord> {
    const attempts: ResolutionAttempt[] = [];

    for (const probe of this.probes) {
      try {
        const size = await withTimeout(
          () => probe.query(deviceId),
          timeoutMs,
          `Resolution probe ${probe.name}`,
        );
        if (size && size.width > 0 && size.height > 0) {
          const record: ResolvedRecord = {
            kind: "resolved",
            width: size.width,
            height: size.height,
            source: probe.name,
          };
          this.records.set(deviceId, record);
          this.logger.debug("Resolution resolved", { device: deviceId, ...size, source: probe.name });
          return record;
        }
        attempts.push({ probe: probe.name, outcome: "unparsed", message: "no size in output" });
      } catch (error) {
        attempts.push({
          probe: probe.name,
          outcome: error instanceof TimeoutError ? "timeout" : "transport",
          message: errorMessage(error),
        });
      }
    }

    const record: ResolutionRecord = {
      kind: "unresolved",
      reason: attempts.length > 0 ? "All resolution probes failed" : "No resolution probes configured",
      attempts,
    };
    this.logger.warn("Resolution unresolved", { device: deviceId, attempts });
    return record;
  }
}
