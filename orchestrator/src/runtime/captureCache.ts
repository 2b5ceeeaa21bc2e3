import { CapabilityError, errorMessage, withTimeout } from "./errors";
import { RgbaImage } from "./pixels";
import { Logger } from "../logging/logger";
import { Region } from "../types/script";

export interface CaptureProvider {
  readonly name: string;
  capture(targetId: string): Promise<RgbaImage>;
}

export interface CaptureEntry {
  image: RgbaImage;
  capturedAt: number;
  provider: string;
}

export interface CaptureCacheOptions {
  providers: CaptureProvider[];
  ttlMs?: number;
  providerTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface CaptureRequest {
  forceRefresh?: boolean;
  /** Crop, in image pixels, applied to the returned copy only. */
  region?: Region;
}

export function cropImage(image: RgbaImage, region: Region): RgbaImage {
  const x1 = Math.max(0, region.x1);
  const y1 = Math.max(0, region.y1);
  const x2 = Math.min(image.width, region.x2);
  const y2 = Math.min(image.height, region.y2);
  const width = Math.max(0, x2 - x1);
  const height = Math.max(0, y2 - y1);
  const data = new Uint8Array(width * height * 4);
  for (let row = 0; row < height; row += 1) {
    const start = ((y1 + row) * image.width + x1) * 4;
    data.set(image.data.subarray(start, start + width * 4), row * width * 4);
  }
  return { width, height, data };
}

/**
 * Short-lived per-target screen captures. Providers are tried in order,
 * starting with the one that last succeeded for the target.
 */
export class CaptureCache {
  private readonly providers: CaptureProvider[];
  private readonly ttlMs: number;
  private readonly providerTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly entries = new Map<string, CaptureEntry>();
  private readonly inFlight = new Map<string, Promise<CaptureEntry>>();
  private readonly preferred = new Map<string, string>();

  constructor(options: CaptureCacheOptions) {
    if (options.providers.length === 0) {
      throw new CapabilityError("Capture cache needs at least one provider");
    }
    this.providers = options.providers;
    this.ttlMs = options.ttlMs ?? 1_000;
    this.providerTimeoutMs = options.providerTimeoutMs ?? 3_000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? Logger.silent();
  }

  async get(targetId: string, request: CaptureRequest = {}): Promise<CaptureEntry> {
    const entry = await this.fresh(targetId, request.forceRefresh ?? false);
    if (!request.region) {
      return entry;
    }
    return { ...entry, image: cropImage(entry.image, request.region) };
  }

  peek(targetId: string): CaptureEntry | undefined {
    return this.entries.get(targetId);
  }

  invalidate(targetId?: string): void {
    if (targetId === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(targetId);
  }

  private async fresh(targetId: string, forceRefresh: boolean): Promise<CaptureEntry> {
    const cached = this.entries.get(targetId);
    if (!forceRefresh && cached && this.now() - cached.capturedAt < this.ttlMs) {
      return cached;
    }

    const pending = this.inFlight.get(targetId);
    if (pending) {
      return pending;
    }

    const capture = this.capture(targetId).finally(() => {
      this.inFlight.delete(targetId);
    });
    this.inFlight.set(targetId, capture);
    return capture;
  }

  private orderedProviders(targetId: string): CaptureProvider[] {
    const preferred = this.preferred.get(targetId);
    if (!preferred) {
      return this.providers;
    }
    return [
      ...this.providers.filter((provider) => provider.name === preferred),
      ...this.providers.filter((provider) => provider.name !== preferred),
    ];
  }

  private async capture(targetId: string): Promise<CaptureEntry> {
    const failures: string[] = [];
    for (const provider of this.orderedProviders(targetId)) {
      try {
        const image = await withTimeout(
          () => provider.capture(targetId),
          this.providerTimeoutMs,
          `Capture via ${provider.name}`,
        );
        const entry: CaptureEntry = { image, capturedAt: this.now(), provider: provider.name };
        this.entries.set(targetId, entry);
        this.preferred.set(targetId, provider.name);
        return entry;
      } catch (error) {
        failures.push(`${provider.name}: ${errorMessage(error)}`);
        this.logger.debug("Capture provider failed", {
          target: targetId,
          provider: provider.name,
          error: errorMessage(error),
        });
      }
    }
    throw new CapabilityError(`No capture provider succeeded for ${targetId}`, failures);
  }
}
