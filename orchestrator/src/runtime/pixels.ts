import { Point, Region, Rgb, ScanMode } from "../types/script";
import { Size } from "./coordinates";

/** Decoded capture: tightly packed RGBA, row-major. */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface ScanMatch {
  x: number;
  y: number;
  confidence: number;
}

export const GRID_STRIDE = 10;

const MAX_DISTANCE = 255 * 3;

export function pixelAt(image: RgbaImage, x: number, y: number): Rgb {
  const offset = (y * image.width + x) * 4;
  return { r: image.data[offset], g: image.data[offset + 1], b: image.data[offset + 2] };
}

/** Logical point to image pixel, for captures whose size differs from the logical resolution. */
export function toImagePoint(point: Point, logical: Size, image: RgbaImage): Point {
  const x = Math.floor((point.x * image.width) / logical.width);
  const y = Math.floor((point.y * image.height) / logical.height);
  return {
    x: Math.min(Math.max(x, 0), image.width - 1),
    y: Math.min(Math.max(y, 0), image.height - 1),
  };
}

export function sampleLogical(image: RgbaImage, point: Point, logical: Size): Rgb {
  const mapped = toImagePoint(point, logical, image);
  return pixelAt(image, mapped.x, mapped.y);
}

export function withinTolerance(actual: Rgb, expected: Rgb, tolerance: number): boolean {
  return (
    Math.abs(actual.r - expected.r) <= tolerance &&
    Math.abs(actual.g - expected.g) <= tolerance &&
    Math.abs(actual.b - expected.b) <= tolerance
  );
}

export function colorDistance(a: Rgb, b: Rgb): number {
  return Math.abs(a.r - b.r) + Math.abs(a.g - b.g) + Math.abs(a.b - b.b);
}

export function scanRegion(
  image: RgbaImage,
  logical: Size,
  region: Region,
  target: Rgb,
  tolerance: number,
  mode: ScanMode,
): ScanMatch | null {
  const step = mode === "Grid" ? GRID_STRIDE : 1;
  let best: { x: number; y: number; distance: number } | null = null;

  for (let y = region.y1; y < region.y2; y += step) {
    for (let x = region.x1; x < region.x2; x += step) {
      const color = sampleLogical(image, { x, y }, logical);
      if (!withinTolerance(color, target, tolerance)) {
        continue;
      }
      const distance = colorDistance(color, target);
      if (mode === "Exact") {
        return { x, y, confidence: 1 - distance / MAX_DISTANCE };
      }
      if (!best || distance < best.distance) {
        best = { x, y, distance };
      }
    }
  }

  return best ? { x: best.x, y: best.y, confidence: 1 - best.distance / MAX_DISTANCE } : null;
}

/** RGB samples of a logical region, one triple per logical pixel. */
export function regionSamples(image: RgbaImage, logical: Size, region: Region): Uint8Array {
  const width = region.x2 - region.x1;
  const height = region.y2 - region.y1;
  const samples = new Uint8Array(width * height * 3);
  let offset = 0;
  for (let y = region.y1; y < region.y2; y += 1) {
    for (let x = region.x1; x < region.x2; x += 1) {
      const color = sampleLogical(image, { x, y }, logical);
      samples[offset] = color.r;
      samples[offset + 1] = color.g;
      samples[offset + 2] = color.b;
      offset += 3;
    }
  }
  return samples;
}

/** Mean per-channel absolute difference, normalised to [0, 1]. */
export function divergence(baseline: Uint8Array, current: Uint8Array): number {
  if (baseline.length === 0 || baseline.length !== current.length) {
    return baseline.length === current.length ? 0 : 1;
  }
  let total = 0;
  for (let index = 0; index < baseline.length; index += 1) {
    total += Math.abs(baseline[index] - current[index]);
  }
  return total / baseline.length / 255;
}
