import { OutOfRangeError } from "./errors";
import { Point, Region } from "../types/script";

export interface Size {
  width: number;
  height: number;
}

/** Physical placement of a target's display, in host pixels. */
export interface SurfaceRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Maps logical script coordinates onto a target surface. Scale factors are
 * recomputed only when the logical size or the surface changes.
 */
export class CoordinateMapper {
  private logical: Size = { width: 0, height: 0 };
  private surface: SurfaceRect = { x: 0, y: 0, width: 0, height: 0 };
  private scaleX = 1;
  private scaleY = 1;

  constructor(logical?: Size, surface?: SurfaceRect) {
    if (logical && surface) {
      this.update(logical, surface);
    }
  }

  get scale(): { x: number; y: number } {
    return { x: this.scaleX, y: this.scaleY };
  }

  get logicalSize(): Size {
    return { ...this.logical };
  }

  get surfaceRect(): SurfaceRect {
    return { ...this.surface };
  }

  /** Returns true when the scale factors were recomputed. */
  update(logical: Size, surface: SurfaceRect): boolean {
    if (logical.width <= 0 || logical.height <= 0) {
      throw new OutOfRangeError(
        `Logical resolution must be positive (got ${logical.width}x${logical.height})`,
      );
    }
    const unchanged =
      logical.width === this.logical.width &&
      logical.height === this.logical.height &&
      surface.x === this.surface.x &&
      surface.y === this.surface.y &&
      surface.width === this.surface.width &&
      surface.height === this.surface.height;
    if (unchanged) {
      return false;
    }
    this.logical = { ...logical };
    this.surface = { ...surface };
    this.scaleX = surface.width / logical.width;
    this.scaleY = surface.height / logical.height;
    return true;
  }

  assertInside(x: number, y: number): void {
    if (!(x >= 0 && x < this.logical.width && y >= 0 && y < this.logical.height)) {
      throw new OutOfRangeError(
        `Point (${x}, ${y}) is outside the logical area ${this.logical.width}x${this.logical.height}`,
      );
    }
  }

  assertRegion(region: Region): void {
    if (
      region.x1 < 0 ||
      region.y1 < 0 ||
      region.x2 > this.logical.width ||
      region.y2 > this.logical.height ||
      region.x2 <= region.x1 ||
      region.y2 <= region.y1
    ) {
      throw new OutOfRangeError(
        `Region (${region.x1}, ${region.y1})-(${region.x2}, ${region.y2}) is outside the logical area ${this.logical.width}x${this.logical.height}`,
      );
    }
  }

  localToScreen(x: number, y: number): Point {
    this.assertInside(x, y);
    return {
      x: this.surface.x + Math.round(x * this.scaleX),
      y: this.surface.y + Math.round(y * this.scaleY),
    };
  }
}
