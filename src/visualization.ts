// visualization.ts
// Render-side contracts and the two primitives shared between worker and render loop.

import { BoundingBox } from "./data";

// ============================================================================
// Render Targets
// ============================================================================

export interface DrawCall {
  source: string;
  primitive: "triangles" | "lines" | "points";
  vertexCount: number;
  indexCount: number;
}

/** Receives the draw calls a visualization issues while rendering a frame. */
export interface RenderSurface {
  draw(call: DrawCall): void;
}

export class RecordingSurface implements RenderSurface {
  public calls: DrawCall[] = [];

  draw(call: DrawCall): void {
    this.calls.push(call);
  }

  reset(): void {
    this.calls = [];
  }
}

export interface View {
  readonly frame: number;
  /** Union of all visible bounding boxes, used for camera framing. */
  readonly bounds: BoundingBox;
  readonly hqMode: boolean;
  readonly surface: RenderSurface;
}

// ============================================================================
// Visualization Capability
// ============================================================================

/**
 * Lifecycle driven by the render loop, never by the network worker:
 * `prepare()`, then any number of `update(view)` / `render(view)` pairs, then
 * `finalize()`. Throw to report a failure; the render loop catches it.
 */
export interface Visualization {
  prepare(): void | Promise<void>;
  update(view: View): void | Promise<void>;
  render(view: View): void | Promise<void>;
  finalize(): void | Promise<void>;
  getBoundingBox(): BoundingBox;
  isRenderingRequested(): boolean;
}

// ============================================================================
// Worker / Render Loop Hand-off
// ============================================================================

/** Pending flag set by `process()` and test-and-cleared by `update()`. */
export class RenderRequest {
  private requested = false;

  request(): void {
    this.requested = true;
  }

  isRequested(): boolean {
    return this.requested;
  }

  consume(): boolean {
    const wasRequested = this.requested;
    this.requested = false;
    return wasRequested;
  }
}

/**
 * Latest-value slot. The worker publishes immutable snapshots; the render
 * loop swaps to the newest one whenever it reaches a safe point. Intermediate
 * snapshots published between two acquisitions are skipped.
 */
export class SnapshotSlot<T> {
  private latest: T | null = null;
  private current: T | null = null;
  private version = 0;
  private acquiredVersion = 0;

  publish(snapshot: T | null): void {
    this.latest = snapshot;
    this.version++;
  }

  /** Newest published snapshot, as seen by the worker. */
  peek(): T | null {
    return this.latest;
  }

  acquire(): { snapshot: T | null; changed: boolean } {
    const changed = this.acquiredVersion !== this.version;
    if (changed) {
      this.current = this.latest;
      this.acquiredVersion = this.version;
    }
    return { snapshot: this.current, changed };
  }

  /** Snapshot the render loop acquired last. */
  getCurrent(): T | null {
    return this.current;
  }
}
