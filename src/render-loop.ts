// render-loop.ts
// Frame loop driving prepare/update/render/finalize, independent of the network worker.

import pino from "pino";
import { Algorithm } from "./algorithm";
import { getDefaultLogger, loadConfig } from "./config";
import { BoundingBox } from "./data";
import { toError } from "./errors";
import { ProcessingNetwork } from "./processing-network";
import { RecordingSurface, RenderSurface, View, Visualization } from "./visualization";

export type RenderPhase = "prepare" | "update" | "render" | "finalize" | "bounds";

export interface RenderError {
  error: Error;
  phase: RenderPhase;
  algorithmId: string;
  algorithmName: string;
  frame: number;
}

export interface RenderLoopOptions {
  frameIntervalMs?: number;
  hqMode?: boolean;
  surface?: RenderSurface;
  logger?: pino.Logger;
  /** Rendering failures end up here, never in the network worker. */
  onError?: (error: RenderError) => void;
}

interface Target {
  visualization: Visualization;
  algorithm: Algorithm;
}

export class RenderLoop {
  public readonly surface: RenderSurface;

  private readonly frameIntervalMs: number;
  private readonly hqMode: boolean;
  private readonly logger: pino.Logger;
  private readonly onError?: (error: RenderError) => void;

  private readonly prepared = new Map<Visualization, Algorithm>();
  // Visualizations whose prepare() failed are left alone.
  private readonly broken = new Set<Visualization>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pendingFrame: Promise<void> | null = null;
  private running = false;
  private frame = 0;

  constructor(
    private readonly network: ProcessingNetwork,
    options: RenderLoopOptions = {}
  ) {
    this.frameIntervalMs = options.frameIntervalMs ?? loadConfig().frameIntervalMs;
    this.hqMode = options.hqMode ?? false;
    this.surface = options.surface ?? new RecordingSurface();
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: "render-loop" });
    this.onError = options.onError;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.debug({ frameIntervalMs: this.frameIntervalMs }, "Render loop started");
    this.scheduleFrame();
  }

  /** Stops the frame timer, waits for a frame in progress, then finalizes everything. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pendingFrame) {
      await this.pendingFrame;
    }

    for (const [visualization, algorithm] of this.prepared) {
      await this.invoke("finalize", { visualization, algorithm }, () => visualization.finalize());
    }
    this.prepared.clear();
    this.broken.clear();
    this.logger.debug({ frames: this.frame }, "Render loop stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  getFrameCount(): number {
    return this.frame;
  }

  isPrepared(visualization: Visualization): boolean {
    return this.prepared.has(visualization);
  }

  private scheduleFrame(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pendingFrame = this.renderFrame()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.logger.error({ err: toError(error) }, "Render frame failed");
        })
        .finally(() => {
          this.pendingFrame = null;
          if (this.running) {
            this.scheduleFrame();
          }
        });
    }, this.frameIntervalMs);
  }

  /**
   * Renders one frame for every active visualization in the network, using a
   * snapshot taken at the start of the frame.
   */
  async renderFrame(): Promise<View> {
    const targets: Target[] = [];
    this.network.visitVisualizations((visualization, algorithm) => {
      if (algorithm.isActive() && !this.broken.has(visualization)) {
        targets.push({ visualization, algorithm });
      }
    });

    this.frame++;
    let bounds = BoundingBox.empty();
    for (const target of targets) {
      try {
        bounds = bounds.union(target.visualization.getBoundingBox());
      } catch (error) {
        this.report("bounds", target, error);
      }
    }
    const view: View = { frame: this.frame, bounds, hqMode: this.hqMode, surface: this.surface };

    for (const target of targets) {
      const { visualization, algorithm } = target;
      if (!this.prepared.has(visualization)) {
        const ok = await this.invoke("prepare", target, () => visualization.prepare());
        if (!ok) {
          this.broken.add(visualization);
          continue;
        }
        this.prepared.set(visualization, algorithm);
      }
      const updated = await this.invoke("update", target, () => visualization.update(view));
      if (updated) {
        await this.invoke("render", target, () => visualization.render(view));
      }
    }
    return view;
  }

  private async invoke(
    phase: RenderPhase,
    target: Target,
    call: () => void | Promise<void>
  ): Promise<boolean> {
    try {
      await call();
      return true;
    } catch (error) {
      this.report(phase, target, error);
      return false;
    }
  }

  private report(phase: RenderPhase, target: Target, error: unknown): void {
    const renderError: RenderError = {
      error: toError(error),
      phase,
      algorithmId: target.algorithm.id,
      algorithmName: target.algorithm.name,
      frame: this.frame,
    };
    this.logger.error(
      { phase, algorithm: renderError.algorithmName, err: renderError.error },
      `Visualization ${renderError.algorithmName} failed in ${phase}`
    );
    try {
      this.onError?.(renderError);
    } catch (handlerError) {
      this.logger.error({ err: toError(handlerError) }, "Render error handler threw");
    }
  }
}
