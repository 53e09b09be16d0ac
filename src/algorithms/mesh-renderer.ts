// mesh-renderer.ts
// Draws a triangle mesh. process() runs on the network worker; everything else on the render loop.

import { AlgorithmOptions, VisualizationAlgorithm } from "../algorithm";
import { Connector } from "../connector";
import { BoundingBox, TriangleDataSet, TriangleDataSetType } from "../data";
import { SnapshotSlot, View } from "../visualization";

interface MeshBuffers {
  vertexCount: number;
  indexCount: number;
}

export class MeshRenderer extends VisualizationAlgorithm {
  public readonly meshInput: Connector<TriangleDataSet>;

  private readonly mesh = new SnapshotSlot<TriangleDataSet>();
  private buffers: MeshBuffers | null = null;
  private prepared = false;
  private uploads = 0;

  constructor(options: AlgorithmOptions = {}) {
    super("Mesh Renderer", "Renders a triangle mesh to screen.", options);
    this.meshInput = this.addInput(
      "Triangle Mesh",
      TriangleDataSetType,
      "The triangle mesh to render."
    );
  }

  process(): void {
    const data = this.meshInput.getData() ?? null;
    if (data !== this.mesh.peek()) {
      this.mesh.publish(data);
      // The render loop does not redraw on its own; ask for a refresh.
      this.requestRender();
    }
  }

  getBoundingBox(): BoundingBox {
    const data = this.mesh.peek();
    return data ? data.grid.getBoundingBox() : BoundingBox.empty();
  }

  prepare(): void {
    this.logger.debug("Vis prepare");
    this.prepared = true;
    // Buffers from an earlier prepare/finalize cycle are gone.
    this.requestRender();
  }

  update(_view: View): void {
    if (!this.prepared || !this.renderRequest.consume()) {
      return;
    }
    const { snapshot } = this.mesh.acquire();
    this.buffers = snapshot
      ? { vertexCount: snapshot.grid.vertexCount, indexCount: snapshot.grid.triangles.length }
      : null;
    this.uploads++;
    this.logger.debug({ uploads: this.uploads }, "Vis update");
  }

  render(view: View): void {
    if (!this.prepared || !this.buffers) {
      return;
    }
    view.surface.draw({
      source: this.name,
      primitive: "triangles",
      vertexCount: this.buffers.vertexCount,
      indexCount: this.buffers.indexCount,
    });
  }

  finalize(): void {
    this.logger.debug("Vis finalize");
    this.prepared = false;
    this.buffers = null;
  }

  /** Number of times update() rebuilt the draw buffers. */
  getUploadCount(): number {
    return this.uploads;
  }

  /** Dataset the render loop currently draws. */
  getRenderedMesh(): TriangleDataSet | null {
    return this.mesh.getCurrent();
  }
}
