// direction-renderer.ts
// Renders a mesh together with one direction glyph per vertex.

import { AlgorithmOptions, VisualizationAlgorithm } from "../algorithm";
import { Connector } from "../connector";
import {
  BoundingBox,
  TriangleDataSet,
  TriangleDataSetType,
  TriangleVectorField,
  TriangleVectorFieldType,
} from "../data";
import { SnapshotSlot, View } from "../visualization";

interface DirectionSnapshot {
  mesh: TriangleDataSet;
  directions: TriangleVectorField;
}

export class DirectionRenderer extends VisualizationAlgorithm {
  public readonly meshInput: Connector<TriangleDataSet>;
  public readonly directionInput: Connector<TriangleVectorField>;

  private readonly snapshot = new SnapshotSlot<DirectionSnapshot>();
  private prepared = false;
  private glyphs = 0;
  private triangleIndices = 0;
  private triangleVertices = 0;

  constructor(options: AlgorithmOptions = {}) {
    super(
      "Direction Renderer",
      "Shows directional information on a triangle mesh as line glyphs.",
      options
    );
    this.meshInput = this.addInput(
      "Triangle Mesh",
      TriangleDataSetType,
      "The triangle mesh on which the directions are shown."
    );
    this.directionInput = this.addInput(
      "Directions",
      TriangleVectorFieldType,
      "Directional information on the triangle mesh."
    );
  }

  process(): void {
    let mesh = this.meshInput.getData() ?? null;
    let directions = this.directionInput.getData() ?? null;

    // Only valid if both inputs live on the same grid.
    if (mesh && directions && mesh.grid !== directions.grid) {
      this.logger.debug("Grids do not match. Ignoring new data.");
      mesh = null;
      directions = null;
    }

    const current = this.snapshot.peek();
    const next = mesh && directions ? { mesh, directions } : null;
    const changed =
      (current?.mesh ?? null) !== (next?.mesh ?? null) ||
      (current?.directions ?? null) !== (next?.directions ?? null);

    if (changed) {
      this.snapshot.publish(next);
      this.requestRender();
    }
  }

  getBoundingBox(): BoundingBox {
    const current = this.snapshot.peek();
    return current ? current.mesh.grid.getBoundingBox() : BoundingBox.empty();
  }

  prepare(): void {
    this.prepared = true;
    this.requestRender();
  }

  update(_view: View): void {
    if (!this.prepared || !this.renderRequest.consume()) {
      return;
    }
    const { snapshot } = this.snapshot.acquire();
    this.glyphs = snapshot ? snapshot.directions.vectors.length / 3 : 0;
    this.triangleVertices = snapshot ? snapshot.mesh.grid.vertexCount : 0;
    this.triangleIndices = snapshot ? snapshot.mesh.grid.triangles.length : 0;
  }

  render(view: View): void {
    if (!this.prepared || this.glyphs === 0) {
      return;
    }
    view.surface.draw({
      source: this.name,
      primitive: "triangles",
      vertexCount: this.triangleVertices,
      indexCount: this.triangleIndices,
    });
    // Two line vertices per glyph: the vertex and its offset along the direction.
    view.surface.draw({
      source: this.name,
      primitive: "lines",
      vertexCount: this.glyphs * 2,
      indexCount: 0,
    });
  }

  finalize(): void {
    this.prepared = false;
    this.glyphs = 0;
    this.triangleIndices = 0;
    this.triangleVertices = 0;
  }
}
