// compute-vertex-normals.ts

import { Algorithm, AlgorithmOptions } from "../algorithm";
import { Connector } from "../connector";
import {
  TriangleDataSet,
  TriangleDataSetType,
  TriangleVectorField,
  TriangleVectorFieldType,
} from "../data";

/**
 * Area-weighted vertex normals. Vertices that belong to no triangle get a
 * zero vector.
 */
export class ComputeVertexNormals extends Algorithm {
  public readonly input: Connector<TriangleDataSet>;
  public readonly output: Connector<TriangleVectorField>;

  constructor(options: AlgorithmOptions = {}) {
    super("Compute Vertex Normals", "Computes a normal vector for every mesh vertex.", options);
    this.input = this.addInput("Triangle Mesh", TriangleDataSetType, "The mesh.");
    this.output = this.addOutput("Normals", TriangleVectorFieldType, "Per-vertex unit normals.");
  }

  process(): void {
    const data = this.input.getData();
    if (!data) {
      this.output.clear();
      return;
    }

    const { vertices, triangles } = data.grid;
    const normals = new Float32Array(vertices.length);

    for (let t = 0; t < triangles.length; t += 3) {
      const a = triangles[t] * 3;
      const b = triangles[t + 1] * 3;
      const c = triangles[t + 2] * 3;

      const e1x = vertices[b] - vertices[a];
      const e1y = vertices[b + 1] - vertices[a + 1];
      const e1z = vertices[b + 2] - vertices[a + 2];
      const e2x = vertices[c] - vertices[a];
      const e2y = vertices[c + 1] - vertices[a + 1];
      const e2z = vertices[c + 2] - vertices[a + 2];

      // Unnormalized cross product, length proportional to triangle area.
      const nx = e1y * e2z - e1z * e2y;
      const ny = e1z * e2x - e1x * e2z;
      const nz = e1x * e2y - e1y * e2x;

      for (const v of [a, b, c]) {
        normals[v] += nx;
        normals[v + 1] += ny;
        normals[v + 2] += nz;
      }
    }

    for (let i = 0; i < normals.length; i += 3) {
      const length = Math.hypot(normals[i], normals[i + 1], normals[i + 2]);
      if (length > 0) {
        normals[i] /= length;
        normals[i + 1] /= length;
        normals[i + 2] /= length;
      }
    }

    this.output.setData(new TriangleVectorField(`${data.name} normals`, data.grid, normals));
    this.logger.debug({ vertices: vertices.length / 3 }, "Computed vertex normals");
  }
}
