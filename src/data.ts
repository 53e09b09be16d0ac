// data.ts
// Runtime type descriptors and the immutable datasets that flow through connectors.

// ============================================================================
// Data Types
// ============================================================================

/**
 * Runtime descriptor for the declared type of a connector. A type is
 * assignable to itself and to every ancestor in its `parent` chain.
 */
export class DataType<T> {
  constructor(
    public readonly name: string,
    private readonly guard: (value: unknown) => value is T,
    public readonly parent?: DataType<unknown>
  ) {}

  is(value: unknown): value is T {
    return this.guard(value);
  }

  isAssignableTo(other: DataType<unknown>): boolean {
    let current: DataType<unknown> | undefined = this;
    while (current) {
      if (current === other) return true;
      current = current.parent;
    }
    return false;
  }

  toString(): string {
    return this.name;
  }
}

export const NumberType = new DataType<number>(
  "number",
  (value): value is number => typeof value === "number"
);

export const StringType = new DataType<string>(
  "string",
  (value): value is string => typeof value === "string"
);

// ============================================================================
// Bounding Box
// ============================================================================

export type Vec3 = readonly [number, number, number];

export class BoundingBox {
  private constructor(
    public readonly min: Vec3,
    public readonly max: Vec3
  ) {}

  static empty(): BoundingBox {
    return new BoundingBox([Infinity, Infinity, Infinity], [-Infinity, -Infinity, -Infinity]);
  }

  static fromPoints(points: ArrayLike<number>): BoundingBox {
    let box = BoundingBox.empty();
    for (let i = 0; i + 2 < points.length; i += 3) {
      box = box.include([points[i], points[i + 1], points[i + 2]]);
    }
    return box;
  }

  isEmpty(): boolean {
    return this.min[0] > this.max[0] || this.min[1] > this.max[1] || this.min[2] > this.max[2];
  }

  include(point: Vec3): BoundingBox {
    return new BoundingBox(
      [
        Math.min(this.min[0], point[0]),
        Math.min(this.min[1], point[1]),
        Math.min(this.min[2], point[2]),
      ],
      [
        Math.max(this.max[0], point[0]),
        Math.max(this.max[1], point[1]),
        Math.max(this.max[2], point[2]),
      ]
    );
  }

  union(other: BoundingBox): BoundingBox {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;
    return this.include(other.min).include(other.max);
  }

  getSize(): Vec3 {
    if (this.isEmpty()) return [0, 0, 0];
    return [this.max[0] - this.min[0], this.max[1] - this.min[1], this.max[2] - this.min[2]];
  }

  getCenter(): Vec3 {
    if (this.isEmpty()) return [0, 0, 0];
    return [
      (this.min[0] + this.max[0]) / 2,
      (this.min[1] + this.max[1]) / 2,
      (this.min[2] + this.max[2]) / 2,
    ];
  }

  /** True when the box is empty or has zero extent along every axis. */
  isDegenerate(): boolean {
    const [x, y, z] = this.getSize();
    return this.isEmpty() || (x === 0 && y === 0 && z === 0);
  }
}

// ============================================================================
// Datasets
// ============================================================================

export abstract class DataSet {
  constructor(public readonly name: string) {}
}

export const DataSetType = new DataType<DataSet>(
  "DataSet",
  (value): value is DataSet => value instanceof DataSet
);

/**
 * Triangle grid: packed xyz vertex positions and packed vertex indices, three
 * per triangle. Treat the arrays as read-only once constructed.
 */
export class TriangleMesh {
  private boundingBox: BoundingBox | null = null;

  constructor(
    public readonly vertices: Float32Array,
    public readonly triangles: Uint32Array
  ) {
    if (vertices.length % 3 !== 0) {
      throw new Error(`Vertex array length ${vertices.length} is not a multiple of 3`);
    }
    if (triangles.length % 3 !== 0) {
      throw new Error(`Index array length ${triangles.length} is not a multiple of 3`);
    }
    const vertexCount = vertices.length / 3;
    for (const index of triangles) {
      if (index >= vertexCount) {
        throw new Error(`Triangle index ${index} out of range (${vertexCount} vertices)`);
      }
    }
  }

  get vertexCount(): number {
    return this.vertices.length / 3;
  }

  get triangleCount(): number {
    return this.triangles.length / 3;
  }

  getVertex(index: number): Vec3 {
    const i = index * 3;
    return [this.vertices[i], this.vertices[i + 1], this.vertices[i + 2]];
  }

  getBoundingBox(): BoundingBox {
    if (!this.boundingBox) {
      this.boundingBox = BoundingBox.fromPoints(this.vertices);
    }
    return this.boundingBox;
  }
}

export class TriangleDataSet extends DataSet {
  constructor(
    name: string,
    public readonly grid: TriangleMesh,
    public readonly colors: Float32Array | null = null
  ) {
    super(name);
    if (colors && colors.length !== grid.vertexCount * 4) {
      throw new Error(
        `Expected ${grid.vertexCount * 4} color components, got ${colors.length}`
      );
    }
    Object.freeze(this);
  }
}

export const TriangleDataSetType = new DataType<TriangleDataSet>(
  "TriangleDataSet",
  (value): value is TriangleDataSet => value instanceof TriangleDataSet,
  DataSetType
);

/** One xyz vector per vertex of `grid`. */
export class TriangleVectorField extends DataSet {
  constructor(
    name: string,
    public readonly grid: TriangleMesh,
    public readonly vectors: Float32Array
  ) {
    super(name);
    if (vectors.length !== grid.vertices.length) {
      throw new Error(
        `Expected ${grid.vertices.length} vector components, got ${vectors.length}`
      );
    }
    Object.freeze(this);
  }
}

export const TriangleVectorFieldType = new DataType<TriangleVectorField>(
  "TriangleVectorField",
  (value): value is TriangleVectorField => value instanceof TriangleVectorField,
  DataSetType
);
