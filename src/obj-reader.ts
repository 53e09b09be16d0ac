// obj-reader.ts
// Wavefront OBJ reader: vertex positions, optional vertex colors, polygon faces.

import * as fs from "fs";
import * as path from "path";
import { TriangleDataSet, TriangleDataSetType, TriangleMesh } from "./data";
import { ReaderError } from "./errors";
import { ExtensionReader } from "./reader";

export class ObjReader extends ExtensionReader<TriangleDataSet> {
  constructor() {
    super("Wavefront OBJ", TriangleDataSetType, [".obj"]);
  }

  async load(fileName: string): Promise<TriangleDataSet> {
    let text: string;
    try {
      text = await fs.promises.readFile(fileName, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ReaderError(fileName, message, { cause: error });
    }
    return parseObj(text, path.basename(fileName), fileName);
  }
}

function parseIndex(token: string, vertexCount: number, fileName: string, line: number): number {
  // "v", "v/vt", "v//vn" and "v/vt/vn" all start with the position index.
  const raw = Number.parseInt(token.split("/")[0], 10);
  if (!Number.isFinite(raw) || raw === 0) {
    throw new ReaderError(fileName, `line ${line}: invalid face index "${token}"`);
  }
  // Negative indices count back from the most recent vertex.
  const index = raw > 0 ? raw - 1 : vertexCount + raw;
  if (index < 0 || index >= vertexCount) {
    throw new ReaderError(fileName, `line ${line}: face index ${raw} out of range`);
  }
  return index;
}

/**
 * Parses OBJ text into a triangle dataset. Polygons are fan-triangulated.
 * Vertex colors (`v x y z r g b`) are kept only when every vertex has one.
 */
export function parseObj(text: string, name: string, fileName = name): TriangleDataSet {
  const positions: number[] = [];
  const colors: number[] = [];
  const indices: number[] = [];
  let coloredVertices = 0;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i].trim();
    if (line === "" || line.startsWith("#")) continue;

    const [keyword, ...args] = line.split(/\s+/);
    switch (keyword) {
      case "v": {
        const values = args.map(Number);
        if (values.length < 3 || values.slice(0, 3).some((v) => !Number.isFinite(v))) {
          throw new ReaderError(fileName, `line ${lineNumber}: malformed vertex "${line}"`);
        }
        positions.push(values[0], values[1], values[2]);
        if (values.length >= 6 && values.slice(3, 6).every(Number.isFinite)) {
          colors.push(values[3], values[4], values[5], 1);
          coloredVertices++;
        } else {
          colors.push(1, 1, 1, 1);
        }
        break;
      }
      case "f": {
        if (args.length < 3) {
          throw new ReaderError(fileName, `line ${lineNumber}: face needs at least 3 vertices`);
        }
        const vertexCount = positions.length / 3;
        const face = args.map((token) => parseIndex(token, vertexCount, fileName, lineNumber));
        for (let k = 1; k + 1 < face.length; k++) {
          indices.push(face[0], face[k], face[k + 1]);
        }
        break;
      }
      default:
        // Normals, texture coordinates, groups and materials are not used.
        break;
    }
  }

  if (positions.length === 0) {
    throw new ReaderError(fileName, "no vertices found");
  }

  const vertexCount = positions.length / 3;
  const grid = new TriangleMesh(new Float32Array(positions), new Uint32Array(indices));
  const vertexColors = coloredVertices === vertexCount ? new Float32Array(colors) : null;
  return new TriangleDataSet(name, grid, vertexColors);
}
