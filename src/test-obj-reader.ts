// test-obj-reader.ts
// OBJ parsing and reader selection.

import { strict as assert } from "assert";
import * as path from "path";
import { TriangleDataSetType } from "./data";
import { ReaderError } from "./errors";
import { ObjReader, parseObj } from "./obj-reader";

// ============================================================================
// Test Runner
// ============================================================================

const tests: { [key: string]: () => Promise<void> } = {};

async function runAllTests() {
  let pass = 0;
  let fail = 0;

  for (const testName in tests) {
    try {
      await tests[testName]();
      console.log(`✓ ${testName}`);
      pass++;
    } catch (error) {
      console.error(`✗ ${testName}`);
      console.error(error);
      fail++;
    }
  }

  console.log(`\nOBJ reader tests complete: ${pass} passed, ${fail} failed.`);
  if (fail > 0) {
    process.exit(1);
  }
}

const FIXTURE = path.join(__dirname, "fixtures", "mesh.obj");

function isReaderError(pattern: RegExp) {
  return (error: unknown) => error instanceof ReaderError && pattern.test(error.message);
}

// ============================================================================
// 1. Selection
// ============================================================================

tests["Reader accepts .obj files case-insensitively"] = async () => {
  const reader = new ObjReader();
  assert.equal(reader.canLoad("model.obj"), true);
  assert.equal(reader.canLoad("/data/MODEL.OBJ"), true);
  assert.equal(reader.canLoad("model.stl"), false);
  assert.equal(reader.canLoad("obj"), false);
  assert.equal(reader.produces, TriangleDataSetType);
};

// ============================================================================
// 2. Parsing
// ============================================================================

tests["Fixture loads as a triangulated pyramid"] = async () => {
  const data = await new ObjReader().load(FIXTURE);

  assert.equal(data.name, "mesh.obj");
  assert.equal(data.grid.vertexCount, 5);
  assert.equal(data.grid.triangleCount, 6);
  assert.deepEqual(
    Array.from(data.grid.triangles),
    [0, 1, 2, 0, 2, 3, 0, 4, 1, 1, 4, 2, 2, 4, 3, 0, 3, 4]
  );
  assert.deepEqual(data.grid.getVertex(4), [0, 3, 0]);
  assert.equal(data.colors, null);

  const box = data.grid.getBoundingBox();
  assert.deepEqual(box.min, [-1, 0, -1]);
  assert.deepEqual(box.max, [1, 3, 1]);
};

tests["Vertex colors are kept when every vertex has one"] = async () => {
  const data = parseObj("v 0 0 0 1 0 0\nv 1 0 0 0 1 0\nv 0 1 0 0 0 1\nf 1 2 3\n", "rgb");
  assert.deepEqual(Array.from(data.colors ?? []), [1, 0, 0, 1, 0, 1, 0, 1, 0, 0, 1, 1]);

  const partial = parseObj("v 0 0 0 1 0 0\nv 1 0 0\nv 0 1 0\nf 1 2 3\n", "partial");
  assert.equal(partial.colors, null);
};

tests["Comments, blank lines and CRLF endings are ignored"] = async () => {
  const data = parseObj("# header\r\n\r\nv 0 0 0\r\nv 1 0 0\r\nv 0 1 0\r\ng group\r\nf 1 2 3\r\n", "crlf");
  assert.equal(data.grid.vertexCount, 3);
  assert.deepEqual(Array.from(data.grid.triangles), [0, 1, 2]);
};

tests["A file with vertices only has no triangles"] = async () => {
  const data = parseObj("v 0 0 0\nv 1 1 1\n", "cloud");
  assert.equal(data.grid.vertexCount, 2);
  assert.equal(data.grid.triangleCount, 0);
};

// ============================================================================
// 3. Errors
// ============================================================================

tests["Malformed vertices are reported with their line"] = async () => {
  assert.throws(
    () => parseObj("v 0 0 0\nv 1 x 0\n", "bad", "bad.obj"),
    isReaderError(/^failed to read "bad\.obj": line 2: malformed vertex "v 1 x 0"$/)
  );
};

tests["Face indices must be valid and in range"] = async () => {
  const vertices = "v 0 0 0\nv 1 0 0\nv 0 1 0\n";
  assert.throws(
    () => parseObj(`${vertices}f 1 2 4\n`, "range"),
    isReaderError(/line 4: face index 4 out of range/)
  );
  assert.throws(
    () => parseObj(`${vertices}f 1 -4 2\n`, "negative"),
    isReaderError(/line 4: face index -4 out of range/)
  );
  assert.throws(
    () => parseObj(`${vertices}f 0 1 2\n`, "zero"),
    isReaderError(/line 4: invalid face index "0"/)
  );
  assert.throws(
    () => parseObj(`${vertices}f 1 2\n`, "short"),
    isReaderError(/line 4: face needs at least 3 vertices/)
  );
};

tests["Files without vertices are rejected"] = async () => {
  assert.throws(
    () => parseObj("# nothing here\n", "empty", "empty.obj"),
    isReaderError(/^failed to read "empty\.obj": no vertices found$/)
  );
};

tests["Missing files reject with a reader error"] = async () => {
  const missing = path.join(__dirname, "fixtures", "missing.obj");
  await assert.rejects(new ObjReader().load(missing), (error: unknown) => {
    return (
      error instanceof ReaderError &&
      error.fileName === missing &&
      error.code === "READER_FAILED" &&
      error.cause instanceof Error
    );
  });
};

// ============================================================================
// Run all tests
// ============================================================================

runAllTests().catch((err) => {
  console.error("Unhandled error during test execution:", err);
  process.exit(1);
});
