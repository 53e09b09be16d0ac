// test-connectors.ts
// Data types, connectors, connections and the datasets that flow through them.

import { strict as assert } from "assert";
import { Algorithm } from "./algorithm";
import { Connection, Connector, ConnectorOwner } from "./connector";
import {
  BoundingBox,
  DataSetType,
  NumberType,
  StringType,
  TriangleDataSet,
  TriangleDataSetType,
  TriangleMesh,
  TriangleVectorField,
  TriangleVectorFieldType,
} from "./data";
import {
  ConnectorDirectionError,
  ConnectorTypeMismatchError,
  DuplicateConnectorError,
  NetworkError,
} from "./errors";
import { createTestLogger } from "./testing";

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

  console.log(`\nConnector tests complete: ${pass} passed, ${fail} failed.`);
  if (fail > 0) {
    process.exit(1);
  }
}

// ============================================================================
// Fixtures
// ============================================================================

const owner: ConnectorOwner = { id: "owner-1", name: "owner" };

function triangle(): TriangleMesh {
  return new TriangleMesh(new Float32Array([0, 0, 0, 2, 0, 0, 0, 4, 0]), new Uint32Array([0, 1, 2]));
}

class TwoInputs extends Algorithm {
  constructor() {
    super("twice", "", { logger: createTestLogger() });
    this.addInput("in", NumberType);
    this.addInput("in", NumberType);
  }

  process(): void {}
}

class SameNameBothWays extends Algorithm {
  constructor() {
    super("both", "", { logger: createTestLogger() });
    this.addInput("value", NumberType);
    this.addOutput("value", NumberType);
  }

  process(): void {}
}

// ============================================================================
// 1. Data Types
// ============================================================================

tests["Types are assignable to themselves and their ancestors"] = async () => {
  assert.equal(NumberType.isAssignableTo(NumberType), true);
  assert.equal(TriangleDataSetType.isAssignableTo(DataSetType), true);
  assert.equal(TriangleVectorFieldType.isAssignableTo(DataSetType), true);

  assert.equal(DataSetType.isAssignableTo(TriangleDataSetType), false);
  assert.equal(TriangleDataSetType.isAssignableTo(TriangleVectorFieldType), false);
  assert.equal(NumberType.isAssignableTo(StringType), false);
};

tests["Type guards check runtime values"] = async () => {
  const data = new TriangleDataSet("tri", triangle());
  assert.equal(NumberType.is(3), true);
  assert.equal(NumberType.is("3"), false);
  assert.equal(TriangleDataSetType.is(data), true);
  assert.equal(DataSetType.is(data), true);
  assert.equal(TriangleVectorFieldType.is(data), false);
  assert.equal(String(TriangleDataSetType), "TriangleDataSet");
};

// ============================================================================
// 2. Connectors
// ============================================================================

tests["Outputs hold the value they were given"] = async () => {
  const out = new Connector(owner, "out", "output", NumberType);
  assert.equal(out.hasData(), false);
  out.setData(12);
  assert.equal(out.getData(), 12);
  out.clear();
  assert.equal(out.getData(), undefined);
};

tests["Inputs read through their source"] = async () => {
  const out = new Connector(owner, "out", "output", NumberType);
  const input = new Connector(owner, "in", "input", NumberType);
  out.setData(3);
  assert.equal(input.getData(), undefined);

  input.attachSource(out);
  assert.equal(input.getData(), 3);
  out.setData(4);
  assert.equal(input.getData(), 4);

  input.detachSource();
  assert.equal(input.hasData(), false);
};

tests["Publishing to an input is rejected"] = async () => {
  const input = new Connector(owner, "in", "input", NumberType);
  assert.throws(
    () => input.setData(1),
    (error: unknown) =>
      error instanceof ConnectorDirectionError &&
      error.message === 'cannot publish to input "in" of "owner"'
  );
};

tests["Publishing a value of the wrong type is rejected"] = async () => {
  const loose = new Connector<unknown>(owner, "out", "output", NumberType);
  assert.throws(
    () => loose.setData("seven"),
    (error: unknown) =>
      error instanceof ConnectorTypeMismatchError &&
      error.code === "CONNECTOR_TYPE_MISMATCH" &&
      error.message === 'output "out" of "owner": expected number, got string'
  );
  assert.throws(
    () => loose.setData(new Float32Array(3)),
    (error: unknown) =>
      error instanceof ConnectorTypeMismatchError && error.actual === "Float32Array"
  );
  assert.equal(loose.hasData(), false);
};

tests["Connector names are unique per direction"] = async () => {
  assert.throws(
    () => new TwoInputs(),
    (error: unknown) =>
      error instanceof DuplicateConnectorError &&
      error.message === 'algorithm "twice" already has an input named "in"'
  );

  const both = new SameNameBothWays();
  assert.equal(both.getInput("value")?.direction, "input");
  assert.equal(both.getOutput("value")?.direction, "output");
  assert.equal(both.getInput("missing"), undefined);
};

// ============================================================================
// 3. Connections
// ============================================================================

tests["Connections validate direction"] = async () => {
  const out = new Connector(owner, "out", "output", NumberType);
  const input = new Connector(owner, "in", "input", NumberType);

  assert.throws(
    () => new Connection(input, input),
    (error: unknown) =>
      error instanceof ConnectorDirectionError &&
      error.message === "connection source owner:in is an input, expected an output"
  );
  assert.throws(
    () => new Connection(out, out),
    (error: unknown) =>
      error instanceof ConnectorDirectionError &&
      error.message === "connection target owner:out is an output, expected an input"
  );
};

tests["Connections validate type compatibility"] = async () => {
  const text = new Connector<unknown>(owner, "text", "output", StringType);
  const input = new Connector<unknown>(owner, "in", "input", NumberType);

  assert.throws(
    () => new Connection(text, input),
    (error: unknown) =>
      error instanceof ConnectorTypeMismatchError &&
      error instanceof NetworkError &&
      error.name === "ConnectorTypeMismatchError" &&
      error.message === "cannot connect owner:text to owner:in: expected number, got string"
  );
  assert.equal(input.getSource(), null);
};

tests["Constructing a connection leaves both connectors untouched"] = async () => {
  const out = new Connector<unknown>(owner, "mesh", "output", TriangleDataSetType);
  const input = new Connector<unknown>(owner, "data", "input", DataSetType);
  const connection = new Connection(out, input);

  assert.equal(connection.isLive(), false);
  assert.equal(input.getSource(), null);
  assert.equal(connection.matches(out, input), true);
  assert.equal(connection.sourceAlgorithm, owner);
  assert.equal(String(connection), "owner:mesh -> owner:data");

  input.attachSource(out);
  assert.equal(connection.isLive(), true);
};

// ============================================================================
// 4. Datasets
// ============================================================================

tests["Bounding boxes grow with their points"] = async () => {
  const empty = BoundingBox.empty();
  assert.equal(empty.isEmpty(), true);
  assert.equal(empty.isDegenerate(), true);
  assert.deepEqual(empty.getSize(), [0, 0, 0]);

  const point = empty.include([1, 2, 3]);
  assert.equal(point.isEmpty(), false);
  assert.equal(point.isDegenerate(), true);

  const box = BoundingBox.fromPoints([0, 0, 0, 2, 4, -2]);
  assert.deepEqual(box.min, [0, 0, -2]);
  assert.deepEqual(box.max, [2, 4, 0]);
  assert.deepEqual(box.getSize(), [2, 4, 2]);
  assert.deepEqual(box.getCenter(), [1, 2, -1]);
  assert.equal(box.isDegenerate(), false);

  assert.equal(box.union(empty), box);
  assert.equal(empty.union(box), box);
  const merged = box.union(point);
  assert.deepEqual(merged.min, [0, 0, -2]);
  assert.deepEqual(merged.max, [2, 4, 3]);
};

tests["Triangle meshes validate their arrays"] = async () => {
  const mesh = triangle();
  assert.equal(mesh.vertexCount, 3);
  assert.equal(mesh.triangleCount, 1);
  assert.deepEqual(mesh.getVertex(2), [0, 4, 0]);
  assert.equal(mesh.getBoundingBox(), mesh.getBoundingBox());
  assert.deepEqual(mesh.getBoundingBox().max, [2, 4, 0]);

  assert.throws(
    () => new TriangleMesh(new Float32Array([0, 0]), new Uint32Array(0)),
    /Vertex array length 2 is not a multiple of 3/
  );
  assert.throws(
    () => new TriangleMesh(new Float32Array(9), new Uint32Array([0, 1, 3])),
    /Triangle index 3 out of range \(3 vertices\)/
  );
};

tests["Datasets are immutable and checked against their grid"] = async () => {
  const mesh = triangle();
  const data = new TriangleDataSet("tri", mesh, new Float32Array(12));
  assert.equal(Object.isFrozen(data), true);
  assert.throws(
    () => new TriangleDataSet("tri", mesh, new Float32Array(9)),
    /Expected 12 color components, got 9/
  );
  assert.throws(
    () => new TriangleVectorField("dirs", mesh, new Float32Array(3)),
    /Expected 9 vector components, got 3/
  );
};

// ============================================================================
// Run all tests
// ============================================================================

runAllTests().catch((err) => {
  console.error("Unhandled error during test execution:", err);
  process.exit(1);
});
