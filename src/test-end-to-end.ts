// test-end-to-end.ts
// Whole pipeline: read a mesh, process it, render it. Plus configuration.

import { strict as assert } from "assert";
import * as path from "path";
import { ComputeVertexNormals } from "./algorithms/compute-vertex-normals";
import { MeshRenderer } from "./algorithms/mesh-renderer";
import { ScaleMesh } from "./algorithms/scale-mesh";
import { DirectionRenderer } from "./algorithms/direction-renderer";
import { DEFAULT_CONFIG, loadConfig } from "./config";
import { TriangleDataSet } from "./data";
import { ReaderError } from "./errors";
import { ProcessingNetwork } from "./processing-network";
import { RenderLoop } from "./render-loop";
import { AlgorithmStrategies, AlgorithmStrategy } from "./strategies";
import { RecordingObserver, createTestLogger } from "./testing";
import { RecordingSurface } from "./visualization";

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

  console.log(`\nEnd-to-end tests complete: ${pass} passed, ${fail} failed.`);
  if (fail > 0) {
    process.exit(1);
  }
}

const FIXTURE = path.join(__dirname, "fixtures", "mesh.obj");
const logger = createTestLogger();

// ============================================================================
// 1. Pipeline
// ============================================================================

tests["Read, connect, run and render a mesh"] = async () => {
  const network = new ProcessingNetwork({ name: "e2e", logger });
  const log: string[] = [];
  const renderer = new MeshRenderer({ logger });

  // Everything is queued before the worker starts.
  const read = network.loadFile(FIXTURE, new RecordingObserver(log, "read"));
  network.addAlgorithm(renderer, new RecordingObserver(log, "add"));
  const connect = network.connectAlgorithms(
    read.source.output,
    renderer.meshInput,
    new RecordingObserver(log, "connect")
  );
  const run = network.runNetwork(new RecordingObserver(log, "run"));

  network.start();
  await run.wait();

  assert.deepEqual(log, [
    "read:busy", "read:success",
    "add:busy", "add:success",
    "connect:busy", "connect:success",
    "run:busy", "run:success",
  ]);

  const data = read.getResult();
  assert.ok(data instanceof TriangleDataSet);
  assert.equal(data.grid.triangleCount, 6);
  assert.ok(connect.getConnection());

  const box = renderer.getBoundingBox();
  assert.equal(box.isDegenerate(), false);
  assert.deepEqual(box.min, [-1, 0, -1]);
  assert.deepEqual(box.max, [1, 3, 1]);

  const surface = new RecordingSurface();
  const loop = new RenderLoop(network, { surface, logger });
  const view = await loop.renderFrame();
  assert.deepEqual(view.bounds.max, [1, 3, 1]);
  assert.deepEqual(surface.calls, [
    { source: "Mesh Renderer", primitive: "triangles", vertexCount: 5, indexCount: 18 },
  ]);

  await loop.stop();
  await network.stop(true);
};

tests["Scaled mesh and its normals reach two renderers"] = async () => {
  const network = new ProcessingNetwork({ name: "e2e-scaled", logger });
  network.start();
  try {
    const read = network.loadFile(FIXTURE);
    const scale = new ScaleMesh(2, { logger });
    const normals = new ComputeVertexNormals({ logger });
    const meshRenderer = new MeshRenderer({ logger });
    const directionRenderer = new DirectionRenderer({ logger });
    for (const algorithm of [scale, normals, meshRenderer, directionRenderer]) {
      network.addAlgorithm(algorithm);
    }
    network.connectAlgorithms(read.source, "Data", scale, "Triangle Mesh");
    network.connectAlgorithms(scale, "Scaled Mesh", normals, "Triangle Mesh");
    network.connectAlgorithms(scale, "Scaled Mesh", meshRenderer, "Triangle Mesh");
    network.connectAlgorithms(scale, "Scaled Mesh", directionRenderer, "Triangle Mesh");
    network.connectAlgorithms(normals, "Normals", directionRenderer, "Directions");
    const run = network.runNetwork();
    await run.wait();

    assert.equal(run.isSuccessful(), true);
    assert.equal(network.connectionCount, 5);
    assert.equal(scale.output.getData()?.name, "mesh.obj (x2)");

    const box = meshRenderer.getBoundingBox();
    assert.deepEqual(box.min, [-2, 0, -2]);
    assert.deepEqual(box.max, [2, 6, 2]);

    // The apex normal points straight up.
    const apex = normals.output.getData()?.vectors.slice(12, 15);
    assert.deepEqual(Array.from(apex ?? []), [0, 1, 0]);

    const surface = new RecordingSurface();
    const loop = new RenderLoop(network, { surface, logger });
    await loop.renderFrame();
    assert.deepEqual(surface.calls, [
      { source: "Mesh Renderer", primitive: "triangles", vertexCount: 5, indexCount: 18 },
      { source: "Direction Renderer", primitive: "triangles", vertexCount: 5, indexCount: 18 },
      { source: "Direction Renderer", primitive: "lines", vertexCount: 10, indexCount: 0 },
    ]);
    await loop.stop();
  } finally {
    await network.stop(true);
  }
};

tests["Strategies switch which renderer draws"] = async () => {
  const network = new ProcessingNetwork({ name: "e2e-strategies", logger });
  network.start();
  try {
    const read = network.loadFile(FIXTURE);
    const strategies = new AlgorithmStrategies(network, { logger });
    const plain = new AlgorithmStrategy("plain");
    const directions = new AlgorithmStrategy("directions");
    plain.addAlgorithm(new MeshRenderer({ logger }));
    const normals = directions.addAlgorithm(new ComputeVertexNormals({ logger }));
    const glyphs = directions.addAlgorithm(new DirectionRenderer({ logger }));
    strategies.addStrategy(plain);
    strategies.addStrategy(directions);
    strategies.prepareProcessingNetwork();
    strategies.connectToAll(read.source, "Data", "Triangle Mesh");
    network.connectAlgorithms(normals, "Normals", glyphs, "Directions");
    await network.runNetwork().wait();

    const surface = new RecordingSurface();
    const loop = new RenderLoop(network, { surface, logger });
    await loop.renderFrame();
    assert.deepEqual(
      surface.calls.map((call) => call.source),
      ["Mesh Renderer"]
    );

    const rerun = strategies.select(1);
    assert.ok(rerun);
    await rerun.wait();
    surface.reset();
    await loop.renderFrame();
    assert.deepEqual(
      surface.calls.map((call) => `${call.source}/${call.primitive}`),
      ["Direction Renderer/triangles", "Direction Renderer/lines"]
    );
    await loop.stop();
  } finally {
    await network.stop(true);
  }
};

tests["A missing file fails the read and nothing downstream"] = async () => {
  const network = new ProcessingNetwork({ name: "e2e-missing", logger });
  network.start();
  try {
    const read = network.loadFile(path.join(__dirname, "fixtures", "absent.obj"));
    const renderer = new MeshRenderer({ logger });
    network.addAlgorithm(renderer);
    const connect = network.connectAlgorithms(read.source, "Data", renderer, "Triangle Mesh");
    const run = network.runNetwork();
    await run.wait();

    assert.ok(read.getFailure() instanceof ReaderError);
    // The source never joined, but its connector still exists.
    assert.equal(connect.isSuccessful(), true);
    assert.equal(run.isSuccessful(), true);
    assert.equal(network.hasAlgorithm(read.source), false);
    assert.equal(renderer.getBoundingBox().isEmpty(), true);
  } finally {
    await network.stop(true);
  }
};

tests["Scale factors must be finite"] = async () => {
  assert.throws(() => new ScaleMesh(Number.NaN, { logger }), /Scale factor must be finite, got NaN/);
  assert.throws(
    () => new ScaleMesh(Number.POSITIVE_INFINITY, { logger }),
    /Scale factor must be finite, got Infinity/
  );
  assert.throws(() => new ScaleMesh(1, { logger }).setFactor(Number.NaN), /must be finite/);
};

// ============================================================================
// 2. Configuration
// ============================================================================

tests["Configuration falls back to defaults"] = async () => {
  assert.deepEqual(loadConfig({}), DEFAULT_CONFIG);
  assert.deepEqual(
    loadConfig({
      PIPELINE_LOG_LEVEL: "LOUD",
      PIPELINE_NETWORK_NAME: "   ",
      PIPELINE_FRAME_INTERVAL_MS: "-5",
    }),
    DEFAULT_CONFIG
  );
};

tests["Configuration reads environment overrides"] = async () => {
  assert.deepEqual(
    loadConfig({
      PIPELINE_LOG_LEVEL: " Debug ",
      PIPELINE_NETWORK_NAME: "viewer",
      PIPELINE_FRAME_INTERVAL_MS: "33.7",
    }),
    { logLevel: "debug", networkName: "viewer", frameIntervalMs: 33 }
  );
};

// ============================================================================
// Run all tests
// ============================================================================

runAllTests().catch((err) => {
  console.error("Unhandled error during test execution:", err);
  process.exit(1);
});
