// test-rendering.ts
// Render loop lifecycle, snapshot hand-off and failure isolation.

import { strict as assert } from "assert";
import { VisualizationAlgorithm } from "./algorithm";
import { ComputeVertexNormals } from "./algorithms/compute-vertex-normals";
import { DirectionRenderer } from "./algorithms/direction-renderer";
import { MeshRenderer } from "./algorithms/mesh-renderer";
import {
  BoundingBox,
  NumberType,
  TriangleDataSet,
  TriangleDataSetType,
  TriangleMesh,
  TriangleVectorField,
  TriangleVectorFieldType,
} from "./data";
import { ProcessingNetwork } from "./processing-network";
import { RenderError, RenderLoop, RenderPhase } from "./render-loop";
import { TestAlgorithm, createTestLogger } from "./testing";
import { RecordingSurface, RenderRequest, SnapshotSlot, View } from "./visualization";

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

  console.log(`\nRendering tests complete: ${pass} passed, ${fail} failed.`);
  if (fail > 0) {
    process.exit(1);
  }
}

// ============================================================================
// Fixtures
// ============================================================================

const logger = createTestLogger();

function triangleData(name: string, scale = 1): TriangleDataSet {
  const grid = new TriangleMesh(
    new Float32Array([0, 0, 0, scale, 0, 0, 0, scale, 0]),
    new Uint32Array([0, 1, 2])
  );
  return new TriangleDataSet(name, grid);
}

function meshSource(provide: () => TriangleDataSet): TestAlgorithm<number, TriangleDataSet> {
  return new TestAlgorithm("mesh source", { input: NumberType, output: TriangleDataSetType }, provide);
}

/** Renders nothing; throws in one chosen phase and counts the others. */
class ProbeRenderer extends VisualizationAlgorithm {
  public calls: RenderPhase[] = [];

  constructor(
    name: string,
    private readonly failIn: RenderPhase | null = null,
    private readonly bounds: BoundingBox = BoundingBox.empty()
  ) {
    super(name, "Probe", { logger });
  }

  process(): void {}

  private enter(phase: RenderPhase): void {
    this.calls.push(phase);
    if (this.failIn === phase) {
      throw new Error(`${this.name} ${phase} failed`);
    }
  }

  prepare(): void {
    this.enter("prepare");
  }

  update(_view: View): void {
    this.enter("update");
  }

  render(_view: View): void {
    this.enter("render");
  }

  finalize(): void {
    this.enter("finalize");
  }

  getBoundingBox(): BoundingBox {
    this.enter("bounds");
    return this.bounds;
  }
}

async function withNetwork(body: (network: ProcessingNetwork) => Promise<void>): Promise<void> {
  const network = new ProcessingNetwork({ name: "render-test", logger });
  network.start();
  try {
    await body(network);
  } finally {
    await network.stop(true);
  }
}

async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
}

// ============================================================================
// 1. Hand-off Primitives
// ============================================================================

tests["RenderRequest is test-and-clear"] = async () => {
  const request = new RenderRequest();
  assert.equal(request.consume(), false);
  request.request();
  request.request();
  assert.equal(request.isRequested(), true);
  assert.equal(request.consume(), true);
  assert.equal(request.consume(), false);
};

tests["SnapshotSlot hands over only the newest snapshot"] = async () => {
  const slot = new SnapshotSlot<string>();
  assert.deepEqual(slot.acquire(), { snapshot: null, changed: false });

  slot.publish("first");
  slot.publish("second");
  assert.equal(slot.peek(), "second");
  assert.equal(slot.getCurrent(), null);

  assert.deepEqual(slot.acquire(), { snapshot: "second", changed: true });
  assert.deepEqual(slot.acquire(), { snapshot: "second", changed: false });

  slot.publish(null);
  assert.deepEqual(slot.acquire(), { snapshot: null, changed: true });
};

// ============================================================================
// 2. Frames
// ============================================================================

tests["Render loop draws what the worker published"] = async () => {
  await withNetwork(async (network) => {
    const data = triangleData("tri", 2);
    const source = meshSource(() => data);
    const renderer = new MeshRenderer({ logger });
    network.addAlgorithm(source);
    network.addAlgorithm(renderer);
    network.connectAlgorithms(source, "out", renderer, "Triangle Mesh");
    await network.runNetwork().wait();
    assert.equal(renderer.isRenderingRequested(), true);

    const surface = new RecordingSurface();
    const loop = new RenderLoop(network, { surface, logger });
    const view = await loop.renderFrame();

    assert.equal(view.frame, 1);
    assert.deepEqual(view.bounds.min, [0, 0, 0]);
    assert.deepEqual(view.bounds.max, [2, 2, 0]);
    assert.deepEqual(surface.calls, [
      { source: "Mesh Renderer", primitive: "triangles", vertexCount: 3, indexCount: 3 },
    ]);
    assert.equal(renderer.getRenderedMesh(), data);
    assert.equal(renderer.getUploadCount(), 1);
    assert.equal(renderer.isRenderingRequested(), false);

    // Nothing new: draw again without rebuilding buffers.
    await loop.renderFrame();
    assert.equal(surface.calls.length, 2);
    assert.equal(renderer.getUploadCount(), 1);

    await loop.stop();
    assert.equal(loop.isPrepared(renderer), false);
  });
};

tests["New data reaches the render loop at its next update"] = async () => {
  await withNetwork(async (network) => {
    let current = triangleData("small", 1);
    const first = current;
    const source = meshSource(() => current);
    const renderer = new MeshRenderer({ logger });
    network.addAlgorithm(source);
    network.addAlgorithm(renderer);
    network.connectAlgorithms(source, "out", renderer, "Triangle Mesh");
    await network.runNetwork().wait();

    const loop = new RenderLoop(network, { logger });
    await loop.renderFrame();
    assert.equal(renderer.getRenderedMesh(), first);

    current = triangleData("large", 5);
    await network.runNetwork().wait();
    // Published but not yet acquired.
    assert.equal(renderer.getRenderedMesh(), first);
    assert.deepEqual(renderer.getBoundingBox().max, [5, 5, 0]);

    const view = await loop.renderFrame();
    assert.equal(renderer.getRenderedMesh(), current);
    assert.equal(renderer.getUploadCount(), 2);
    assert.deepEqual(view.bounds.max, [5, 5, 0]);
    await loop.stop();
  });
};

tests["A renderer without data draws nothing"] = async () => {
  await withNetwork(async (network) => {
    const renderer = new MeshRenderer({ logger });
    await network.addAlgorithm(renderer).wait();

    const surface = new RecordingSurface();
    const loop = new RenderLoop(network, { surface, logger });
    const view = await loop.renderFrame();

    assert.equal(view.bounds.isEmpty(), true);
    assert.deepEqual(surface.calls, []);
    assert.equal(loop.isPrepared(renderer), true);
    await loop.stop();
  });
};

tests["Direction renderer draws the mesh and one glyph per vertex"] = async () => {
  await withNetwork(async (network) => {
    const data = triangleData("tri");
    const source = meshSource(() => data);
    const normals = new ComputeVertexNormals({ logger });
    const renderer = new DirectionRenderer({ logger });
    network.addAlgorithm(source);
    network.addAlgorithm(normals);
    network.addAlgorithm(renderer);
    network.connectAlgorithms(source, "out", normals, "Triangle Mesh");
    network.connectAlgorithms(source, "out", renderer, "Triangle Mesh");
    network.connectAlgorithms(normals, "Normals", renderer, "Directions");
    await network.runNetwork().wait();

    assert.deepEqual(Array.from(normals.output.getData()?.vectors ?? []), [0, 0, 1, 0, 0, 1, 0, 0, 1]);

    const surface = new RecordingSurface();
    const loop = new RenderLoop(network, { surface, logger });
    await loop.renderFrame();

    assert.deepEqual(surface.calls, [
      { source: "Direction Renderer", primitive: "triangles", vertexCount: 3, indexCount: 3 },
      { source: "Direction Renderer", primitive: "lines", vertexCount: 6, indexCount: 0 },
    ]);
    await loop.stop();
  });
};

tests["Direction renderer ignores fields on another grid"] = async () => {
  await withNetwork(async (network) => {
    const data = triangleData("tri");
    const other = triangleData("other");
    const source = meshSource(() => data);
    const field = new TestAlgorithm(
      "foreign field",
      { input: NumberType, output: TriangleVectorFieldType },
      () => new TriangleVectorField("dirs", other.grid, new Float32Array(9))
    );
    const renderer = new DirectionRenderer({ logger });
    network.addAlgorithm(source);
    network.addAlgorithm(field);
    network.addAlgorithm(renderer);
    network.connectAlgorithms(source, "out", renderer, "Triangle Mesh");
    network.connectAlgorithms(field, "out", renderer, "Directions");
    await network.runNetwork().wait();

    const surface = new RecordingSurface();
    const loop = new RenderLoop(network, { surface, logger });
    const view = await loop.renderFrame();

    assert.deepEqual(surface.calls, []);
    assert.equal(view.bounds.isEmpty(), true);
    await loop.stop();
  });
};

tests["Frame bounds are the union of all visualizations"] = async () => {
  await withNetwork(async (network) => {
    network.addAlgorithm(new ProbeRenderer("left", null, BoundingBox.fromPoints([-3, 0, 0, -1, 1, 0])));
    network.addAlgorithm(new ProbeRenderer("right", null, BoundingBox.fromPoints([2, 0, 0, 4, 2, 1])));
    await network.addAlgorithm(new ProbeRenderer("empty")).wait();

    const loop = new RenderLoop(network, { logger });
    const view = await loop.renderFrame();

    assert.deepEqual(view.bounds.min, [-3, 0, 0]);
    assert.deepEqual(view.bounds.max, [4, 2, 1]);
    await loop.stop();
  });
};

tests["Inactive visualizations are skipped"] = async () => {
  await withNetwork(async (network) => {
    const probe = new ProbeRenderer("idle");
    probe.setActive(false);
    await network.addAlgorithm(probe).wait();

    const loop = new RenderLoop(network, { logger });
    await loop.renderFrame();

    assert.deepEqual(probe.calls, []);
    assert.equal(loop.isPrepared(probe), false);
    await loop.stop();
  });
};

// ============================================================================
// 3. Failures
// ============================================================================

tests["A failing prepare is reported once and not retried"] = async () => {
  await withNetwork(async (network) => {
    const broken = new ProbeRenderer("broken", "prepare");
    const healthy = new ProbeRenderer("healthy");
    network.addAlgorithm(broken);
    await network.addAlgorithm(healthy).wait();

    const errors: RenderError[] = [];
    const loop = new RenderLoop(network, { logger, onError: (error) => errors.push(error) });
    await loop.renderFrame();
    await loop.renderFrame();

    assert.equal(errors.length, 1);
    assert.equal(errors[0].phase, "prepare");
    assert.equal(errors[0].algorithmName, "broken");
    assert.equal(errors[0].algorithmId, broken.id);
    assert.equal(errors[0].frame, 1);
    assert.equal(errors[0].error.message, "broken prepare failed");
    assert.deepEqual(broken.calls, ["bounds", "prepare"]);
    assert.deepEqual(healthy.calls, [
      "bounds", "prepare", "update", "render",
      "bounds", "update", "render",
    ]);

    await loop.stop();
    // Never prepared, so never finalized.
    assert.deepEqual(broken.calls, ["bounds", "prepare"]);
    assert.equal(healthy.calls[healthy.calls.length - 1], "finalize");
  });
};

tests["Failing updates skip the render of that frame only"] = async () => {
  await withNetwork(async (network) => {
    const flaky = new ProbeRenderer("flaky", "update");
    await network.addAlgorithm(flaky).wait();

    const phases: RenderPhase[] = [];
    const loop = new RenderLoop(network, {
      logger,
      onError: (error) => {
        phases.push(error.phase);
        throw new Error("handler exploded");
      },
    });
    await loop.renderFrame();
    await loop.renderFrame();

    assert.deepEqual(phases, ["update", "update"]);
    assert.deepEqual(flaky.calls, ["bounds", "prepare", "update", "bounds", "update"]);
    await loop.stop();
  });
};

tests["Bounds failures do not stop the frame"] = async () => {
  await withNetwork(async (network) => {
    const probe = new ProbeRenderer("no-bounds", "bounds");
    await network.addAlgorithm(probe).wait();

    const errors: RenderError[] = [];
    const loop = new RenderLoop(network, { logger, onError: (error) => errors.push(error) });
    const view = await loop.renderFrame();

    assert.equal(view.bounds.isEmpty(), true);
    assert.deepEqual(errors.map((e) => e.phase), ["bounds"]);
    assert.deepEqual(probe.calls, ["bounds", "prepare", "update", "render"]);
    await loop.stop();
  });
};

// ============================================================================
// 4. Timer
// ============================================================================

tests["Started loop renders until stopped, then finalizes"] = async () => {
  await withNetwork(async (network) => {
    const probe = new ProbeRenderer("ticking");
    await network.addAlgorithm(probe).wait();

    const loop = new RenderLoop(network, { frameIntervalMs: 1, logger });
    loop.start();
    loop.start();
    assert.equal(loop.isRunning(), true);

    await waitFor(() => loop.getFrameCount() >= 3);
    await loop.stop();
    const frames = loop.getFrameCount();

    assert.equal(loop.isRunning(), false);
    assert.equal(probe.calls.filter((c) => c === "prepare").length, 1);
    assert.equal(probe.calls.filter((c) => c === "finalize").length, 1);
    assert.equal(probe.calls[probe.calls.length - 1], "finalize");

    await new Promise<void>((resolve) => setTimeout(resolve, 20));
    assert.equal(loop.getFrameCount(), frames);
  });
};

// ============================================================================
// Run all tests
// ============================================================================

runAllTests().catch((err) => {
  console.error("Unhandled error during test execution:", err);
  process.exit(1);
});
