// test-processing-network.ts
// Graph mutation, connection validation and network runs.

import { strict as assert } from "assert";
import { Algorithm } from "./algorithm";
import { MeshRenderer } from "./algorithms/mesh-renderer";
import { Connect } from "./commands";
import { DataSetType, DataType, NumberType, StringType, TriangleDataSet, TriangleDataSetType } from "./data";
import {
  ConnectorDirectionError,
  ConnectorNotFoundError,
  ConnectorTypeMismatchError,
  ForeignAlgorithmError,
  InputAlreadyConnectedError,
  NetworkRunError,
  ReaderNotFoundError,
  WorkerContextError,
} from "./errors";
import { ProcessingNetwork } from "./processing-network";
import { Reader } from "./reader";
import { TestAlgorithm, createTestLogger } from "./testing";

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

  console.log(`\nProcessing network tests complete: ${pass} passed, ${fail} failed.`);
  if (fail > 0) {
    process.exit(1);
  }
}

// ============================================================================
// Fixtures
// ============================================================================

const numbers = { input: NumberType, output: NumberType };

function source(name: string, value: number): TestAlgorithm<number, number> {
  return new TestAlgorithm(name, numbers, () => value);
}

function doubler(name = "doubler"): TestAlgorithm<number, number> {
  return new TestAlgorithm(name, numbers, (x) => (x === undefined ? undefined : x * 2));
}

function sink(name = "sink"): TestAlgorithm<number, number> {
  return new TestAlgorithm(name, numbers);
}

async function withNetwork(
  body: (network: ProcessingNetwork) => Promise<void>,
  network = new ProcessingNetwork({ name: "test-network", logger: createTestLogger() })
): Promise<void> {
  network.start();
  try {
    await body(network);
  } finally {
    await network.stop(true);
  }
}

class ExposedNetwork extends ProcessingNetwork {
  addNodeDirectly(algorithm: Algorithm): void {
    this.addNetworkNode(algorithm);
  }
}

/** Accepts "*.num"; the loader may return anything so type checks can be exercised. */
class NumberReader implements Reader {
  public readonly name = "numbers";
  public readonly produces: DataType<unknown> = NumberType;

  constructor(private readonly loader: (fileName: string) => Promise<unknown>) {}

  canLoad(fileName: string): boolean {
    return fileName.endsWith(".num");
  }

  load(fileName: string): Promise<unknown> {
    return this.loader(fileName);
  }
}

// ============================================================================
// 1. Nodes
// ============================================================================

tests["Adding the same algorithm twice yields one node"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 1);
    const first = network.addAlgorithm(a);
    const second = network.addAlgorithm(a);
    await second.wait();

    assert.equal(first.isSuccessful(), true);
    assert.equal(second.isSuccessful(), true);
    assert.equal(network.algorithmCount, 1);
    assert.equal(network.hasAlgorithm(a), true);
  });
};

tests["An algorithm owned by another network is rejected"] = async () => {
  const other = new ProcessingNetwork({ name: "other", logger: createTestLogger() });
  const shared = source("shared", 1);

  await withNetwork(async (network) => {
    await network.addAlgorithm(shared).wait();
  });
  await withNetwork(async (network) => {
    const outcome = await network.addAlgorithm(shared).wait();
    assert.equal(outcome.status, "failed");
    if (outcome.status === "failed") {
      assert.ok(outcome.reason instanceof ForeignAlgorithmError);
    }
    assert.equal(network.algorithmCount, 0);
  }, other);
};

tests["Mutation primitives refuse callers outside the worker"] = async () => {
  const network = new ExposedNetwork({ logger: createTestLogger() });
  assert.throws(() => network.addNodeDirectly(source("a", 1)), WorkerContextError);
  assert.equal(network.algorithmCount, 0);
};

// ============================================================================
// 2. Snapshots
// ============================================================================

tests["Snapshots are unaffected by later mutation"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 1);
    const b = source("b", 2);
    await network.addAlgorithm(a).wait();

    const before = network.getNodes();
    const visitedBefore: string[] = [];
    const adding = network.addAlgorithm(b);

    // The visitor yields between nodes; the add completes meanwhile.
    for (const node of before) {
      await adding.wait();
      visitedBefore.push(node.algorithm.name);
    }

    const visitedAfter: string[] = [];
    network.visitAlgorithms((algorithm) => visitedAfter.push(algorithm.name));

    assert.deepEqual(visitedBefore, ["a"]);
    assert.deepEqual(visitedAfter, ["a", "b"]);
    assert.equal(before.length, 1);
    assert.equal(Object.isFrozen(before), true);
  });
};

tests["visitVisualizations only sees nodes that can render"] = async () => {
  await withNetwork(async (network) => {
    const renderer = new MeshRenderer({ logger: createTestLogger() });
    network.addAlgorithm(source("a", 1));
    await network.addAlgorithm(renderer).wait();

    const all: string[] = [];
    const visual: string[] = [];
    network.visitAlgorithms((algorithm) => all.push(algorithm.name));
    network.visitVisualizations((visualization, algorithm) => {
      assert.equal(visualization, renderer);
      visual.push(algorithm.name);
    });

    assert.deepEqual(all, ["a", "Mesh Renderer"]);
    assert.deepEqual(visual, ["Mesh Renderer"]);
  });
};

// ============================================================================
// 3. Connections
// ============================================================================

tests["Compatible connection is created and used by later runs"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 5);
    const d = doubler();
    const s = sink();
    network.addAlgorithm(a);
    network.addAlgorithm(d);
    network.addAlgorithm(s);
    const c1 = network.connectAlgorithms(a, "out", d, "in");
    const c2 = network.connectAlgorithms(d, "out", s, "in");
    const run = network.runNetwork();
    await run.wait();

    assert.equal(c1.isSuccessful(), true);
    assert.equal(c2.isSuccessful(), true);
    assert.equal(run.isSuccessful(), true);
    assert.equal(network.connectionCount, 2);
    s.assertReceived([10]);
  });
};

tests["Subtype output connects to a supertype input"] = async () => {
  await withNetwork(async (network) => {
    const producer = new TestAlgorithm<number, TriangleDataSet>("producer", {
      input: NumberType,
      output: TriangleDataSetType,
    });
    const consumer = new TestAlgorithm("consumer", { input: DataSetType, output: NumberType });
    const outcome = await network.connectAlgorithms(producer, "out", consumer, "in").wait();
    assert.deepEqual(outcome, { status: "succeeded" });

    // The reverse direction narrows the type and is rejected.
    const narrowing = new TestAlgorithm("narrowing", {
      input: TriangleDataSetType,
      output: NumberType,
    });
    const generic = new TestAlgorithm("generic", { input: NumberType, output: DataSetType });
    const rejected = await network.connectAlgorithms(generic, "out", narrowing, "in").wait();
    assert.equal(rejected.status, "failed");
  });
};

tests["Incompatible types never create an edge"] = async () => {
  await withNetwork(async (network) => {
    const text = new TestAlgorithm("text", { input: NumberType, output: StringType }, () => "x");
    const s = sink();
    network.addAlgorithm(text);
    network.addAlgorithm(s);
    const connect = network.connectAlgorithms(text, "out", s, "in");
    const run = network.runNetwork();
    await run.wait();

    assert.equal(connect.isSuccessful(), false);
    assert.ok(connect.getFailure() instanceof ConnectorTypeMismatchError);
    assert.equal(connect.getConnection(), null);
    assert.equal(network.connectionCount, 0);
    assert.equal(s.input.getSource(), null);
    s.assertReceived([undefined]);
  });
};

tests["Unknown connector name fails with connector not found"] = async () => {
  await withNetwork(async (network) => {
    const nodeA = new TestAlgorithm("nodeA", { input: NumberType, output: NumberType });
    const nodeB = sink("nodeB");
    network.addAlgorithm(nodeA);
    network.addAlgorithm(nodeB);
    await network.connectAlgorithms(nodeA, "out", nodeB, "in").wait();
    const countBefore = network.connectionCount;

    const reasons: Error[] = [];
    const connect = network.connectAlgorithms(nodeA, "out", nodeB, "Bar", {
      fail: (_command, reason) => reasons.push(reason),
    });
    await connect.wait();

    assert.equal(reasons.length, 1);
    assert.ok(reasons[0] instanceof ConnectorNotFoundError);
    assert.equal(
      reasons[0].message,
      'connector not found: algorithm "nodeB" has no input named "Bar"'
    );
    assert.equal(network.connectionCount, countBefore);
  });
};

tests["Unknown output name fails as well"] = async () => {
  await withNetwork(async (network) => {
    const outcome = await network
      .connectAlgorithms(source("a", 1), "Foo", sink(), "in")
      .wait();
    assert.equal(outcome.status, "failed");
    if (outcome.status === "failed") {
      assert.equal(
        outcome.reason.message,
        'connector not found: algorithm "a" has no output named "Foo"'
      );
    }
  });
};

tests["Connector form rejects reversed directions"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 1);
    const s = sink();
    const connect = network.connectAlgorithms(s.input, a.output);
    await connect.wait();

    assert.ok(connect.getFailure() instanceof ConnectorDirectionError);
    assert.equal(network.connectionCount, 0);
  });
};

tests["Connect resolves algorithms still waiting in the queue"] = async () => {
  const network = new ProcessingNetwork({ logger: createTestLogger() });
  const a = source("a", 3);
  const s = sink();
  // Everything is committed before the worker exists.
  network.addAlgorithm(a);
  network.addAlgorithm(s);
  const connect = network.connectAlgorithms(a, "out", s, "in");
  network.runNetwork();

  network.start();
  await network.stop(true);

  assert.equal(connect.isSuccessful(), true);
  s.assertReceived([3]);
};

tests["Identical connection is accepted once"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 1);
    const s = sink();
    const first = network.connectAlgorithms(a, "out", s, "in");
    const second = network.connectAlgorithms(a.output, s.input);
    await second.wait();

    assert.equal(first.isSuccessful(), true);
    assert.equal(second.isSuccessful(), true);
    assert.equal(network.connectionCount, 1);
    assert.equal(first.getConnection(), second.getConnection());
  });
};

tests["A second writer to one input is rejected"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 1);
    const b = source("b", 2);
    const s = sink();
    network.connectAlgorithms(a, "out", s, "in");
    const second = network.connectAlgorithms(b, "out", s, "in");
    await second.wait();

    assert.ok(second.getFailure() instanceof InputAlreadyConnectedError);
    assert.equal(network.connectionCount, 1);
    assert.equal(s.input.getSource(), a.output);
  });
};

tests["Fan-out feeds every connected input"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 4);
    const x = sink("x");
    const y = sink("y");
    network.addAlgorithm(a);
    network.addAlgorithm(x);
    network.addAlgorithm(y);
    network.connectAlgorithms(a, "out", x, "in");
    network.connectAlgorithms(a, "out", y, "in");
    await network.runNetwork().wait();

    assert.equal(network.connectionCount, 2);
    x.assertReceived([4]);
    y.assertReceived([4]);
  });
};

tests["Edges may tap algorithms outside the network"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 7);
    const tap = sink("tap");
    network.addAlgorithm(a);
    network.connectAlgorithms(a, "out", tap, "in");
    await network.runNetwork().wait();

    assert.equal(network.hasAlgorithm(tap), false);
    assert.equal(network.connectionCount, 1);
    assert.equal(tap.input.getData(), 7);
    assert.equal(tap.runs, 0);
  });
};

tests["connectAlgorithms rejects malformed arguments"] = async () => {
  const network = new ProcessingNetwork({ logger: createTestLogger() });
  const a = source("a", 1);
  assert.throws(
    () => Reflect.apply(network.connectAlgorithms, network, [a, "out", a.output]),
    TypeError
  );
  assert.equal(network.pendingCount, 0);
};

tests["Connect.describe names both endpoints"] = async () => {
  const a = source("a", 1);
  const s = sink();
  assert.equal(Connect.byName(a, "out", s, "in").describe(), "connect a:out -> sink:in");
  assert.equal(Connect.byConnector(a.output, s.input).describe(), "connect a:out -> sink:in");
};

// ============================================================================
// 4. Running
// ============================================================================

tests["Runs follow insertion order, not dependencies"] = async () => {
  await withNetwork(async (network) => {
    const s = sink();
    const a = source("a", 5);
    network.addAlgorithm(s);
    network.addAlgorithm(a);
    network.connectAlgorithms(a, "out", s, "in");
    const firstRun = network.runNetwork();
    await network.runNetwork().wait();

    assert.deepEqual(
      firstRun.getExecuted().map((algorithm) => algorithm.name),
      ["sink", "a"]
    );
    // The sink ran before its source published anything.
    s.assertReceived([undefined, 5]);
  });
};

tests["A failing node does not abort the pass"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 1);
    const bad = new TestAlgorithm<number, number>("bad", numbers, () => {
      throw new Error("boom");
    });
    const after = sink("after");
    network.addAlgorithm(a);
    network.addAlgorithm(bad);
    network.addAlgorithm(after);
    network.connectAlgorithms(a, "out", bad, "in");
    network.connectAlgorithms(a, "out", after, "in");
    const run = network.runNetwork();
    const outcome = await run.wait();

    assert.equal(outcome.status, "failed");
    assert.ok(run.getFailure() instanceof NetworkRunError);
    assert.deepEqual(
      run.getExecuted().map((algorithm) => algorithm.name),
      ["a", "bad", "after"]
    );
    assert.equal(run.getFailures().length, 1);
    assert.equal(run.getFailures()[0].algorithmName, "bad");
    assert.equal(run.getFailures()[0].error.message, "boom");
    assert.equal(run.getFailure()?.message, "1 algorithm(s) failed: bad: boom");
    after.assertReceived([1]);
  });
};

tests["Inactive algorithms are skipped"] = async () => {
  await withNetwork(async (network) => {
    const a = source("a", 1);
    const idle = sink("idle").setActive(false);
    network.addAlgorithm(a);
    network.addAlgorithm(idle);
    const run = network.runNetwork();
    await run.wait();

    assert.deepEqual(
      run.getExecuted().map((algorithm) => algorithm.name),
      ["a"]
    );
    assert.equal(idle.runs, 0);
  });
};

// ============================================================================
// 5. Reading Files
// ============================================================================

tests["ReadFile without a matching reader fails"] = async () => {
  await withNetwork(async (network) => {
    const read = network.loadFile("notes.txt");
    const outcome = await read.wait();

    assert.equal(outcome.status, "failed");
    assert.ok(read.getFailure() instanceof ReaderNotFoundError);
    assert.equal(read.getFailure()?.message, 'no reader can load "notes.txt"');
    assert.equal(network.algorithmCount, 0);
  });
};

tests["ReadFile publishes the dataset through its source"] = async () => {
  await withNetwork(async (network) => {
    network.registerReader(new NumberReader(async () => 42));
    const read = network.loadFile("answer.num");
    const s = sink();
    network.addAlgorithm(s);
    network.connectAlgorithms(read.source, "Data", s, "in");
    await network.runNetwork().wait();

    assert.equal(read.isSuccessful(), true);
    assert.equal(read.getResult(), 42);
    assert.equal(read.source.name, "answer.num");
    assert.equal(read.source.output.type, NumberType);
    assert.equal(network.hasAlgorithm(read.source), true);
    s.assertReceived([42]);
  });
};

tests["ReadFile surfaces reader failures unchanged"] = async () => {
  await withNetwork(async (network) => {
    const failure = new Error("disk on fire");
    network.registerReader(
      new NumberReader(async () => {
        throw failure;
      })
    );
    const read = network.loadFile("broken.num");
    await read.wait();

    assert.equal(read.getFailure(), failure);
    assert.equal(network.algorithmCount, 0);
  });
};

tests["ReadFile keeps the reader chosen when it was committed"] = async () => {
  const network = new ProcessingNetwork({ logger: createTestLogger() });
  const read = network.loadFile("late.num");
  network.registerReader(new NumberReader(async () => 1));
  network.start();
  await read.wait();
  await network.stop(true);

  assert.equal(read.reader, null);
  assert.equal(read.source.output.type, DataSetType);
  assert.ok(read.getFailure() instanceof ReaderNotFoundError);
  assert.equal(network.findReader("late.num")?.name, "numbers");
};

tests["ReadFile rejects data of the wrong type"] = async () => {
  await withNetwork(async (network) => {
    network.registerReader(new NumberReader(async () => "forty-two"));
    const read = network.loadFile("wrong.num");
    await read.wait();

    assert.ok(read.getFailure() instanceof ConnectorTypeMismatchError);
    assert.equal(read.getResult(), undefined);
    assert.equal(network.algorithmCount, 0);
  });
};

// ============================================================================
// Run all tests
// ============================================================================

runAllTests().catch((err) => {
  console.error("Unhandled error during test execution:", err);
  process.exit(1);
});
