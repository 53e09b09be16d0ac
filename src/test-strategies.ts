// test-strategies.ts
// Switching between groups of algorithms.

import { strict as assert } from "assert";
import { MeshRenderer } from "./algorithms/mesh-renderer";
import { NumberType } from "./data";
import { ProcessingNetwork } from "./processing-network";
import { AlgorithmStrategies, AlgorithmStrategy } from "./strategies";
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

  console.log(`\nStrategy tests complete: ${pass} passed, ${fail} failed.`);
  if (fail > 0) {
    process.exit(1);
  }
}

const logger = createTestLogger();
const numbers = { input: NumberType, output: NumberType };

function sink(name: string): TestAlgorithm<number, number> {
  return new TestAlgorithm(name, numbers);
}

// ============================================================================
// 1. Selection
// ============================================================================

tests["The first strategy added is selected"] = async () => {
  const strategies = new AlgorithmStrategies(null, { logger });
  const smooth = new AlgorithmStrategy("smooth");
  const flat = new AlgorithmStrategy("flat");
  const a = smooth.addAlgorithm(sink("a"));
  const b = flat.addAlgorithm(sink("b"));

  strategies.addStrategy(smooth);
  strategies.addStrategy(flat);

  assert.equal(strategies.getCurrentIndex(), 0);
  assert.equal(strategies.getCurrent(), smooth);
  assert.equal(a.isActive(), true);
  assert.equal(b.isActive(), false);
  assert.equal(flat.isActive(), false);
};

tests["Selecting activates exactly one strategy"] = async () => {
  const strategies = new AlgorithmStrategies(null, { logger });
  const first = new AlgorithmStrategy("first");
  const second = new AlgorithmStrategy("second");
  const a = first.addAlgorithm(sink("a"));
  const b = second.addAlgorithm(sink("b"));
  strategies.addStrategy(first);
  strategies.addStrategy(second);

  // No network yet: nothing to re-run.
  assert.equal(strategies.select(1), null);
  assert.equal(a.isActive(), false);
  assert.equal(b.isActive(), true);
  assert.equal(strategies.getCurrent(), second);

  assert.throws(() => strategies.select(2), RangeError);
  assert.throws(() => strategies.select(-1), RangeError);
  assert.equal(strategies.getCurrentIndex(), 1);
};

tests["Members join with their strategy's activation"] = async () => {
  const strategy = new AlgorithmStrategy("late");
  strategy.setActive(false);
  const member = strategy.addAlgorithm(sink("member"));
  assert.equal(member.isActive(), false);
  assert.equal(strategy.addAlgorithm(member), member);
  assert.equal(strategy.getAlgorithms().length, 1);
};

tests["Connecting before the network exists commits nothing"] = async () => {
  const strategy = new AlgorithmStrategy("detached");
  strategy.addAlgorithm(sink("member"));
  assert.deepEqual(strategy.connect(sink("source"), "out", "in"), []);
};

// ============================================================================
// 2. With a Network
// ============================================================================

tests["Switching strategies re-runs the network"] = async () => {
  const network = new ProcessingNetwork({ name: "strategy-network", logger });
  network.start();
  try {
    const strategies = new AlgorithmStrategies(null, { logger });
    const first = new AlgorithmStrategy("first");
    const second = new AlgorithmStrategy("second");
    const a = first.addAlgorithm(sink("a"));
    const b = second.addAlgorithm(sink("b"));
    // Has no "in" input; connectToAll leaves it alone.
    const renderer = second.addAlgorithm(new MeshRenderer({ logger }));
    strategies.addStrategy(first);
    strategies.addStrategy(second);

    const source = new TestAlgorithm("source", numbers, () => 5);
    strategies.setNetwork(network);
    network.addAlgorithm(source);
    strategies.prepareProcessingNetwork();
    const connects = strategies.connectToAll(source, "out", "in");
    const firstRun = network.runNetwork();
    await firstRun.wait();

    assert.equal(connects.length, 2);
    assert.ok(connects.every((c) => c.isSuccessful()));
    assert.equal(network.algorithmCount, 4);
    assert.deepEqual(
      firstRun.getExecuted().map((algorithm) => algorithm.name),
      ["source", "a"]
    );

    const rerun = strategies.select(1);
    assert.ok(rerun);
    await rerun.wait();

    assert.deepEqual(
      rerun.getExecuted().map((algorithm) => algorithm.name),
      ["source", "b", "Mesh Renderer"]
    );
    a.assertReceived([5]);
    b.assertReceived([5]);
    assert.equal(renderer.isActive(), true);
  } finally {
    await network.stop(true);
  }
};

// ============================================================================
// Run all tests
// ============================================================================

runAllTests().catch((err) => {
  console.error("Unhandled error during test execution:", err);
  process.exit(1);
});
