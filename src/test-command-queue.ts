// test-command-queue.ts
// Ordering, failure isolation and stop semantics of the command queue.

import { strict as assert } from "assert";
import { Command, CommandObserver, observe } from "./command";
import { CommandQueue } from "./command-queue";
import { CommandReuseError, WorkerContextError } from "./errors";
import { RecordingObserver, createTestLogger } from "./testing";

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

  console.log(`\nCommand queue tests complete: ${pass} passed, ${fail} failed.`);
  if (fail > 0) {
    process.exit(1);
  }
}

// ============================================================================
// Fixtures
// ============================================================================

class Gate {
  private release: (() => void) | null = null;
  public readonly opened: Promise<void>;

  constructor() {
    this.opened = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release?.();
  }
}

interface EchoOptions {
  gate?: Gate;
  fail?: boolean;
  stopFromWorker?: boolean;
  handleEarly?: boolean;
}

class EchoCommand extends Command {
  public readonly kind = "echo";
  public stopError: unknown = null;

  constructor(
    public readonly label: string,
    observer: CommandObserver<EchoCommand> | null = null,
    public readonly options: EchoOptions = {}
  ) {
    super(observer);
  }

  describe(): string {
    return `${this.kind} ${this.label}`;
  }
}

class TestQueue extends CommandQueue<EchoCommand> {
  public processed: string[] = [];

  constructor() {
    super({ name: "test-queue", logger: createTestLogger() });
  }

  protected async process(command: EchoCommand): Promise<void> {
    if (command.options.gate) {
      await command.options.gate.opened;
    }
    if (command.options.stopFromWorker) {
      try {
        await this.stop();
      } catch (error) {
        command.stopError = error;
      }
    }
    if (command.options.handleEarly) {
      command.handle(null);
    }
    if (command.options.fail) {
      throw new Error(`${command.label} failed`);
    }
    this.processed.push(command.label);
  }
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

// ============================================================================
// 1. Ordering
// ============================================================================

tests["Observers fire in commit order"] = async () => {
  const queue = new TestQueue();
  const log: string[] = [];
  queue.start();

  for (let i = 0; i < 20; i++) {
    queue.commit(new EchoCommand(`c${i}`, observe<EchoCommand>({ success: (c) => log.push(c.label) })));
  }
  await queue.stop(true);

  assert.deepEqual(
    log,
    Array.from({ length: 20 }, (_, i) => `c${i}`)
  );
};

tests["Busy precedes success for each command"] = async () => {
  const queue = new TestQueue();
  const log: string[] = [];
  queue.commit(new EchoCommand("a", new RecordingObserver(log, "a")));
  queue.commit(new EchoCommand("b", new RecordingObserver(log, "b")));
  queue.start();
  await queue.stop(true);

  assert.deepEqual(log, ["a:busy", "a:success", "b:busy", "b:success"]);
};

tests["Start is idempotent"] = async () => {
  const queue = new TestQueue();
  queue.start();
  queue.start();
  assert.equal(queue.isRunning(), true);

  queue.commit(new EchoCommand("x"));
  queue.commit(new EchoCommand("y"));
  queue.commit(new EchoCommand("z"));
  await queue.stop(true);

  assert.deepEqual(queue.processed, ["x", "y", "z"]);
  assert.equal(queue.isRunning(), false);
};

tests["Commands committed before start wait for it"] = async () => {
  const queue = new TestQueue();
  const command = queue.commit(new EchoCommand("early"));
  await tick();
  assert.equal(command.getState(), "pending");
  assert.equal(queue.pendingCount, 1);

  queue.start();
  await queue.stop(true);
  assert.equal(command.getState(), "handled");
  assert.equal(command.isSuccessful(), true);
};

// ============================================================================
// 2. Failures
// ============================================================================

tests["A failing command does not stop the worker"] = async () => {
  const queue = new TestQueue();
  const log: string[] = [];
  const first = new RecordingObserver(log, "first");
  const second = new RecordingObserver(log, "second");
  const third = new RecordingObserver(log, "third");

  queue.start();
  queue.commit(new EchoCommand("first", first));
  const failing = queue.commit(new EchoCommand("second", second, { fail: true }));
  queue.commit(new EchoCommand("third", third));
  await queue.stop(true);

  assert.deepEqual(log, [
    "first:busy",
    "first:success",
    "second:busy",
    "second:fail",
    "third:busy",
    "third:success",
  ]);
  assert.equal(second.failures[0].message, "second failed");
  assert.equal(failing.isHandled(), true);
  assert.equal(failing.isSuccessful(), false);
  assert.equal(failing.getFailure()?.message, "second failed");
  assert.deepEqual(queue.processed, ["first", "third"]);
};

tests["A throwing observer does not stop the worker"] = async () => {
  const queue = new TestQueue();
  queue.start();
  queue.commit(
    new EchoCommand(
      "noisy",
      observe({
        success: () => {
          throw new Error("observer exploded");
        },
      })
    )
  );
  const after = queue.commit(new EchoCommand("after"));
  await queue.stop(true);

  assert.equal(after.isSuccessful(), true);
  assert.deepEqual(queue.processed, ["noisy", "after"]);
};

tests["wait() resolves with the outcome"] = async () => {
  const queue = new TestQueue();
  queue.start();
  const ok = queue.commit(new EchoCommand("ok"));
  const bad = queue.commit(new EchoCommand("bad", null, { fail: true }));

  const okOutcome = await ok.wait();
  const badOutcome = await bad.wait();
  await queue.stop(true);

  assert.deepEqual(okOutcome, { status: "succeeded" });
  assert.equal(badOutcome.status, "failed");
  if (badOutcome.status === "failed") {
    assert.equal(badOutcome.reason.message, "bad failed");
  }
  // Already handled: resolves straight away.
  assert.deepEqual(await ok.wait(), { status: "succeeded" });
};

tests["Committing a command twice is rejected"] = async () => {
  const queue = new TestQueue();
  const other = new TestQueue();
  queue.start();
  const once = queue.commit(new EchoCommand("once"));

  assert.throws(
    () => queue.commit(once),
    (error: unknown) => error instanceof CommandReuseError && error.code === "COMMAND_REUSED"
  );
  assert.throws(() => other.commit(once), CommandReuseError);
  await once.wait();
  assert.throws(() => queue.commit(once), CommandReuseError);

  const after = queue.commit(new EchoCommand("after"));
  const outcome = await after.wait();
  await queue.stop(true);

  assert.deepEqual(outcome, { status: "succeeded" });
  assert.deepEqual(queue.processed, ["once", "after"]);
  assert.equal(other.pendingCount, 0);
};

tests["A command handled twice does not stop the worker"] = async () => {
  const queue = new TestQueue();
  const log: string[] = [];
  queue.start();
  const early = queue.commit(
    new EchoCommand("early", new RecordingObserver(log, "early"), { handleEarly: true })
  );
  const after = queue.commit(new EchoCommand("after", new RecordingObserver(log, "after")));
  await after.wait();
  await queue.stop(true);

  // The second handle() is refused; its observer hears nothing more.
  assert.equal(early.isSuccessful(), true);
  assert.deepEqual(log, ["early:busy", "after:busy", "after:success"]);
  assert.deepEqual(queue.processed, ["early", "after"]);
  assert.equal(queue.isRunning(), false);
};

// ============================================================================
// 3. Stopping
// ============================================================================

tests["Graceful stop runs all ten queued commands"] = async () => {
  const queue = new TestQueue();
  let successes = 0;
  const observer = observe({ success: () => successes++ });
  const commands: EchoCommand[] = [];
  for (let i = 0; i < 10; i++) {
    commands.push(queue.commit(new EchoCommand(`g${i}`, observer)));
  }

  queue.start();
  await queue.stop(true);

  assert.equal(successes, 10);
  assert.ok(commands.every((c) => c.isHandled()));
  assert.equal(queue.isRunning(), false);
};

tests["Hard stop abandons the queued commands"] = async () => {
  const queue = new TestQueue();
  const gate = new Gate();
  let successes = 0;
  let failures = 0;
  let busyResolve: (() => void) | null = null;
  const firstBusy = new Promise<void>((resolve) => {
    busyResolve = resolve;
  });

  const observer = observe<EchoCommand>({
    busy: () => busyResolve?.(),
    success: () => successes++,
    fail: () => failures++,
  });

  const commands: EchoCommand[] = [queue.commit(new EchoCommand("h0", observer, { gate }))];
  for (let i = 1; i < 10; i++) {
    commands.push(queue.commit(new EchoCommand(`h${i}`, observer)));
  }

  queue.start();
  await firstBusy;

  const stopping = queue.stop(false);
  gate.open();
  await stopping;

  // The command in flight completes; the other nine are dropped unhandled.
  assert.equal(successes, 1);
  assert.equal(failures, 0);
  assert.equal(commands[0].isHandled(), true);
  assert.ok(commands.slice(1).every((c) => c.getState() === "pending"));
  assert.equal(queue.pendingCount, 0);
  assert.equal(queue.isRunning(), false);
};

tests["Hard stop right after start runs nothing"] = async () => {
  const queue = new TestQueue();
  for (let i = 0; i < 10; i++) {
    queue.commit(new EchoCommand(`n${i}`));
  }
  queue.start();
  await queue.stop(false);

  assert.deepEqual(queue.processed, []);
  assert.equal(queue.isRunning(), false);
};

tests["Commands committed while stopping are never executed"] = async () => {
  const queue = new TestQueue();
  queue.start();
  queue.commit(new EchoCommand("before"));
  const stopping = queue.stop(true);
  const late = queue.commit(new EchoCommand("late"));
  await stopping;

  assert.deepEqual(queue.processed, ["before"]);
  assert.equal(late.getState(), "pending");

  // Not picked up by a restart either.
  queue.start();
  await queue.stop(true);
  assert.deepEqual(queue.processed, ["before"]);
  assert.equal(late.getState(), "pending");
};

tests["Stop without a running worker resolves immediately"] = async () => {
  const queue = new TestQueue();
  await queue.stop(true);
  await queue.stop(false);
  assert.equal(queue.isRunning(), false);
};

tests["Stop from inside the worker is rejected"] = async () => {
  const queue = new TestQueue();
  queue.start();
  const command = queue.commit(new EchoCommand("self-stop", null, { stopFromWorker: true }));
  await command.wait();
  await queue.stop(true);

  assert.ok(command.stopError instanceof WorkerContextError);
  assert.equal(command.isSuccessful(), true);
};

tests["Start during a draining stop leaves the queue stopped"] = async () => {
  const queue = new TestQueue();
  const gate = new Gate();
  queue.start();
  queue.commit(new EchoCommand("slow", null, { gate }));
  const stopping = queue.stop(true);

  queue.start();
  const late = queue.commit(new EchoCommand("late"));
  gate.open();
  await stopping;

  assert.equal(queue.isRunning(), false);
  assert.equal(late.getState(), "pending");

  // Starting once the stop has finished works as usual.
  queue.start();
  queue.commit(new EchoCommand("next"));
  await queue.stop(true);
  assert.deepEqual(queue.processed, ["slow", "next"]);
};

tests["Queue can be restarted after a stop"] = async () => {
  const queue = new TestQueue();
  queue.start();
  queue.commit(new EchoCommand("one"));
  await queue.stop(true);

  queue.start();
  queue.commit(new EchoCommand("two"));
  await queue.stop(true);

  assert.deepEqual(queue.processed, ["one", "two"]);
};

// ============================================================================
// Run all tests
// ============================================================================

runAllTests().catch((err) => {
  console.error("Unhandled error during test execution:", err);
  process.exit(1);
});
