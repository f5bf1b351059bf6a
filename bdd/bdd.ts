import { Err, Ok, type Operation, type Result, run } from "effection";

export interface TestOperation {
  (): Operation<void>;
}

/**
 * The pieces of a host test runner that the BDD layer is built on.
 */
export interface TestPrimitives {
  describe: {
    (name: string, fn: () => void): unknown;
    skip: (name: string, fn: () => void) => unknown;
  };
  it: {
    (name: string, fn: () => Promise<void>): unknown;
    skip: (name: string, fn: () => void) => unknown;
  };
}

/**
 * BDD interface whose test bodies are Effection operations. Each test
 * runs in a scope of its own, and every resource created inside it is
 * torn down when the test completes.
 */
export interface BDD {
  describe: {
    (name: string, body: () => void): void;
    skip: (name: string, body: () => void) => void;
  };
  it: {
    (desc: string, body?: TestOperation): void;
    skip: (desc: string, body?: TestOperation) => void;
  };
  beforeEach: (body: TestOperation) => void;
}

interface Suite {
  readonly name: string;
  readonly parent?: Suite;
  readonly setup: TestOperation[];
}

/**
 * Every `beforeEach` operation from the outermost suite inwards.
 */
function lineage(suite: Suite | undefined): TestOperation[] {
  let setups: TestOperation[] = [];
  for (let current = suite; current; current = current.parent) {
    setups = current.setup.concat(setups);
  }
  return setups;
}

/**
 * Run `body` after `setups` inside a fresh scope, capturing the outcome.
 */
export function runTest(
  setups: TestOperation[],
  body: TestOperation,
): Promise<Result<void>> {
  return run(() =>
    box(function* () {
      for (const setup of setups) {
        yield* setup();
      }
      yield* body();
    })
  );
}

export function createBDD(primitives: TestPrimitives): BDD {
  const { describe: $describe, it: $it } = primitives;

  let current: Suite | undefined;

  function describe(name: string, body: () => void) {
    const original = current;
    try {
      current = { name, parent: original, setup: [] };
      $describe(name, body);
    } finally {
      current = original;
    }
  }

  describe.skip = (name: string, body: () => void) => {
    $describe.skip(name, body);
  };

  function beforeEach(body: TestOperation) {
    current?.setup.push(body);
  }

  function it(desc: string, body?: TestOperation): void {
    if (!body) {
      $it.skip(desc, () => {});
      return;
    }
    const suite = current;
    $it(desc, async () => {
      const result = await runTest(lineage(suite), body);
      if (!result.ok) {
        throw result.error;
      }
    });
  }

  it.skip = (desc: string, _body?: TestOperation) => {
    $it.skip(desc, () => {});
  };

  return { describe, it, beforeEach };
}

function* box(op: TestOperation): Operation<Result<void>> {
  try {
    return Ok(yield* op());
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}
