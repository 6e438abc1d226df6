"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { AddressOutOfRangeError } from "../../analyzers/function-tracing/errors.js";
import { ControlFlowGraph } from "../../analyzers/function-tracing/flowchart.js";
import type { ContextProvider } from "../../analyzers/function-tracing/types.js";
import { expectDefined } from "../helpers/expect-defined.js";
import { InMemoryGraphSource, diamondBlocks, hex } from "../helpers/graph-source.js";

interface TraceContext {
  trace: bigint[];
}

interface CountingProvider extends ContextProvider<TraceContext> {
  steps: number;
  failAt: bigint | null;
}

const countingProvider = (): CountingProvider => {
  const provider: CountingProvider = {
    steps: 0,
    failAt: null,
    createContext: () => ({ trace: [] }),
    cloneContext: context => ({ trace: [...context.trace] }),
    step: (context, address) => {
      if (provider.failAt === address) throw new Error(`step failed at ${address}`);
      provider.steps += 1;
      context.trace.push(address);
    }
  };
  return provider;
};

const diamondGraph = (provider: CountingProvider): ControlFlowGraph<TraceContext> =>
  ControlFlowGraph.fromSource(new InMemoryGraphSource(diamondBlocks()), 0x10n, { contextProvider: provider });

void test("path nodes expose their block chain", () => {
  const graph = diamondGraph(countingProvider());
  const [left, right] = [...graph.getPaths(0x1cn)];
  const path = expectDefined(left);
  assert.equal(path.depth, 3);
  assert.equal(path.contains(0x1en), true);
  assert.equal(path.contains(0x14n), false);
  assert.deepEqual(hex(path.toBlocks().map(block => block.start)), ["0x10", "0x14", "0x1c"]);
  assert.equal(path.prev?.block.start, 0x14n);
  assert.equal(path.prev?.prev?.prev, null);
  assert.equal(right?.prev?.prev, path.prev?.prev);
});

void test("cpuContext replays the path up to, but not including, the address", () => {
  const provider = countingProvider();
  const graph = diamondGraph(provider);
  const path = expectDefined([...graph.getPaths(0x1cn)][0]);

  assert.equal(path.contextAddress, null);
  assert.deepEqual(hex(path.cpuContext(0x1en).trace), ["0x10", "0x12", "0x14", "0x16", "0x1c"]);
  assert.equal(provider.steps, 5);
  assert.equal(path.contextAddress, 0x1en);
  assert.equal(path.prev?.contextAddress, 0x18n);
});

void test("cpuContext extends the cached snapshot instead of replaying", () => {
  const provider = countingProvider();
  const graph = diamondGraph(provider);
  const path = expectDefined([...graph.getPaths(0x1cn)][0]);

  path.cpuContext(0x1en);
  path.cpuContext(0x1en);
  assert.equal(provider.steps, 5);

  assert.deepEqual(hex(path.cpuContext().trace), ["0x10", "0x12", "0x14", "0x16", "0x1c", "0x1e"]);
  assert.equal(provider.steps, 6);
  assert.equal(path.contextAddress, 0x20n);
});

void test("cpuContext rebuilds from the parent when asked for an earlier address", () => {
  const provider = countingProvider();
  const graph = diamondGraph(provider);
  const path = expectDefined([...graph.getPaths(0x1cn)][0]);

  path.cpuContext();
  assert.equal(provider.steps, 6);
  assert.deepEqual(hex(path.cpuContext(0x1cn).trace), ["0x10", "0x12", "0x14", "0x16"]);
  assert.equal(provider.steps, 6);
  assert.equal(path.contextAddress, 0x1cn);
});

void test("paths sharing a prefix reuse the prefix snapshot", () => {
  const provider = countingProvider();
  const graph = diamondGraph(provider);
  const [left, right] = [...graph.getPaths(0x1cn)];

  expectDefined(left).cpuContext();
  assert.equal(provider.steps, 6);
  assert.deepEqual(hex(expectDefined(right).cpuContext().trace), ["0x10", "0x12", "0x18", "0x1a", "0x1c", "0x1e"]);
  assert.equal(provider.steps, 10);
});

void test("returned snapshots are independent copies", () => {
  const graph = diamondGraph(countingProvider());
  const path = expectDefined([...graph.getPaths(0x1cn)][0]);

  const first = path.cpuContext();
  first.trace.push(0x99n);
  assert.deepEqual(hex(path.cpuContext().trace), ["0x10", "0x12", "0x14", "0x16", "0x1c", "0x1e"]);
  assert.notEqual(path.cpuContext(), path.cpuContext());
});

void test("cpuContext rejects addresses outside the block", () => {
  const graph = diamondGraph(countingProvider());
  const path = expectDefined([...graph.getPaths(0x1cn)][0]);
  assert.throws(
    () => path.cpuContext(0x10n),
    (err: unknown) => err instanceof AddressOutOfRangeError && err.message === "Address 0x10 is not in block 0x1c :: 0x20."
  );
  assert.throws(() => path.cpuContext(0x20n), AddressOutOfRangeError);
});

void test("a failing step drops the partial snapshot", () => {
  const provider = countingProvider();
  const graph = diamondGraph(provider);
  const path = expectDefined([...graph.getPaths(0x1cn)][0]);

  provider.failAt = 0x16n;
  assert.throws(() => path.cpuContext(), /step failed at 22/);
  assert.equal(path.prev?.contextAddress, null);
  assert.equal(path.contextAddress, null);

  provider.failAt = null;
  assert.deepEqual(hex(path.cpuContext().trace), ["0x10", "0x12", "0x14", "0x16", "0x1c", "0x1e"]);
});

void test("the default context provider records executed instructions", () => {
  const graph = ControlFlowGraph.fromSource(new InMemoryGraphSource(diamondBlocks()), 0x10n);
  const path = expectDefined([...graph.getPaths(0x1cn)][1]);
  const context = path.cpuContext(0x1en);
  assert.deepEqual(hex(context.executedInstructions), ["0x10", "0x12", "0x18", "0x1a", "0x1c"]);
  assert.equal(context.ip, 0x1cn);
});
