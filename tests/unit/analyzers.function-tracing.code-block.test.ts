"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { CodeBlock } from "../../analyzers/function-tracing/code-block.js";
import { InvalidFunctionError } from "../../analyzers/function-tracing/errors.js";
import { ControlFlowGraph, getCodeBlock } from "../../analyzers/function-tracing/flowchart.js";
import { expectDefined } from "../helpers/expect-defined.js";
import { InMemoryGraphSource, diamondBlocks, hex } from "../helpers/graph-source.js";

const starts = (blocks: readonly CodeBlock[]): string[] => hex(blocks.map(block => block.start));

void test("fromRecords links successors and predecessors and puts the entry first", () => {
  const blocks = CodeBlock.fromRecords(
    [
      { start: 0x20n, end: 0x24n, successors: [] },
      { start: 0x10n, end: 0x20n, successors: [0x20n, 0x10n] },
      { start: 0x08n, end: 0x10n, successors: [0x10n] }
    ],
    0x10n
  );

  assert.deepEqual(starts(blocks), ["0x10", "0x8", "0x20"]);
  const [entry, early, exit] = blocks;
  assert.ok(entry && early && exit);
  assert.deepEqual(starts(entry.successors()), ["0x20", "0x10"]);
  assert.deepEqual(starts(entry.predecessors()), ["0x8", "0x10"]);
  assert.deepEqual(starts(exit.predecessors()), ["0x10"]);
  assert.deepEqual(starts(early.predecessors()), []);
});

void test("fromRecords drops edges to unknown addresses and duplicate edges", () => {
  const [block] = CodeBlock.fromRecords([{ start: 0x10n, end: 0x14n, successors: [0x99n, 0x10n, 0x10n] }], 0x10n);
  const entry = expectDefined(block);
  assert.equal(entry.successors().length, 1);
  assert.equal(entry.predecessors().length, 1);
});

void test("fromRecords rejects duplicate starts and a missing entry block", () => {
  assert.throws(
    () =>
      CodeBlock.fromRecords(
        [
          { start: 0x10n, end: 0x14n, successors: [] },
          { start: 0x10n, end: 0x18n, successors: [] }
        ],
        0x10n
      ),
    /Duplicate block start 0x10-0x18/
  );
  assert.throws(() => CodeBlock.fromRecords([{ start: 0x10n, end: 0x14n, successors: [] }], 0x12n), InvalidFunctionError);
});

void test("blocks compare and hash by start address", () => {
  const [a] = CodeBlock.fromRecords([{ start: 0x10n, end: 0x14n, successors: [] }], 0x10n);
  const [b] = CodeBlock.fromRecords([{ start: 0x10n, end: 0x18n, successors: [] }], 0x10n);
  const first = expectDefined(a);
  const second = expectDefined(b);
  assert.equal(first.equals(second), true);
  assert.equal(first.key, 0x10n);
  assert.equal(first.contains(0x13n), true);
  assert.equal(first.contains(0x14n), false);
  assert.equal(String(first), "<CodeBlock 0x10-0x14>");
});

void test("fromSource throws InvalidFunctionError outside every function", () => {
  const source = new InMemoryGraphSource(diamondBlocks());
  assert.throws(
    () => ControlFlowGraph.fromSource(source, 0x40n),
    (err: unknown) => err instanceof InvalidFunctionError && err.address === 0x40n
  );
});

void test("findBlock returns the unique containing block or null", () => {
  const graph = ControlFlowGraph.fromSource(new InMemoryGraphSource(diamondBlocks()), 0x10n);
  assert.equal(graph.size, 4);
  assert.equal(graph.entry.start, 0x10n);
  for (let address = 0x10n; address < 0x20n; address += 1n) {
    const block = expectDefined(graph.findBlock(address));
    assert.ok(block.contains(address));
    assert.equal(graph.blocks.filter(candidate => candidate.contains(address)).length, 1);
  }
  assert.equal(graph.findBlock(0x0fn), null);
  assert.equal(graph.findBlock(0x20n), null);
  assert.deepEqual(starts([...graph]), ["0x10", "0x14", "0x18", "0x1c"]);
  assert.equal(graph.at(3)?.start, 0x1cn);
});

void test("findBlock reports gaps between blocks as not found", () => {
  const source = new InMemoryGraphSource([
    [0x10, 0x14, [0x20]],
    [0x20, 0x24]
  ]);
  const graph = ControlFlowGraph.fromSource(source, 0x10n);
  assert.equal(graph.findBlock(0x18n), null);
  assert.equal(graph.findBlock(0x22n)?.start, 0x20n);
});

void test("getCodeBlock finds the block holding an address", () => {
  const source = new InMemoryGraphSource(diamondBlocks());
  assert.equal(getCodeBlock(source, 0x1an)?.start, 0x18n);
  assert.throws(() => getCodeBlock(source, 0x40n), InvalidFunctionError);
});
