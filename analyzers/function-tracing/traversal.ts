"use strict";

import { type CodeBlock, sortByStart } from "./code-block.js";

export interface TraversableGraph {
  readonly entry: CodeBlock;
  readonly blocks: readonly CodeBlock[];
  findBlock(address: bigint): CodeBlock | null;
  heads(start: bigint, end: bigint): readonly bigint[];
}

export type TraversalMode = "dfs-blocks" | "bfs-blocks" | "dfs-heads" | "bfs-heads";

type QueueDiscipline = "front" | "back";

/**
 * Forward walk from the entry, each block at most once, successors in ascending start order.
 * With `start`, nothing is yielded until the block containing it is reached.
 */
function* forwardBlocks(graph: TraversableGraph, discipline: QueueDiscipline, start?: bigint): Generator<CodeBlock> {
  let blockFound = start === undefined;
  const pending: CodeBlock[] = [graph.entry];
  const visited = new Set<bigint>();
  while (pending.length > 0) {
    const current = pending.shift();
    if (!current || visited.has(current.start)) continue;
    visited.add(current.start);

    const successors = sortByStart(current.successors());
    if (discipline === "front") pending.unshift(...successors);
    else pending.push(...successors);

    if (!blockFound && start !== undefined) blockFound = current.contains(start);
    if (blockFound) yield current;
  }
}

/**
 * Walk toward the entry from the block holding `start` (default: the block with the highest start).
 * Only predecessors below the current block are followed, so loops are never re-entered. Blocks
 * reachable along several backward walks are yielded once per walk.
 */
function* reverseBlocks(graph: TraversableGraph, discipline: QueueDiscipline, start?: bigint): Generator<CodeBlock> {
  const first = start === undefined ? sortByStart(graph.blocks, true)[0] : graph.findBlock(start);
  if (!first) return;
  const pending: CodeBlock[] = [first];
  while (pending.length > 0) {
    const current = pending.shift();
    if (!current) continue;
    const predecessors = sortByStart(current.predecessors(), true).filter(pred => pred.start < current.start);
    if (discipline === "front") pending.unshift(...predecessors);
    else pending.push(...predecessors);
    yield current;
  }
}

function* blockHeads(
  graph: TraversableGraph,
  blocks: Iterable<CodeBlock>,
  start: bigint | undefined,
  reverse: boolean
): Generator<bigint> {
  let firstBlock = true;
  for (const block of blocks) {
    const fromStart = start !== undefined && firstBlock;
    firstBlock = false;
    if (reverse) {
      const heads = graph.heads(block.start, fromStart ? start : block.end);
      for (let index = heads.length - 1; index >= 0; index -= 1) {
        const head = heads[index];
        if (head !== undefined) yield head;
      }
    } else {
      yield* graph.heads(fromStart ? start : block.start, block.end);
    }
  }
}

export const dfsIterBlocks = (graph: TraversableGraph, start?: bigint, reverse = false): Generator<CodeBlock> =>
  reverse ? reverseBlocks(graph, "front", start) : forwardBlocks(graph, "front", start);

export const bfsIterBlocks = (graph: TraversableGraph, start?: bigint, reverse = false): Generator<CodeBlock> =>
  reverse ? reverseBlocks(graph, "back", start) : forwardBlocks(graph, "back", start);

/** Instruction addresses in depth-first block order; in reverse, the first block stops short of `start`. */
export const dfsIterHeads = (graph: TraversableGraph, start?: bigint, reverse = false): Generator<bigint> =>
  blockHeads(graph, dfsIterBlocks(graph, start, reverse), start, reverse);

export const bfsIterHeads = (graph: TraversableGraph, start?: bigint, reverse = false): Generator<bigint> =>
  blockHeads(graph, bfsIterBlocks(graph, start, reverse), start, reverse);

export function traverse(
  graph: TraversableGraph,
  mode: "dfs-blocks" | "bfs-blocks",
  start?: bigint,
  reverse?: boolean
): Generator<CodeBlock>;
export function traverse(
  graph: TraversableGraph,
  mode: "dfs-heads" | "bfs-heads",
  start?: bigint,
  reverse?: boolean
): Generator<bigint>;
export function traverse(
  graph: TraversableGraph,
  mode: TraversalMode,
  start?: bigint,
  reverse = false
): Generator<CodeBlock> | Generator<bigint> {
  switch (mode) {
    case "dfs-blocks":
      return dfsIterBlocks(graph, start, reverse);
    case "bfs-blocks":
      return bfsIterBlocks(graph, start, reverse);
    case "dfs-heads":
      return dfsIterHeads(graph, start, reverse);
    case "bfs-heads":
      return bfsIterHeads(graph, start, reverse);
  }
}

/**
 * Every loop-free block list from the entry to the block containing `address`, built by a forward
 * recursive walk. Unlike path enumeration, loops are cut by a visited set rather than by address order.
 */
export function* pathsToAddress(graph: TraversableGraph, address: bigint): Generator<CodeBlock[]> {
  const visited = new Set<bigint>();
  const currentPath: CodeBlock[] = [];

  function* walk(block: CodeBlock): Generator<CodeBlock[]> {
    visited.add(block.start);
    currentPath.push(block);
    if (block.contains(address)) yield [...currentPath];
    for (const successor of block.successors()) {
      if (visited.has(successor.start)) continue;
      yield* walk(successor);
    }
    currentPath.pop();
    visited.delete(block.start);
  }

  yield* walk(graph.entry);
}
