"use strict";

import type { CodeBlock } from "./code-block.js";
import { PathBlock, type PathContextHost } from "./path-block.js";
import type { ContextProvider } from "./types.js";

/**
 * Owns every path node built for one graph. Nodes refer to their parent by id.
 */
export class PathArena<TContext> implements PathContextHost<TContext> {
  readonly contextProvider: ContextProvider<TContext>;
  readonly #nodes: PathBlock<TContext>[] = [];
  readonly #heads: (start: bigint, end: bigint) => readonly bigint[];

  constructor(contextProvider: ContextProvider<TContext>, heads: (start: bigint, end: bigint) => readonly bigint[]) {
    this.contextProvider = contextProvider;
    this.#heads = heads;
  }

  get size(): number {
    return this.#nodes.length;
  }

  heads(start: bigint, end: bigint): readonly bigint[] {
    return this.#heads(start, end);
  }

  create(block: CodeBlock, parent: PathBlock<TContext> | null): PathBlock<TContext> {
    const node = new PathBlock(this, this.#nodes.length, block, parent ? parent.id : null);
    this.#nodes.push(node);
    return node;
  }

  pathById(id: number): PathBlock<TContext> {
    const node = this.#nodes[id];
    if (!node) throw new RangeError(`No path node with id ${id}.`);
    return node;
  }
}

/**
 * Resumable enumeration of the paths ending at one block.
 *
 * Paths found so far are kept in `paths` and never reordered. The cursor is the predecessor being
 * expanded and the next index into that predecessor's own path list; paths to a predecessor are
 * pulled from its enumerator, so a shared prefix is only built once.
 *
 * Only predecessors starting below the block are followed. Every parent chain therefore has strictly
 * decreasing start addresses, which keeps each path loop-free and the enumeration finite.
 */
export class BlockPathEnumerator<TContext> {
  readonly block: CodeBlock;
  readonly paths: PathBlock<TContext>[] = [];
  readonly #cache: PathCache<TContext>;
  readonly #isRoot: boolean;
  readonly #predecessors: readonly CodeBlock[];
  #predecessorIndex = 0;
  #parentIndex = 0;
  #done = false;

  constructor(cache: PathCache<TContext>, block: CodeBlock, isEntry: boolean) {
    this.#cache = cache;
    this.block = block;
    this.#isRoot = isEntry || block.predecessors().length === 0;
    this.#predecessors = block.predecessors().filter(pred => pred.start < block.start);
  }

  get state(): "not-started" | "suspended" | "done" {
    if (this.#done) return "done";
    return this.paths.length === 0 && this.#predecessorIndex === 0 && this.#parentIndex === 0 ? "not-started" : "suspended";
  }

  /** Path number `index`, building more paths when needed; null past the last one. */
  pathAt(index: number): PathBlock<TContext> | null {
    while (this.paths.length <= index && !this.#done) this.#advance();
    return this.paths[index] ?? null;
  }

  #advance(): void {
    if (this.#isRoot) {
      this.paths.push(this.#cache.arena.create(this.block, null));
      this.#done = true;
      return;
    }
    while (this.#predecessorIndex < this.#predecessors.length) {
      const predecessor = this.#predecessors[this.#predecessorIndex];
      const parent = predecessor ? this.#cache.enumeratorFor(predecessor).pathAt(this.#parentIndex) : null;
      if (parent) {
        this.#parentIndex += 1;
        this.paths.push(this.#cache.arena.create(this.block, parent));
        return;
      }
      this.#predecessorIndex += 1;
      this.#parentIndex = 0;
    }
    this.#done = true;
  }
}

export interface PathCacheStats {
  /** Path nodes created so far. */
  builtPaths: number;
  /** Blocks with an enumerator, finished or not. */
  cachedBlocks: number;
}

/**
 * Per-graph path cache keyed by block start. Not safe for interleaved mutation from concurrent
 * callers; one graph is driven by one caller at a time.
 */
export class PathCache<TContext> {
  readonly arena: PathArena<TContext>;
  readonly #entry: CodeBlock;
  readonly #enumerators = new Map<bigint, BlockPathEnumerator<TContext>>();

  constructor(arena: PathArena<TContext>, entry: CodeBlock) {
    this.arena = arena;
    this.#entry = entry;
  }

  enumeratorFor(block: CodeBlock): BlockPathEnumerator<TContext> {
    let enumerator = this.#enumerators.get(block.start);
    if (!enumerator) {
      enumerator = new BlockPathEnumerator(this, block, block.equals(this.#entry));
      this.#enumerators.set(block.start, enumerator);
    }
    return enumerator;
  }

  *paths(block: CodeBlock, limit = Number.POSITIVE_INFINITY): Generator<PathBlock<TContext>, void, undefined> {
    const enumerator = this.enumeratorFor(block);
    for (let index = 0; index < limit; index += 1) {
      const path = enumerator.pathAt(index);
      if (!path) return;
      yield path;
    }
  }

  stats(): PathCacheStats {
    return { builtPaths: this.arena.size, cachedBlocks: this.#enumerators.size };
  }
}
