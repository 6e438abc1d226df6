"use strict";

import { lowerBound } from "../../binary-utils.js";
import { CodeBlock, sortByStart } from "./code-block.js";
import { type ProcessorContext, processorContextProvider } from "./cpu-context.js";
import { InvalidFunctionError } from "./errors.js";
import type { PathBlock } from "./path-block.js";
import { PathArena, PathCache, type PathCacheStats } from "./path-enumeration.js";
import {
  bfsIterBlocks,
  bfsIterHeads,
  dfsIterBlocks,
  dfsIterHeads,
  pathsToAddress,
  type TraversableGraph
} from "./traversal.js";
import type { ArchitectureInfo, ContextProvider, FunctionBounds, FunctionGraphSource } from "./types.js";

export interface ControlFlowGraphOptions<TContext> {
  contextProvider: ContextProvider<TContext>;
}

export interface GetPathsOptions {
  /** Stop after this many paths. Missing or invalid values leave the sequence unbounded. */
  limit?: number;
}

const normalizeLimit = (limit: number | undefined): number =>
  typeof limit === "number" && Number.isSafeInteger(limit) && limit > 0 ? limit : Number.POSITIVE_INFINITY;

/**
 * Block graph of one function with traversal helpers and a lazily built, cached set of paths from
 * the entry to each block.
 *
 * ```ts
 * const graph = ControlFlowGraph.fromSource(source, 0x401000n);
 * for (const path of graph.getPaths(0x401042n, { limit: 10 })) {
 *   const context = path.cpuContext(0x401042n);
 * }
 * ```
 *
 * Paths are never materialised as a whole: heavily branching functions have tens of thousands of
 * them, so callers should bound what they consume.
 */
export class ControlFlowGraph<TContext = ProcessorContext> implements TraversableGraph, Iterable<CodeBlock> {
  readonly bounds: FunctionBounds;
  readonly architecture: ArchitectureInfo;
  /** Entry block first, then ascending start address. */
  readonly blocks: readonly CodeBlock[];
  readonly contextProvider: ContextProvider<TContext>;
  readonly #source: FunctionGraphSource;
  readonly #sortedBlocks: readonly CodeBlock[];
  readonly #sortedStarts: readonly bigint[];
  readonly #paths: PathCache<TContext>;

  private constructor(
    source: FunctionGraphSource,
    bounds: FunctionBounds,
    blocks: CodeBlock[],
    contextProvider: ContextProvider<TContext>
  ) {
    this.#source = source;
    this.bounds = { start: bounds.start, end: bounds.end };
    this.architecture = source.architecture;
    this.blocks = blocks;
    this.contextProvider = contextProvider;
    this.#sortedBlocks = sortByStart(blocks);
    this.#sortedStarts = this.#sortedBlocks.map(block => block.start);
    const arena = new PathArena(contextProvider, (start, end) => this.heads(start, end));
    this.#paths = new PathCache(arena, this.entry);
  }

  static fromSource(source: FunctionGraphSource, address: bigint): ControlFlowGraph<ProcessorContext>;
  static fromSource<TContext>(
    source: FunctionGraphSource,
    address: bigint,
    options: ControlFlowGraphOptions<TContext>
  ): ControlFlowGraph<TContext>;
  static fromSource<TContext>(
    source: FunctionGraphSource,
    address: bigint,
    options?: ControlFlowGraphOptions<TContext>
  ): ControlFlowGraph<TContext> | ControlFlowGraph<ProcessorContext> {
    const func = source.getFunction(address);
    if (!func) throw new InvalidFunctionError(address);
    const blocks = CodeBlock.fromRecords(source.getBlocks(func), func.start);
    if (options) return new ControlFlowGraph(source, func, blocks, options.contextProvider);
    return new ControlFlowGraph(source, func, blocks, processorContextProvider(source.architecture));
  }

  get entry(): CodeBlock {
    const entry = this.blocks[0];
    if (!entry) throw new InvalidFunctionError(this.bounds.start);
    return entry;
  }

  get size(): number {
    return this.blocks.length;
  }

  at(index: number): CodeBlock | undefined {
    return this.blocks[index];
  }

  [Symbol.iterator](): Iterator<CodeBlock> {
    return this.blocks[Symbol.iterator]();
  }

  contains(address: bigint): boolean {
    return this.bounds.start <= address && address < this.bounds.end;
  }

  /** Block whose range holds `address`, or null when none does. */
  findBlock(address: bigint): CodeBlock | null {
    const index = lowerBound(this.#sortedStarts, address + 1n) - 1;
    const candidate = index >= 0 ? this.#sortedBlocks[index] : undefined;
    return candidate && candidate.contains(address) ? candidate : null;
  }

  heads(start: bigint, end: bigint): readonly bigint[] {
    return this.#source.heads(start, end);
  }

  dfsIterBlocks(start?: bigint, reverse = false): Generator<CodeBlock> {
    return dfsIterBlocks(this, start, reverse);
  }

  bfsIterBlocks(start?: bigint, reverse = false): Generator<CodeBlock> {
    return bfsIterBlocks(this, start, reverse);
  }

  dfsIterHeads(start?: bigint, reverse = false): Generator<bigint> {
    return dfsIterHeads(this, start, reverse);
  }

  bfsIterHeads(start?: bigint, reverse = false): Generator<bigint> {
    return bfsIterHeads(this, start, reverse);
  }

  pathsToAddress(address: bigint): Generator<CodeBlock[]> {
    if (!this.contains(address)) throw new InvalidFunctionError(address);
    return pathsToAddress(this, address);
  }

  /**
   * Paths from the entry to the block containing `address`. Paths found by earlier calls come first,
   * then enumeration resumes where it stopped. Stopping early leaves the cache valid for later calls.
   */
  *getPaths(address: bigint, options: GetPathsOptions = {}): Generator<PathBlock<TContext>, void, undefined> {
    const block = this.findBlock(address);
    if (!block) return;
    yield* this.#paths.paths(block, normalizeLimit(options.limit));
  }

  pathStats(): PathCacheStats {
    return this.#paths.stats();
  }
}

export const getCodeBlock = (source: FunctionGraphSource, address: bigint): CodeBlock | null =>
  ControlFlowGraph.fromSource(source, address).findBlock(address);
