"use strict";

import type { CodeBlock } from "./code-block.js";
import { AddressOutOfRangeError } from "./errors.js";
import type { ContextProvider } from "./types.js";

export interface PathContextHost<TContext> {
  readonly contextProvider: ContextProvider<TContext>;
  heads(start: bigint, end: bigint): readonly bigint[];
  pathById(id: number): PathBlock<TContext>;
}

/**
 * One node of a path from the function entry: a block plus the path that led to it. Parents are
 * shared between paths, so the nodes form a tree rooted at the entry block.
 *
 * The node owns a CPU snapshot filled up to `contextAddress` (exclusive). Later requests extend it
 * instead of replaying the whole path again.
 */
export class PathBlock<TContext> {
  readonly id: number;
  readonly block: CodeBlock;
  readonly parentId: number | null;
  readonly #host: PathContextHost<TContext>;
  #context: TContext | null = null;
  #contextAddress: bigint | null = null;

  constructor(host: PathContextHost<TContext>, id: number, block: CodeBlock, parentId: number | null) {
    this.#host = host;
    this.id = id;
    this.block = block;
    this.parentId = parentId;
  }

  get prev(): PathBlock<TContext> | null {
    return this.parentId == null ? null : this.#host.pathById(this.parentId);
  }

  /** Number of blocks on the path, this one included. */
  get depth(): number {
    let depth = 0;
    for (let node: PathBlock<TContext> | null = this; node; node = node.prev) depth += 1;
    return depth;
  }

  /** Address the cached snapshot has been filled to, or null before the first request. */
  get contextAddress(): bigint | null {
    return this.#contextAddress;
  }

  contains(address: bigint): boolean {
    return this.block.contains(address);
  }

  /** Blocks from the function entry down to this one. */
  toBlocks(): CodeBlock[] {
    const blocks: CodeBlock[] = [];
    for (let node: PathBlock<TContext> | null = this; node; node = node.prev) blocks.push(node.block);
    return blocks.reverse();
  }

  /**
   * CPU state just before the instruction at `address` executes, or after the whole block when no
   * address is given. The returned snapshot is a copy.
   */
  cpuContext(address?: bigint): TContext {
    if (address !== undefined && !this.block.contains(address)) {
      throw new AddressOutOfRangeError(address, this.block.start, this.block.end);
    }
    const end = address ?? this.block.end;
    const provider = this.#host.contextProvider;

    let context = this.#context;
    let filledTo = this.#contextAddress;
    // A snapshot that already ran past `end` cannot be rewound.
    if (context === null || filledTo === null || filledTo > end) {
      const parent = this.prev;
      context = parent ? parent.cpuContext() : provider.createContext();
      filledTo = this.block.start;
      this.#context = context;
      this.#contextAddress = filledTo;
    }

    if (filledTo !== end) {
      const heads = this.#host.heads(filledTo, end);
      for (let index = 0; index < heads.length; index += 1) {
        const ip = heads[index];
        if (ip === undefined) continue;
        try {
          provider.step(context, ip);
        } catch (err) {
          this.#context = null;
          this.#contextAddress = null;
          throw err;
        }
        this.#contextAddress = heads[index + 1] ?? end;
      }
      this.#contextAddress = end;
    }

    return provider.cloneContext(context);
  }
}
