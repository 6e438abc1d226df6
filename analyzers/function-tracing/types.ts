"use strict";

import type { Bitness } from "../x86/addressing.js";

export interface ArchitectureInfo {
  bitness: Bitness;
  littleEndian: boolean;
}

/** Half-open address range of one function. */
export interface FunctionBounds {
  start: bigint;
  end: bigint;
}

export interface BlockRecord {
  start: bigint;
  end: bigint;
  successors: readonly bigint[];
}

/**
 * What the core needs from a disassembler: function lookup, the block graph of a function and the
 * instruction addresses inside a range.
 */
export interface FunctionGraphSource {
  readonly architecture: ArchitectureInfo;
  getFunction(address: bigint): FunctionBounds | null;
  getBlocks(func: FunctionBounds): readonly BlockRecord[];
  /** Instruction addresses in `[start, end)`, ascending. */
  heads(start: bigint, end: bigint): readonly bigint[];
}

/**
 * Creates, copies and advances CPU snapshots. `step` replays the instruction at `address` into
 * `context` in place.
 */
export interface ContextProvider<TContext> {
  createContext(): TContext;
  cloneContext(context: TContext): TContext;
  step(context: TContext, address: bigint): void;
}
