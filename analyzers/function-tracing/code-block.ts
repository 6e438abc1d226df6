"use strict";

import { formatAddressRange, toHex64 } from "../../binary-utils.js";
import { InvalidFunctionError } from "./errors.js";
import type { BlockRecord } from "./types.js";

const byStart = (a: CodeBlock, b: CodeBlock): number => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0);

/**
 * A basic block `[start, end)`. Identity is the start address; edges are fixed when the graph is built.
 */
export class CodeBlock {
  readonly start: bigint;
  readonly end: bigint;
  #successors: CodeBlock[] = [];
  #predecessors: CodeBlock[] = [];

  private constructor(start: bigint, end: bigint) {
    this.start = start;
    this.end = end;
  }

  get key(): bigint {
    return this.start;
  }

  successors(): readonly CodeBlock[] {
    return this.#successors;
  }

  predecessors(): readonly CodeBlock[] {
    return this.#predecessors;
  }

  contains(address: bigint): boolean {
    return this.start <= address && address < this.end;
  }

  equals(other: CodeBlock): boolean {
    return this.start === other.start;
  }

  toString(): string {
    return `<CodeBlock ${formatAddressRange(this.start, this.end)}>`;
  }

  /**
   * Builds linked blocks for one function. The block starting at `entry` comes first, the rest follow
   * in ascending start order. Edges to addresses that are not a block start are dropped.
   */
  static fromRecords(records: readonly BlockRecord[], entry: bigint): CodeBlock[] {
    const byAddress = new Map<bigint, CodeBlock>();
    for (const record of records) {
      if (byAddress.has(record.start)) {
        throw new InvalidFunctionError(record.start, `Duplicate block start ${formatAddressRange(record.start, record.end)}.`);
      }
      byAddress.set(record.start, new CodeBlock(record.start, record.end));
    }

    const entryBlock = byAddress.get(entry);
    if (!entryBlock) {
      throw new InvalidFunctionError(entry, `Function entry ${toHex64(entry)} does not start a block.`);
    }

    const ordered = [...byAddress.values()].sort(byStart);
    const recordByStart = new Map(records.map((record): [bigint, BlockRecord] => [record.start, record]));
    for (const block of ordered) {
      const record = recordByStart.get(block.start);
      if (!record) continue;
      for (const target of record.successors) {
        const successor = byAddress.get(target);
        if (!successor || block.#successors.includes(successor)) continue;
        block.#successors.push(successor);
        successor.#predecessors.push(block);
      }
    }

    return [entryBlock, ...ordered.filter(block => block !== entryBlock)];
  }
}

export const sortByStart = (blocks: Iterable<CodeBlock>, descending = false): CodeBlock[] => {
  const sorted = [...blocks].sort(byStart);
  return descending ? sorted.reverse() : sorted;
};
