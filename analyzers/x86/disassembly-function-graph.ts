"use strict";

import { lowerBound, toHex64 } from "../../binary-utils.js";
import type {
  ArchitectureInfo,
  BlockRecord,
  FunctionBounds,
  FunctionGraphSource
} from "../function-tracing/types.js";
import type { Bitness } from "./addressing.js";
import { type IcedX86Module, isNearBranch } from "./disassembly-iced.js";

type FlowKind = "next" | "branch" | "conditional" | "stop";

type DecodedInstruction = {
  address: bigint;
  next: bigint;
  flow: FlowKind;
  target: bigint | null;
};

type DecodedFunction = {
  bounds: FunctionBounds;
  blocks: BlockRecord[];
};

export interface IcedFunctionGraphSourceOptions {
  iced: IcedX86Module;
  bitness: Bitness;
  baseAddress: bigint;
  data: Uint8Array;
  functionStarts: readonly bigint[];
  littleEndian?: boolean;
}

const MAX_DECODE_STOP_ISSUES = 200;

const compareAddresses = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Disassembler backed by iced-x86: decodes each listed function by recursive descent over the code
 * bytes and splits it into basic blocks. Call targets are other functions and are not followed.
 * A function's bounds run from its start to the furthest decoded byte; an address belongs to the
 * function when one of its blocks holds it.
 *
 * Decoding problems never throw; they are reported on `issues`.
 */
export class IcedFunctionGraphSource implements FunctionGraphSource {
  readonly architecture: ArchitectureInfo;
  readonly #iced: IcedX86Module;
  readonly #baseAddress: bigint;
  readonly #data: Uint8Array;
  readonly #functionStarts: readonly bigint[];
  readonly #functions = new Map<bigint, DecodedFunction | null>();
  readonly #instructions = new Map<bigint, DecodedInstruction>();
  #sortedHeads: bigint[] | null = null;
  #decodeStopIssuesLogged = 0;
  #decodeStopIssuesSuppressed = 0;
  readonly #issues: string[] = [];

  constructor(opts: IcedFunctionGraphSourceOptions) {
    this.#iced = opts.iced;
    this.#baseAddress = opts.baseAddress;
    this.#data = opts.data;
    this.#functionStarts = [...new Set(opts.functionStarts)].sort(compareAddresses);
    this.architecture = { bitness: opts.bitness, littleEndian: opts.littleEndian ?? true };
  }

  /** Decode diagnostics, capped with a trailing summary of what was left out. */
  get issues(): string[] {
    if (this.#decodeStopIssuesSuppressed === 0) return [...this.#issues];
    return [
      ...this.#issues,
      `Additional ${this.#decodeStopIssuesSuppressed} decode stop(s) omitted; showing first ${MAX_DECODE_STOP_ISSUES}.`
    ];
  }

  getFunction(address: bigint): FunctionBounds | null {
    for (const start of this.#functionStarts) {
      const decoded = this.#decodeFunction(start);
      if (decoded?.blocks.some(block => block.start <= address && address < block.end)) {
        return { ...decoded.bounds };
      }
    }
    return null;
  }

  getBlocks(func: FunctionBounds): readonly BlockRecord[] {
    return this.#decodeFunction(func.start)?.blocks ?? [];
  }

  heads(start: bigint, end: bigint): readonly bigint[] {
    const sorted = this.#heads();
    const out: bigint[] = [];
    for (let index = lowerBound(sorted, start); index < sorted.length; index += 1) {
      const head = sorted[index];
      if (head === undefined || head >= end) break;
      out.push(head);
    }
    return out;
  }

  #heads(): bigint[] {
    if (!this.#sortedHeads) this.#sortedHeads = [...this.#instructions.keys()].sort(compareAddresses);
    return this.#sortedHeads;
  }

  #offsetOf(address: bigint): number | null {
    if (address < this.#baseAddress) return null;
    const offset = Number(address - this.#baseAddress);
    if (!Number.isSafeInteger(offset) || offset >= this.#data.length) return null;
    return offset;
  }

  #recordDecodeStopIssue(message: string): void {
    if (this.#decodeStopIssuesLogged < MAX_DECODE_STOP_ISSUES) {
      this.#issues.push(message);
      this.#decodeStopIssuesLogged += 1;
    } else {
      this.#decodeStopIssuesSuppressed += 1;
    }
  }

  #safeFree(resource: { free(): void }): void {
    try {
      resource.free();
    } catch (err) {
      this.#issues.push(`Failed to release an iced-x86 object (${String(err)}).`);
    }
  }

  #decodeFunction(start: bigint): DecodedFunction | null {
    const cached = this.#functions.get(start);
    if (cached !== undefined) return cached;
    if (this.#offsetOf(start) == null) {
      this.#recordDecodeStopIssue(`Function start ${toHex64(start)} is outside the code bytes.`);
      this.#functions.set(start, null);
      return null;
    }

    const iced = this.#iced;
    const decoded = new Map<bigint, DecodedInstruction>();
    const leaders = new Set<bigint>([start]);
    const queue: bigint[] = [start];
    const queued = new Set<bigint>([start]);
    const addWork = (address: bigint): void => {
      leaders.add(address);
      if (queued.has(address) || decoded.has(address)) return;
      queue.push(address);
      queued.add(address);
    };

    const decoder = new iced.Decoder(this.architecture.bitness, this.#data, iced.DecoderOptions.None);
    const instr = new iced.Instruction();
    try {
      while (queue.length > 0) {
        const startAddress = queue.pop();
        if (startAddress == null) break;
        const offset = this.#offsetOf(startAddress);
        if (offset == null) continue;
        decoder.position = offset;
        decoder.ip = BigInt.asUintN(64, startAddress);

        while (decoder.canDecode) {
          decoder.decodeOut(instr);
          const address = BigInt.asUintN(64, instr.ip);
          if (decoded.has(address)) break;

          const isUd2Trap = instr.code === iced.Code["Ud2"];
          const isHardException = instr.flowControl === iced.FlowControl["Exception"] && !isUd2Trap;
          if (instr.length <= 0 || instr.code === iced.Code["INVALID"] || isHardException) {
            this.#recordDecodeStopIssue(`Stopping at an invalid instruction at address ${toHex64(address)}.`);
            break;
          }

          const next = BigInt.asUintN(64, instr.nextIP);
          const nearTarget = isNearBranch(instr.op0Kind, iced.OpKind) ? BigInt.asUintN(64, instr.nearBranchTarget) : null;
          const target = nearTarget != null && this.#offsetOf(nearTarget) != null ? nearTarget : null;
          const entry: DecodedInstruction = { address, next, flow: "next", target: null };
          decoded.set(address, entry);

          if (instr.flowControl === iced.FlowControl["UnconditionalBranch"]) {
            entry.flow = "branch";
            entry.target = target;
            if (target != null) addWork(target);
            break;
          }
          if (instr.flowControl === iced.FlowControl["ConditionalBranch"]) {
            entry.flow = "conditional";
            entry.target = target;
            if (target != null) addWork(target);
            leaders.add(next);
          } else if (
            isUd2Trap ||
            instr.flowControl === iced.FlowControl["IndirectBranch"] ||
            instr.flowControl === iced.FlowControl["Return"] ||
            instr.flowControl === iced.FlowControl["Interrupt"]
          ) {
            entry.flow = "stop";
            break;
          }

          if (this.#offsetOf(next) == null) break;
        }
      }
    } finally {
      this.#safeFree(instr);
      this.#safeFree(decoder);
    }

    const result = this.#buildBlocks(start, decoded, leaders);
    this.#functions.set(start, result);
    for (const [address, instruction] of decoded) {
      if (!this.#instructions.has(address)) this.#instructions.set(address, instruction);
    }
    this.#sortedHeads = null;
    return result;
  }

  #buildBlocks(start: bigint, decoded: Map<bigint, DecodedInstruction>, leaders: Set<bigint>): DecodedFunction {
    const ordered = [...decoded.values()].sort((a, b) => compareAddresses(a.address, b.address));
    const blocks: BlockRecord[] = [];
    let blockStart: bigint | null = null;
    let previous: DecodedInstruction | null = null;

    const closeBlock = (last: DecodedInstruction): void => {
      if (blockStart == null) return;
      const successors: bigint[] = [];
      const addSuccessor = (address: bigint | null): void => {
        if (address != null && decoded.has(address) && !successors.includes(address)) successors.push(address);
      };
      if (last.flow === "next" || last.flow === "conditional") addSuccessor(last.next);
      if (last.flow === "branch" || last.flow === "conditional") addSuccessor(last.target);
      blocks.push({ start: blockStart, end: last.next, successors });
      blockStart = null;
    };

    for (const instruction of ordered) {
      if (previous && (previous.next !== instruction.address || leaders.has(instruction.address) || previous.flow !== "next")) {
        closeBlock(previous);
      }
      if (blockStart == null) blockStart = instruction.address;
      previous = instruction;
    }
    if (previous) closeBlock(previous);

    const end = ordered.reduce((max, instruction) => (instruction.next > max ? instruction.next : max), start);
    return { bounds: { start, end }, blocks };
  }
}
