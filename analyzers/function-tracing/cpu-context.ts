"use strict";

import { getMask, pack, unpack } from "../x86/operand-bits.js";
import { resolveRegister } from "../x86/registers.js";
import { FunctionTracingError } from "./errors.js";
import type { ArchitectureInfo, ContextProvider } from "./types.js";

export type ProcessorStep = (context: ProcessorContext, address: bigint) => void;

interface ProcessorState {
  ip: bigint;
  registers: Map<number, bigint>;
  flags: Map<string, boolean>;
  memory: Map<bigint, number>;
  executedInstructions: bigint[];
}

/**
 * Emulated register, flag and memory state. Registers are kept at full 64-bit width and keyed by
 * register number; memory is sparse and reads unset bytes as zero.
 */
export class ProcessorContext {
  readonly architecture: ArchitectureInfo;
  ip: bigint;
  readonly executedInstructions: bigint[];
  readonly #registers: Map<number, bigint>;
  readonly #flags: Map<string, boolean>;
  readonly #memory: Map<bigint, number>;

  constructor(architecture: ArchitectureInfo, state?: ProcessorState) {
    this.architecture = { ...architecture };
    this.ip = state?.ip ?? 0n;
    this.executedInstructions = state?.executedInstructions ?? [];
    this.#registers = state?.registers ?? new Map();
    this.#flags = state?.flags ?? new Map();
    this.#memory = state?.memory ?? new Map();
  }

  get registerWidth(): 2 | 4 | 8 {
    return this.architecture.bitness === 64 ? 8 : this.architecture.bitness === 32 ? 4 : 2;
  }

  getRegister(index: number, width: number = this.registerWidth): bigint {
    return (this.#registers.get(index) ?? 0n) & getMask(width);
  }

  setRegister(index: number, value: bigint, width: number = this.registerWidth): void {
    const mask = getMask(width);
    // 32-bit writes clear the upper half in long mode.
    if (width === 8 || (width === 4 && this.architecture.bitness === 64)) {
      this.#registers.set(index, value & mask);
      return;
    }
    const current = this.#registers.get(index) ?? 0n;
    this.#registers.set(index, (current & ~mask) | (value & mask));
  }

  getRegisterByName(name: string): bigint {
    const register = resolveRegister(name);
    if (!register) throw new FunctionTracingError(`Unknown register name: ${name}`);
    if (register.highByte) return (this.getRegister(register.index, 2) >> 8n) & 0xffn;
    return this.getRegister(register.index, register.width);
  }

  setRegisterByName(name: string, value: bigint): void {
    const register = resolveRegister(name);
    if (!register) throw new FunctionTracingError(`Unknown register name: ${name}`);
    if (register.highByte) {
      const current = this.getRegister(register.index, 2);
      this.setRegister(register.index, (current & 0xffn) | ((value & 0xffn) << 8n), 2);
      return;
    }
    this.setRegister(register.index, value, register.width);
  }

  getFlag(name: string): boolean {
    return this.#flags.get(name.toLowerCase()) ?? false;
  }

  setFlag(name: string, value: boolean): void {
    this.#flags.set(name.toLowerCase(), value);
  }

  readMemory(address: bigint, size: number): Uint8Array {
    const bytes = new Uint8Array(size);
    for (let index = 0; index < size; index += 1) {
      bytes[index] = this.#memory.get(address + BigInt(index)) ?? 0;
    }
    return bytes;
  }

  writeMemory(address: bigint, bytes: ArrayLike<number>): void {
    for (let index = 0; index < bytes.length; index += 1) {
      this.#memory.set(address + BigInt(index), (bytes[index] ?? 0) & 0xff);
    }
  }

  readInt(address: bigint, width: number, signed = false): bigint {
    return unpack(this.readMemory(address, width), { signed, littleEndian: this.architecture.littleEndian });
  }

  writeInt(address: bigint, value: bigint, width: number): void {
    this.writeMemory(address, pack(value, width, this.architecture.littleEndian));
  }

  clone(): ProcessorContext {
    return new ProcessorContext(this.architecture, {
      ip: this.ip,
      registers: new Map(this.#registers),
      flags: new Map(this.#flags),
      memory: new Map(this.#memory),
      executedInstructions: [...this.executedInstructions]
    });
  }
}

/**
 * Context provider over {@link ProcessorContext}. Every step records the address it replays; `step`
 * carries the instruction semantics.
 */
export const processorContextProvider = (
  architecture: ArchitectureInfo,
  step?: ProcessorStep
): ContextProvider<ProcessorContext> => ({
  createContext: () => new ProcessorContext(architecture),
  cloneContext: context => context.clone(),
  step: (context, address) => {
    context.ip = address;
    step?.(context, address);
    context.executedInstructions.push(address);
  }
});
