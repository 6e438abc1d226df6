"use strict";

import { AddressDecodeError } from "../function-tracing/errors.js";
import { sign } from "./operand-bits.js";
import { X86Register } from "./registers.js";

export type Bitness = 16 | 32 | 64;

// Instruction auxiliary prefix flags.
export const AUX_USE32 = 0x0000_0008;
export const AUX_USE64 = 0x0000_0010;
export const AUX_NATOP = 0x0000_0800;
export const AUX_NATAD = 0x0000_1000;

// REX bits.
export const REX_B = 0x1;
export const REX_X = 0x2;
export const REX_R = 0x4;
export const REX_W = 0x8;

export interface X86InstructionEncoding {
  mnemonic: string;
  auxpref: number;
  insnpref: number;
}

export interface X86MemoryOperandEncoding {
  hasSib: boolean;
  /** Raw SIB byte when `hasSib` is set. */
  sib: number;
  /** Base register number, or the compact 16-bit addressing form. */
  phrase: number;
}

export interface DecodedMemoryOperand {
  base: number;
  index: number | null;
  scale: 1 | 2 | 4 | 8;
}

const CONDITIONAL_JUMPS: ReadonlySet<string> = new Set([
  "ja", "jae", "jb", "jbe", "jc", "je", "jg", "jge", "jl", "jle",
  "jna", "jnae", "jnb", "jnbe", "jnc", "jne", "jng", "jnge", "jnl", "jnle",
  "jno", "jnp", "jns", "jnz", "jo", "jp", "jpe", "jpo", "js", "jz"
]);

const DEFAULT_OPERAND_SIZE_64: ReadonlySet<string> = new Set([
  // stack
  "pop", "popf", "popfq", "push", "pushf", "pushfq",
  "retn", "retf", "retnq", "retfq", "call", "callfi", "callni",
  "enter", "enterq", "leave", "leaveq",
  // near branches
  "jcxz", "jecxz", "jrcxz", "jmp", "jmpni", "jmpshort",
  "loop", "loopq", "loope", "loopqe", "loopne", "loopqne"
]);

export const isConditionalJump = (insn: Pick<X86InstructionEncoding, "mnemonic">): boolean =>
  CONDITIONAL_JUMPS.has(insn.mnemonic.toLowerCase());

export const isDefaultOperandSize64 = (insn: Pick<X86InstructionEncoding, "mnemonic">): boolean =>
  isConditionalJump(insn) || DEFAULT_OPERAND_SIZE_64.has(insn.mnemonic.toLowerCase());

export const ad16 = (insn: X86InstructionEncoding): boolean => {
  const p = insn.auxpref & (AUX_USE32 | AUX_USE64 | AUX_NATAD);
  return p === AUX_NATAD || p === AUX_USE32;
};

export const op16 = (insn: X86InstructionEncoding): boolean => {
  const p = insn.auxpref & (AUX_USE32 | AUX_USE64 | AUX_NATOP);
  return p === AUX_NATOP || p === AUX_USE32 || (p === AUX_USE64 && (insn.insnpref & REX_W) === 0);
};

export const op32 = (insn: X86InstructionEncoding): boolean => {
  const p = insn.auxpref & (AUX_USE32 | AUX_USE64 | AUX_NATOP);
  return (
    p === 0 ||
    p === (AUX_USE32 | AUX_NATOP) ||
    (p === (AUX_USE64 | AUX_NATOP) && (insn.insnpref & REX_W) === 0)
  );
};

export const op64 = (insn: X86InstructionEncoding, bitness: Bitness): boolean => {
  if (bitness !== 64) return false;
  return (
    (insn.auxpref & AUX_USE64) !== 0 &&
    ((insn.insnpref & REX_W) !== 0 || ((insn.auxpref & AUX_NATOP) !== 0 && isDefaultOperandSize64(insn)))
  );
};

/** Operand width in bytes selected by the size predicates. */
export const operandSize = (insn: X86InstructionEncoding, bitness: Bitness): 2 | 4 | 8 => {
  if (op64(insn, bitness)) return 8;
  if (op16(insn)) return 2;
  return 4;
};

export const hasSib = (op: X86MemoryOperandEncoding): boolean => op.hasSib;

export const sibBase = (insn: X86InstructionEncoding, op: X86MemoryOperandEncoding, bitness: Bitness): number => {
  let base = op.sib & 7;
  if (bitness === 64 && (insn.insnpref & REX_B) !== 0) base |= 8;
  return base;
};

export const sibIndex = (insn: X86InstructionEncoding, op: X86MemoryOperandEncoding, bitness: Bitness): number => {
  let index = (op.sib >> 3) & 7;
  if (bitness === 64 && (insn.insnpref & REX_X) !== 0) index |= 8;
  return index;
};

export const sibScale = (op: X86MemoryOperandEncoding): 1 | 2 | 4 | 8 => {
  switch ((op.sib >> 6) & 3) {
    case 0:
      return 1;
    case 1:
      return 2;
    case 2:
      return 4;
    default:
      return 8;
  }
};

/**
 * Base register of a memory operand. Without a SIB byte, 16-bit addressing uses the compact forms:
 * 0 [BX+SI], 1 [BX+DI], 2 [BP+SI], 3 [BP+DI], 4 [SI], 5 [DI], 6 [BP], 7 [BX].
 */
export const x86BaseReg = (insn: X86InstructionEncoding, op: X86MemoryOperandEncoding, bitness: Bitness): number => {
  if (hasSib(op)) return sibBase(insn, op, bitness);
  if (!ad16(insn)) return op.phrase;
  if (sign(BigInt(op.phrase), bitness) === -1n) return X86Register.RSP;
  switch (op.phrase) {
    case 0:
    case 1:
    case 7:
      return X86Register.RBX;
    case 2:
    case 3:
    case 6:
      return X86Register.RBP;
    case 4:
      return X86Register.RSI;
    case 5:
      return X86Register.RDI;
    default:
      throw new AddressDecodeError(`Unable to decode x86 base register from phrase ${op.phrase}.`);
  }
};

/** Index register number, or -1 when the operand has none. */
export const x86IndexReg = (insn: X86InstructionEncoding, op: X86MemoryOperandEncoding, bitness: Bitness): number => {
  if (hasSib(op)) {
    const index = sibIndex(insn, op, bitness);
    return index === 4 ? -1 : index;
  }
  if (!ad16(insn)) return -1;
  switch (op.phrase) {
    case 0:
    case 2:
      return X86Register.RSI;
    case 1:
    case 3:
      return X86Register.RDI;
    case 4:
    case 5:
    case 6:
    case 7:
      return -1;
    default:
      throw new AddressDecodeError(`Unable to decode x86 index register from phrase ${op.phrase}.`);
  }
};

export const decodeMemoryOperand = (
  insn: X86InstructionEncoding,
  op: X86MemoryOperandEncoding,
  bitness: Bitness
): DecodedMemoryOperand => {
  const index = x86IndexReg(insn, op, bitness);
  return {
    base: x86BaseReg(insn, op, bitness),
    index: index === -1 ? null : index,
    scale: hasSib(op) ? sibScale(op) : 1
  };
};
