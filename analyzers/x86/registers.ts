"use strict";

import { FunctionTracingError, InvalidWidthError } from "../function-tracing/errors.js";

export type RegisterWidth = 1 | 2 | 4 | 8;

export const X86Register = {
  RAX: 0,
  RCX: 1,
  RDX: 2,
  RBX: 3,
  RSP: 4,
  RBP: 5,
  RSI: 6,
  RDI: 7
} as const;

export const GENERAL_REGISTER_COUNT = 16;

const LEGACY_NAMES: Record<RegisterWidth, readonly string[]> = {
  8: ["rax", "rcx", "rdx", "rbx", "rsp", "rbp", "rsi", "rdi"],
  4: ["eax", "ecx", "edx", "ebx", "esp", "ebp", "esi", "edi"],
  2: ["ax", "cx", "dx", "bx", "sp", "bp", "si", "di"],
  1: ["al", "cl", "dl", "bl", "spl", "bpl", "sil", "dil"]
};

const EXTENDED_SUFFIX: Record<RegisterWidth, string> = { 8: "", 4: "d", 2: "w", 1: "b" };

// ah/ch/dh/bh alias the low registers they live in.
const HIGH_BYTE_NAMES: readonly string[] = ["ah", "ch", "dh", "bh"];

const isRegisterWidth = (width: number): width is RegisterWidth =>
  width === 1 || width === 2 || width === 4 || width === 8;

export const registerName = (index: number, width: number): string => {
  if (!isRegisterWidth(width)) throw new InvalidWidthError(width);
  if (!Number.isInteger(index) || index < 0 || index >= GENERAL_REGISTER_COUNT) {
    throw new FunctionTracingError(`Register number ${index} is not a general purpose register.`);
  }
  const legacy = LEGACY_NAMES[width][index];
  return legacy ?? `r${index}${EXTENDED_SUFFIX[width]}`;
};

export const registerIndex = (name: string): number | null => {
  const lowered = name.toLowerCase();
  const highByte = HIGH_BYTE_NAMES.indexOf(lowered);
  if (highByte >= 0) return highByte;
  for (const names of Object.values(LEGACY_NAMES)) {
    const index = names.indexOf(lowered);
    if (index >= 0) return index;
  }
  const extended = /^r(\d{1,2})([dwb]?)$/.exec(lowered);
  if (!extended) return null;
  const index = Number(extended[1]);
  return index >= 8 && index < GENERAL_REGISTER_COUNT ? index : null;
};

/** Same register at another width, e.g. `convertRegister("eax", 8)` is `"rax"`. */
export const convertRegister = (name: string, width: number): string => {
  const index = registerIndex(name);
  if (index == null) throw new FunctionTracingError(`Unknown register name: ${name}`);
  return registerName(index, width);
};

export interface ResolvedRegister {
  index: number;
  width: RegisterWidth;
  /** Set for ah/ch/dh/bh, which read bits 8-15 of their register. */
  highByte: boolean;
}

export const resolveRegister = (name: string): ResolvedRegister | null => {
  const lowered = name.toLowerCase();
  const index = registerIndex(lowered);
  if (index == null) return null;
  if (HIGH_BYTE_NAMES.includes(lowered)) return { index, width: 1, highByte: true };
  for (const width of [8, 4, 2, 1] as const) {
    if (registerName(index, width) === lowered) return { index, width, highByte: false };
  }
  return null;
};
