"use strict";

import type { IcedDecoder, IcedInstruction, IcedX86Module } from "../../analyzers/x86/disassembly-iced.js";

const FLOW = {
  Next: 0,
  UnconditionalBranch: 1,
  ConditionalBranch: 2,
  Call: 3,
  IndirectBranch: 5,
  Return: 6,
  Interrupt: 7,
  Exception: 9
} as const;

const NEAR_BRANCH_32 = 2;

export class TestInstruction implements IcedInstruction {
  code = 0;
  length = 0;
  ip = 0n;
  nextIP = 0n;
  flowControl = 0;
  nearBranchTarget = 0n;
  op0Kind = 0;
  free(): void {}
}

const rel8 = (byte: number): bigint => BigInt(byte >= 0x80 ? byte - 0x100 : byte);

/**
 * Byte-per-opcode decoder: 0x90 nop, 0xc3 ret, 0xcc int3, 0x74 rel8 je, 0xeb rel8 jmp,
 * 0xe8 call (5 bytes, target ignored), 0xff indirect jump (2 bytes), 0x0f ud2 (2 bytes), anything
 * else invalid.
 */
export class TestDecoder implements IcedDecoder {
  readonly bitness: number;
  readonly data: Uint8Array;
  ip = 0n;
  position = 0;

  constructor(bitness: number, data: Uint8Array) {
    this.bitness = bitness;
    this.data = data;
  }

  get canDecode(): boolean {
    return this.position >= 0 && this.position < this.data.length;
  }

  decodeOut(instruction: TestInstruction): void {
    const byte = this.data[this.position] ?? 0;
    let length = 1;
    let code = 1;
    let flowControl: number = FLOW.Next;
    let target: bigint | null = null;

    switch (byte) {
      case 0x90:
        break;
      case 0xc3:
        flowControl = FLOW.Return;
        break;
      case 0xcc:
        flowControl = FLOW.Interrupt;
        break;
      case 0x74:
      case 0xeb:
        length = 2;
        flowControl = byte === 0x74 ? FLOW.ConditionalBranch : FLOW.UnconditionalBranch;
        target = this.ip + 2n + rel8(this.data[this.position + 1] ?? 0);
        break;
      case 0xe8:
        length = 5;
        flowControl = FLOW.Call;
        target = 0xdead_0000n;
        break;
      case 0xff:
        length = 2;
        flowControl = FLOW.IndirectBranch;
        break;
      case 0x0f:
        length = 2;
        code = -2;
        flowControl = FLOW.Exception;
        break;
      default:
        code = -1;
    }

    instruction.ip = this.ip;
    instruction.length = length;
    instruction.nextIP = this.ip + BigInt(length);
    instruction.code = code;
    instruction.flowControl = flowControl;
    instruction.op0Kind = target === null ? 0 : NEAR_BRANCH_32;
    instruction.nearBranchTarget = target ?? 0n;

    this.ip = instruction.nextIP;
    this.position += length;
  }

  free(): void {}
}

export const createFakeIced = (Instruction: new () => TestInstruction = TestInstruction): IcedX86Module => ({
  Code: { INVALID: -1, Ud2: -2 },
  Decoder: TestDecoder,
  DecoderOptions: { None: 0 },
  FlowControl: { ...FLOW },
  OpKind: { NearBranch16: 1, NearBranch32: NEAR_BRANCH_32, NearBranch64: 3 },
  Instruction
});
