"use strict";

import { FunctionTracingError } from "../function-tracing/errors.js";

export type IcedInstruction = {
  code: number;
  length: number;
  ip: bigint;
  nextIP: bigint;
  readonly flowControl: number;
  readonly nearBranchTarget: bigint;
  op0Kind: number;
  free(): void;
};

export type IcedDecoder = {
  ip: bigint;
  canDecode: boolean;
  position: number;
  decodeOut(instruction: IcedInstruction): void;
  free(): void;
};

export type IcedX86Module = {
  Code: Record<string, number> & Record<number, string | undefined>;
  Decoder: new (bitness: number, data: Uint8Array, options: number) => IcedDecoder;
  DecoderOptions: { None: number };
  FlowControl: Record<string, number> & Record<number, string | undefined>;
  OpKind: Record<string, number> & Record<number, string | undefined>;
  Instruction: new () => IcedInstruction;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

export const isIcedX86Module = (value: unknown): value is IcedX86Module => {
  if (!isRecord(value)) return false;

  const decoderOptions = value["DecoderOptions"];
  if (!isRecord(decoderOptions) || typeof decoderOptions["None"] !== "number") return false;

  const code = value["Code"];
  if (!isRecord(code) || typeof code["INVALID"] !== "number") return false;

  const flowControl = value["FlowControl"];
  const opKind = value["OpKind"];
  if (!isRecord(flowControl) || !isRecord(opKind)) return false;

  return typeof value["Decoder"] === "function" && typeof value["Instruction"] === "function";
};

export const isNearBranch = (opKind: number, OpKind: IcedX86Module["OpKind"]): boolean =>
  opKind === OpKind["NearBranch16"] || opKind === OpKind["NearBranch32"] || opKind === OpKind["NearBranch64"];

/**
 * Loads the iced-x86 package. CommonJS interop may expose the exports either on the namespace or on
 * its `default` export; both shapes are accepted.
 */
export const loadIcedX86 = async (): Promise<IcedX86Module> => {
  let loaded: unknown;
  try {
    loaded = await import("iced-x86");
  } catch (err) {
    throw new FunctionTracingError(`Failed to load iced-x86 disassembler (${String(err)})`, { cause: err });
  }
  if (isIcedX86Module(loaded)) return loaded;
  const fallback = isRecord(loaded) ? loaded["default"] : undefined;
  if (isIcedX86Module(fallback)) return fallback;
  throw new FunctionTracingError("Failed to load iced-x86 disassembler (unexpected module shape).");
};
