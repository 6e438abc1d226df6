"use strict";

import { alignUpTo } from "../../binary-utils.js";
import { InvalidPrecisionError, InvalidWidthError } from "../function-tracing/errors.js";

export type PackWidth = 1 | 2 | 4 | 8 | 16;

const PACK_WIDTHS: readonly number[] = [1, 2, 4, 8, 16];
const MASK_64 = 0xffff_ffff_ffff_ffffn;
const PAGE_SIZE = 0x1000n;

export const isPackWidth = (width: number): width is PackWidth => PACK_WIDTHS.includes(width);

/** All-ones mask covering `size` bytes. */
export const getMask = (size: number): bigint => (1n << BigInt(8 * size)) - 1n;

/**
 * Two's-complement interpretation of `value` at `bitWidth` bits.
 */
export const sign = (value: bigint, bitWidth: number): bigint => {
  const width = BigInt(bitWidth);
  const masked = value & ((1n << width) - 1n);
  return (masked >> (width - 1n)) & 1n ? masked - (1n << width) : masked;
};

export const signBit = (value: bigint, width: number): bigint => (value >> BigInt(8 * width - 1)) & 1n;

export const signExtend = (value: bigint, fromBytes: number, toBytes: number): bigint => {
  const fromMask = getMask(fromBytes);
  const toMask = getMask(toBytes);
  const masked = value & fromMask;
  if (signBit(masked, fromBytes)) {
    return ((toMask << BigInt(8 * fromBytes)) | masked) & toMask;
  }
  return masked & toMask;
};

/**
 * Smallest operand width (1, 2, 4, 8 or 16 bytes) able to hold `value`.
 * Negative values are measured as two's-complement.
 */
export const getByteWidth = (value: bigint): PackWidth => {
  for (const width of [1, 2, 4, 8, 16] as const) {
    const bits = BigInt(8 * width);
    if (value >= 0n ? value <= getMask(width) : value >= -(1n << (bits - 1n))) return width;
  }
  throw new InvalidWidthError(Math.ceil(value.toString(2).replace("-", "").length / 8));
};

export const alignPageUp = (value: bigint): bigint => alignUpTo(value, PAGE_SIZE);

const writeUnsigned = (view: DataView, offset: number, width: number, value: bigint, littleEndian: boolean): void => {
  switch (width) {
    case 1:
      view.setUint8(offset, Number(value));
      return;
    case 2:
      view.setUint16(offset, Number(value), littleEndian);
      return;
    case 4:
      view.setUint32(offset, Number(value), littleEndian);
      return;
    case 8:
      view.setBigUint64(offset, value, littleEndian);
      return;
    default:
      throw new InvalidWidthError(width);
  }
};

const readUnsigned = (view: DataView, offset: number, width: number, littleEndian: boolean): bigint => {
  switch (width) {
    case 1:
      return BigInt(view.getUint8(offset));
    case 2:
      return BigInt(view.getUint16(offset, littleEndian));
    case 4:
      return BigInt(view.getUint32(offset, littleEndian));
    case 8:
      return view.getBigUint64(offset, littleEndian);
    default:
      throw new InvalidWidthError(width);
  }
};

/**
 * Packs `value` into `width` bytes. Values wider than `width` are truncated and negative values are
 * written as two's-complement. 16-byte values are two 8-byte halves ordered by endianness.
 */
export const pack = (value: bigint, width: number, littleEndian = true): Uint8Array => {
  if (!isPackWidth(width)) throw new InvalidWidthError(width);
  const bytes = new Uint8Array(width);
  const view = new DataView(bytes.buffer);
  const masked = value & getMask(width);
  if (width === 16) {
    const low = masked & MASK_64;
    const high = masked >> 64n;
    writeUnsigned(view, 0, 8, littleEndian ? low : high, littleEndian);
    writeUnsigned(view, 8, 8, littleEndian ? high : low, littleEndian);
  } else {
    writeUnsigned(view, 0, width, masked, littleEndian);
  }
  return bytes;
};

export interface UnpackOptions {
  signed?: boolean;
  littleEndian?: boolean;
}

/** Reads an integer whose width is the buffer length. */
export const unpack = (buffer: Uint8Array | ArrayLike<number>, options: UnpackOptions = {}): bigint => {
  const width = buffer.length;
  if (!isPackWidth(width)) throw new InvalidWidthError(width);
  const littleEndian = options.littleEndian ?? true;
  const bytes = Uint8Array.from(buffer);
  const view = new DataView(bytes.buffer);
  let value: bigint;
  if (width === 16) {
    const first = readUnsigned(view, 0, 8, littleEndian);
    const second = readUnsigned(view, 8, 8, littleEndian);
    value = littleEndian ? (second << 64n) | first : (first << 64n) | second;
  } else {
    value = readUnsigned(view, 0, width, littleEndian);
  }
  return options.signed ? sign(value, width * 8) : value;
};

/**
 * Bit pattern of `value` as IEEE-754 single (precision 1) or double (precision 2).
 */
export const floatToInt = (value: number, precision = 2): bigint => {
  const view = new DataView(new ArrayBuffer(8));
  if (precision === 1) {
    view.setFloat32(0, value, true);
    return BigInt(view.getUint32(0, true));
  }
  if (precision === 2) {
    view.setFloat64(0, value, true);
    return view.getBigUint64(0, true);
  }
  throw new InvalidPrecisionError(precision);
};

export const intToFloat = (value: bigint, precision = 2): number => {
  const view = new DataView(new ArrayBuffer(8));
  if (precision === 1) {
    view.setUint32(0, Number(value & 0xffff_ffffn), true);
    return view.getFloat32(0, true);
  }
  if (precision === 2) {
    view.setBigUint64(0, value & MASK_64, true);
    return view.getFloat64(0, true);
  }
  throw new InvalidPrecisionError(precision);
};
