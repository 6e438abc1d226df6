"use strict";

import { toHex64 } from "../../binary-utils.js";

export class FunctionTracingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FunctionTracingError";
  }
}

export class InvalidFunctionError extends FunctionTracingError {
  readonly address: bigint;

  constructor(address: bigint, message = `Address ${toHex64(address)} is not inside a known function.`) {
    super(message);
    this.name = "InvalidFunctionError";
    this.address = address;
  }
}

export class AddressOutOfRangeError extends FunctionTracingError {
  readonly address: bigint;
  readonly start: bigint;
  readonly end: bigint;

  constructor(address: bigint, start: bigint, end: bigint) {
    super(`Address ${toHex64(address)} is not in block ${toHex64(start)} :: ${toHex64(end)}.`);
    this.name = "AddressOutOfRangeError";
    this.address = address;
    this.start = start;
    this.end = end;
  }
}

export class AddressDecodeError extends FunctionTracingError {
  constructor(message: string) {
    super(message);
    this.name = "AddressDecodeError";
  }
}

export class InvalidWidthError extends FunctionTracingError {
  readonly width: number;

  constructor(width: number) {
    super(`Invalid width to pack or unpack: ${width}.`);
    this.name = "InvalidWidthError";
    this.width = width;
  }
}

export class InvalidPrecisionError extends FunctionTracingError {
  readonly precision: number;

  constructor(precision: number) {
    super(`Precision ${precision} is not valid.`);
    this.name = "InvalidPrecisionError";
    this.precision = precision;
  }
}
