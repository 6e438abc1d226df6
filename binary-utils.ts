"use strict";

export const toHex64 = (value: bigint | number): string =>
  value < 0 ? "-0x" + (-value).toString(16) : "0x" + value.toString(16);

export const formatAddressRange = (start: bigint, end: bigint): string => `${toHex64(start)}-${toHex64(end)}`;

export const alignUpTo = (value: bigint, alignment: bigint): bigint => {
  if (alignment <= 0n) return value;
  const mask = alignment - 1n;
  return (value + mask) & ~mask;
};

export const lowerBound = (sorted: readonly bigint[], value: bigint): number => {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const probe = sorted[mid];
    if (probe !== undefined && probe < value) low = mid + 1;
    else high = mid;
  }
  return low;
};
