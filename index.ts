"use strict";

export * from "./analyzers/function-tracing/index.js";
export * from "./analyzers/x86/addressing.js";
export * from "./analyzers/x86/operand-bits.js";
export * from "./analyzers/x86/registers.js";
export { isIcedX86Module, loadIcedX86, type IcedX86Module } from "./analyzers/x86/disassembly-iced.js";
export {
  IcedFunctionGraphSource,
  type IcedFunctionGraphSourceOptions
} from "./analyzers/x86/disassembly-function-graph.js";
