"use strict";

export { CodeBlock } from "./code-block.js";
export { ProcessorContext, processorContextProvider, type ProcessorStep } from "./cpu-context.js";
export {
  AddressDecodeError,
  AddressOutOfRangeError,
  FunctionTracingError,
  InvalidFunctionError,
  InvalidPrecisionError,
  InvalidWidthError
} from "./errors.js";
export { ControlFlowGraph, getCodeBlock, type ControlFlowGraphOptions, type GetPathsOptions } from "./flowchart.js";
export { PathBlock } from "./path-block.js";
export type { PathCacheStats } from "./path-enumeration.js";
export {
  bfsIterBlocks,
  bfsIterHeads,
  dfsIterBlocks,
  dfsIterHeads,
  pathsToAddress,
  traverse,
  type TraversableGraph,
  type TraversalMode
} from "./traversal.js";
export type { ArchitectureInfo, BlockRecord, ContextProvider, FunctionBounds, FunctionGraphSource } from "./types.js";
