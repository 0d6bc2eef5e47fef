export { BinaryHeapLayout } from "./binaryHeapLayout.js";
export { MinMaxHeapLayout, isMinLevel, levelOf } from "./minMaxHeapLayout.js";
export { HeapDict, createLayout, type HeapDictSource, type Mapping } from "./heapDict.js";
