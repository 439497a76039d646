export { parseAll, parseConfigFiles, parseConfigFile, isExcludedFile, DEFAULT_EXCLUDE_PATTERNS } from './assembler';
export { preprocessLines, createTopologyContext, TOPOLOGY_OBJECT } from './preprocessor';
export type { TopologyContext } from './preprocessor';
export { groupRootObjects, stripQuoted } from './grouper';
export { buildObject } from './builder';
export { classifyBodyLine } from './line-shapes';
export type { LineShape } from './line-shapes';
export { toJson, valueToJson, stringifyDocument } from './json';
export * from './types';
export * from './errors';
