export type { Aup2Field, Aup2Layout, Aup2Section, ParsedAup2 } from '../types/aup2';
export type * from './projectTypes';
export { Aup2ParseError, OptionRangeError, StructuralError } from './errors';
export { parseAup2 } from './importers/aup2';
export { projectFromJson, ProjectSchema } from './importers/json';
export { DEFAULT_LAYOUT, writeAup2 } from './format/aup2';
export { projectToJson, projectToText } from './format/text';
export {
  allObjects,
  buildProject,
  fieldValue,
  findOverlaps,
  objectsInScene,
  parseFrameValue,
  parseIntValue,
  summarizeProject,
} from './project';
export { reassignLayer, type ReassignOptions, type ReassignResult } from './layers';
export { compactFrames, packRanges, type CompactOptions, type CompactResult, type FrameRange } from './frames';
export { isolateScenes } from './isolation';
export { projectToSections, type SerializeOptions } from './serialize';
export {
  resolveTransformOptions,
  TransformOptionsSchema,
  type TransformOptions,
  type TransformOptionsInput,
} from './options';
export {
  transformAup2,
  transformJson,
  transformProject,
  type ExportFormat,
  type PipelineResult,
  type TransformResult,
  type TransformStats,
} from './pipeline';
