import { compactFrames } from './frames';
import { DEFAULT_LAYOUT, writeAup2 } from './format/aup2';
import { projectToJson, projectToText } from './format/text';
import { parseAup2 } from './importers/aup2';
import { projectFromJson } from './importers/json';
import { isolateScenes } from './isolation';
import { reassignLayer } from './layers';
import { resolveTransformOptions, type TransformOptions, type TransformOptionsInput } from './options';
import { buildProject, findOverlaps, summarizeProject } from './project';
import type { Project, ProjectSummary } from './projectTypes';
import type { Aup2Layout } from '../types/aup2';
import { projectToSections } from './serialize';

export type ExportFormat = 'aup2' | 'txt' | 'json';

export type TransformStats = {
  matched: number;          // objects selected for reassignment
  compactedGroups: number;
  movedObjects: number;     // objects whose frame range changed
  before: ProjectSummary;
  after: ProjectSummary;
};

export type TransformResult = {
  project: Project;
  options: TransformOptions;
  warnings: string[];
  stats: TransformStats;
};

export type PipelineResult = TransformResult & { output: string };

type RunControl = { signal?: AbortSignal };

/**
 * Reassign, then compact or isolate. Each stage returns a fresh model; the
 * signal is checked between stages only.
 */
export function transformProject(
  project: Project,
  input: TransformOptionsInput = {},
  { signal }: RunControl = {}
): TransformResult {
  const options = resolveTransformOptions(input);
  const { targetLayer, sceneId } = options;
  const warnings: string[] = [];
  const before = summarizeProject(project);

  if (sceneId !== null && !project.scenes.some(s => s.sceneId === sceneId)) {
    warnings.push(`Scene ${sceneId} does not exist; nothing to do for it.`);
  }

  let cur = project;
  let matched = 0;

  signal?.throwIfAborted();
  if (targetLayer !== null) {
    const r = reassignLayer(cur, { targetLayer, sceneId });
    cur = r.project;
    matched = r.matched;
  }

  let compactedGroups = 0;
  let movedObjects = 0;

  signal?.throwIfAborted();
  if (options.isolateScenes || options.adjustFrames) {
    const r = options.isolateScenes
      ? isolateScenes(cur, { sceneId })
      : compactFrames(cur, { sceneId });
    cur = r.project;
    compactedGroups = r.groups;
    movedObjects = r.moved;
  } else {
    for (const o of findOverlaps(cur)) {
      warnings.push(`Scene ${o.sceneId}, layer ${o.layer}: objects ${o.first} and ${o.second} overlap.`);
    }
  }

  return {
    project: cur,
    options,
    warnings,
    stats: { matched, compactedGroups, movedObjects, before, after: summarizeProject(cur) },
  };
}

function encode(result: TransformResult, format: ExportFormat, layout: Aup2Layout): string {
  switch (format) {
    case 'txt':
      return projectToText(result.project);
    case 'json':
      return projectToJson(result.project);
    default:
      return writeAup2(projectToSections(result.project, { renumberObjects: result.options.renumberObjects }), layout);
  }
}

type EncodeControl = RunControl & { format?: ExportFormat };

/** Full text-to-text run: import, transform, then encode as .aup2 or dump as text/JSON. */
export function transformAup2(
  text: string,
  input: TransformOptionsInput = {},
  { format = 'aup2', signal }: EncodeControl = {}
): PipelineResult {
  const parsed = parseAup2(text);
  signal?.throwIfAborted();

  const result = transformProject(buildProject(parsed.sections), input, { signal });
  signal?.throwIfAborted();

  const output = encode(result, format, parsed.layout);
  return { ...result, output, warnings: [...parsed.warnings, ...result.warnings] };
}

/** Same run starting from a JSON dump. A .aup2 written from it uses the default layout. */
export function transformJson(
  text: string,
  input: TransformOptionsInput = {},
  { format = 'aup2', signal }: EncodeControl = {}
): PipelineResult {
  const result = transformProject(projectFromJson(text), input, { signal });
  signal?.throwIfAborted();
  return { ...result, output: encode(result, format, DEFAULT_LAYOUT) };
}
