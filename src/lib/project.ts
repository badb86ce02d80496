import type { Aup2Section } from '../types/aup2';
import { StructuralError } from './errors';
import type { Field, FrameOverlap, Project, ProjectSummary, Scene, SceneObject } from './projectTypes';

const INT_RE = /^\s*(-?\d+)\s*$/;
// frame=start,end
const FRAME_RE = /^\s*(-?\d+)\s*,\s*(-?\d+)\s*$/;

export function fieldValue(fields: Field[], key: string): string | undefined {
  return fields.find(f => f.key === key)?.value;
}

/** Integer value as the importer reads it, or null when it is not one. */
export function parseIntValue(raw: string): number | null {
  const m = INT_RE.exec(raw);
  return m ? parseInt(m[1], 10) : null;
}

export function parseFrameValue(raw: string): [number, number] | null {
  const m = FRAME_RE.exec(raw);
  return m ? [parseInt(m[1], 10), parseInt(m[2], 10)] : null;
}

function readInt(fields: Field[], key: string, objectId: number): number {
  const raw = fieldValue(fields, key);
  if (raw === undefined) throw new StructuralError(`Object ${objectId} has no '${key}' field.`);
  const n = parseIntValue(raw);
  if (n === null) throw new StructuralError(`Object ${objectId} has a non-integer '${key}': "${raw}".`);
  return n;
}

function readFrame(fields: Field[], objectId: number): [number, number] {
  const raw = fieldValue(fields, 'frame');
  if (raw === undefined) throw new StructuralError(`Object ${objectId} has no 'frame' field.`);
  const range = parseFrameValue(raw);
  if (!range) throw new StructuralError(`Object ${objectId} has a malformed 'frame': "${raw}".`);
  return range;
}

/**
 * Build the typed project from block records.
 * An object belongs to the scene named by its `scene` field, or else to the
 * [scene.N] block it follows in the file.
 */
export function buildProject(sections: Aup2Section[]): Project {
  let globals: Field[] | null = null;
  const scenes: Scene[] = [];
  const sceneById = new Map<number, Scene>();

  // Scenes first: a `scene` field may point at a block declared further down.
  for (const s of sections) {
    if (s.kind === 'project') globals = s.fields.map(f => ({ ...f }));
    if (s.kind === 'scene') {
      const scene: Scene = { sceneId: s.sceneId, fields: s.fields.map(f => ({ ...f })), objects: [] };
      scenes.push(scene);
      sceneById.set(s.sceneId, scene);
    }
  }

  const objectById = new Map<number, SceneObject>();
  let blockScene: Scene | null = null;

  for (const s of sections) {
    if (s.kind === 'scene') {
      blockScene = sceneById.get(s.sceneId) ?? null;
      continue;
    }

    if (s.kind === 'object') {
      const id = s.objectId;
      const explicit = fieldValue(s.fields, 'scene') !== undefined ? readInt(s.fields, 'scene', id) : null;
      const owner = explicit === null ? blockScene : sceneById.get(explicit) ?? null;
      if (!owner) {
        throw new StructuralError(
          explicit === null
            ? `Object ${id} does not follow any [scene.N] block and has no 'scene' field.`
            : `Object ${id} refers to scene ${explicit}, which the project does not declare.`
        );
      }

      const [frameStart, frameEnd] = readFrame(s.fields, id);
      const focus = fieldValue(s.fields, 'focus');
      const obj: SceneObject = {
        objectId: id,
        sceneId: owner.sceneId,
        layer: readInt(s.fields, 'layer', id),
        frameStart,
        frameEnd,
        focus: focus !== undefined && focus.trim() !== '0',
        effects: [],
        fields: s.fields.map(f => ({ ...f })),
      };
      owner.objects.push(obj);
      objectById.set(id, obj);
      continue;
    }

    if (s.kind === 'effect') {
      const owner = objectById.get(s.objectId);
      if (!owner) {
        throw new StructuralError(`Effect ${s.objectId}.${s.effectIndex} has no owning object ${s.objectId}.`);
      }
      owner.effects.push({ index: s.effectIndex, fields: s.fields.map(f => ({ ...f })) });
    }
  }

  return { globals, scenes };
}

export function allObjects(project: Project): SceneObject[] {
  return project.scenes.flatMap(s => s.objects);
}

/** Objects of one scene, or of every scene when `sceneId` is null. */
export function objectsInScene(project: Project, sceneId: number | null): SceneObject[] {
  if (sceneId === null) return allObjects(project);
  return project.scenes.find(s => s.sceneId === sceneId)?.objects ?? [];
}

export function summarizeProject(project: Project): ProjectSummary {
  const objects = allObjects(project);
  const layerDistribution: Record<number, number> = {};
  for (const o of objects) {
    layerDistribution[o.layer] = (layerDistribution[o.layer] ?? 0) + 1;
  }
  return {
    scenes: project.scenes.length,
    objects: objects.length,
    effects: objects.reduce((acc, o) => acc + o.effects.length, 0),
    layerDistribution,
  };
}

/**
 * Report objects whose frame range intersects an earlier one on the same
 * scene and layer. Each offender is paired with the earlier object that
 * reaches furthest.
 */
export function findOverlaps(project: Project): FrameOverlap[] {
  const out: FrameOverlap[] = [];
  for (const scene of project.scenes) {
    const byLayer = new Map<number, SceneObject[]>();
    for (const o of scene.objects) {
      const list = byLayer.get(o.layer);
      if (list) list.push(o);
      else byLayer.set(o.layer, [o]);
    }

    for (const [layer, list] of byLayer) {
      const sorted = [...list].sort((a, b) => a.frameStart - b.frameStart || a.objectId - b.objectId);
      let reach = sorted[0];
      for (let i = 1; i < sorted.length; i++) {
        const o = sorted[i];
        if (o.frameStart <= reach.frameEnd) {
          out.push({ sceneId: scene.sceneId, layer, first: reach.objectId, second: o.objectId });
        }
        if (o.frameEnd > reach.frameEnd) reach = o;
      }
    }
  }
  return out;
}
