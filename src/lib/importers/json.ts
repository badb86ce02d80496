// src/lib/importers/json.ts
// Reads the model back from the dump written by projectToJson.

import { z } from 'zod';
import { StructuralError } from '../errors';
import { fieldValue } from '../project';
import type { Project } from '../projectTypes';

const Id = z.number().int().nonnegative();
const Frame = z.number().int();

const FieldSchema = z.object({ key: z.string(), value: z.string() });

const EffectSchema = z.object({
  index: Id,
  fields: z.array(FieldSchema),
});

const SceneObjectSchema = z.object({
  objectId: Id,
  sceneId: Id,
  layer: Id,
  frameStart: Frame,
  frameEnd: Frame,
  focus: z.boolean(),
  effects: z.array(EffectSchema),
  fields: z.array(FieldSchema),
});

const SceneSchema = z.object({
  sceneId: Id,
  fields: z.array(FieldSchema),
  objects: z.array(SceneObjectSchema),
});

export const ProjectSchema: z.ZodType<Project> = z.object({
  globals: z.array(FieldSchema).nullable(),
  scenes: z.array(SceneSchema),
});

/**
 * Parse a JSON dump into a Project that projectToSections can write out
 * again. Shape errors and broken ownership are StructuralErrors.
 */
export function projectFromJson(text: string): Project {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new StructuralError(`Not a JSON project: ${err instanceof Error ? err.message : String(err)}`);
  }

  const res = ProjectSchema.safeParse(data);
  if (!res.success) {
    const issue = res.error.issues[0];
    const at = issue.path.length ? issue.path.join('.') : '(root)';
    throw new StructuralError(`Not a JSON project: ${at}: ${issue.message}`);
  }

  const project = res.data;
  const sceneIds = new Set<number>();
  const objectIds = new Set<number>();
  for (const scene of project.scenes) {
    if (sceneIds.has(scene.sceneId)) throw new StructuralError(`Scene ${scene.sceneId} appears twice.`);
    sceneIds.add(scene.sceneId);

    for (const o of scene.objects) {
      if (objectIds.has(o.objectId)) throw new StructuralError(`Object ${o.objectId} appears twice.`);
      objectIds.add(o.objectId);
      if (o.sceneId !== scene.sceneId) {
        throw new StructuralError(`Object ${o.objectId} says scene ${o.sceneId} but is listed under scene ${scene.sceneId}.`);
      }
      for (const key of ['layer', 'frame']) {
        if (fieldValue(o.fields, key) === undefined) {
          throw new StructuralError(`Object ${o.objectId} has no '${key}' field.`);
        }
      }
    }
  }
  return project;
}
