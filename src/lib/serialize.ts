import type { Aup2Section } from '../types/aup2';
import { parseFrameValue, parseIntValue } from './project';
import type { Field, Project, SceneObject } from './projectTypes';

export type SerializeOptions = {
  /** Give objects ids 0, 1, 2... in output order; effect headers follow their owner. */
  renumberObjects?: boolean;
};

// layer and frame are rewritten only when the number they read as has changed.
function objectFields(obj: SceneObject): Field[] {
  return obj.fields.map(f => {
    if (f.key === 'layer' && parseIntValue(f.value) !== obj.layer) {
      return { key: f.key, value: String(obj.layer) };
    }
    if (f.key === 'frame') {
      const range = parseFrameValue(f.value);
      if (!range || range[0] !== obj.frameStart || range[1] !== obj.frameEnd) {
        return { key: f.key, value: `${obj.frameStart},${obj.frameEnd}` };
      }
    }
    return { ...f };
  });
}

/** Linearize the model back into block records: scene order kept, objects by ascending id. */
export function projectToSections(project: Project, { renumberObjects = true }: SerializeOptions = {}): Aup2Section[] {
  const out: Aup2Section[] = [];
  if (project.globals) {
    out.push({ kind: 'project', fields: project.globals.map(f => ({ ...f })) });
  }

  let nextId = 0;
  for (const scene of project.scenes) {
    out.push({ kind: 'scene', sceneId: scene.sceneId, fields: scene.fields.map(f => ({ ...f })) });

    const objects = [...scene.objects].sort((a, b) => a.objectId - b.objectId);
    for (const obj of objects) {
      const objectId = renumberObjects ? nextId++ : obj.objectId;
      out.push({ kind: 'object', objectId, fields: objectFields(obj) });
      for (const effect of obj.effects) {
        out.push({
          kind: 'effect',
          objectId,
          effectIndex: effect.index,
          fields: effect.fields.map(f => ({ ...f })),
        });
      }
    }
  }
  return out;
}
