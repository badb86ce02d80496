// src/lib/format/text.ts
// Human-readable dumps of a project for inspection. Not meant to be imported again.

import type { Field, Project } from '../projectTypes';

// Shown on the object line itself
const HEADLINE_KEYS = new Set(['layer', 'frame', 'focus']);

const pad = (depth: number) => '  '.repeat(depth);

function fieldLines(fields: Field[], depth: number, skip?: Set<string>): string[] {
  return fields
    .filter(f => !skip?.has(f.key))
    .map(f => `${pad(depth)}${f.key} = ${f.value}`);
}

export function projectToText(project: Project): string {
  const out: string[] = [];

  if (project.globals) {
    out.push('[project]');
    out.push(...fieldLines(project.globals, 1));
  }

  for (const scene of project.scenes) {
    out.push(`scene ${scene.sceneId}`);
    out.push(...fieldLines(scene.fields, 1));

    for (const o of scene.objects) {
      const focus = o.focus ? '  focus' : '';
      out.push(`${pad(1)}object ${o.objectId}  layer=${o.layer}  frame=${o.frameStart}..${o.frameEnd}${focus}`);
      out.push(...fieldLines(o.fields, 2, HEADLINE_KEYS));

      for (const e of o.effects) {
        out.push(`${pad(2)}effect ${o.objectId}.${e.index}`);
        out.push(...fieldLines(e.fields, 3));
      }
    }
  }

  return out.join('\n') + '\n';
}

export function projectToJson(project: Project): string {
  return JSON.stringify(project, null, 2) + '\n';
}
