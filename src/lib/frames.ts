import type { Project, SceneObject } from './projectTypes';

export type FrameRange = { start: number; end: number };

export type CompactOptions = {
  sceneId: number | null;   // null = every scene
};

export type CompactResult = {
  project: Project;
  groups: number;
  moved: number;            // objects whose range changed
};

/**
 * Lay ranges end to end from `origin`, keeping each duration (end - start).
 * Input order is the output order.
 */
export function packRanges(ranges: FrameRange[], origin: number): FrameRange[] {
  const out: FrameRange[] = [];
  let cursor = origin;
  for (const r of ranges) {
    const end = cursor + (r.end - r.start);
    out.push({ start: cursor, end });
    cursor = end + 1;
  }
  return out;
}

function byPlacement(a: SceneObject, b: SceneObject): number {
  return a.frameStart - b.frameStart || a.objectId - b.objectId;
}

/**
 * Repack every (scene, layer) group so its objects touch without gaps or
 * overlaps. A group starts at its smallest original frameStart; members
 * follow in (frameStart, objectId) order. Scenes never share a group.
 */
export function compactFrames(project: Project, { sceneId }: CompactOptions): CompactResult {
  const groups = new Map<string, SceneObject[]>();
  for (const scene of project.scenes) {
    if (sceneId !== null && scene.sceneId !== sceneId) continue;
    for (const obj of scene.objects) {
      const key = `${scene.sceneId}:${obj.layer}`;
      const list = groups.get(key);
      if (list) list.push(obj);
      else groups.set(key, [obj]);
    }
  }

  const placed = new Map<number, FrameRange>();
  for (const members of groups.values()) {
    members.sort(byPlacement);
    const origin = members.reduce((m, o) => Math.min(m, o.frameStart), Infinity);
    const packed = packRanges(members.map(o => ({ start: o.frameStart, end: o.frameEnd })), origin);
    members.forEach((o, i) => placed.set(o.objectId, packed[i]));
  }

  let moved = 0;
  const scenes = project.scenes.map(scene => ({
    ...scene,
    objects: scene.objects.map(o => {
      const r = placed.get(o.objectId);
      if (!r || (r.start === o.frameStart && r.end === o.frameEnd)) return o;
      moved++;
      return { ...o, frameStart: r.start, frameEnd: r.end };
    }),
  }));

  return { project: { ...project, scenes }, groups: groups.size, moved };
}
