import { describe, it, expect } from 'vitest';
import { parseAup2 } from '@/lib/importers/aup2';
import { buildProject } from '@/lib/project';
import { reassignLayer } from '@/lib/layers';
import { twoScenes } from './samples';

const project = () => buildProject(parseAup2(twoScenes).sections);

describe('reassignLayer', () => {
  it('moves only the selected scene', () => {
    const before = project();
    const { project: after, matched } = reassignLayer(before, { targetLayer: 5, sceneId: 0 });

    expect(matched).toBe(3);
    expect(after.scenes[0].objects.map(o => o.layer)).toEqual([5, 5, 5]);
    expect(after.scenes[1]).toEqual(before.scenes[1]);
  });

  it('moves every scene without a filter', () => {
    const { project: after, matched } = reassignLayer(project(), { targetLayer: 0, sceneId: null });
    expect(matched).toBe(5);
    expect(after.scenes.flatMap(s => s.objects.map(o => o.layer))).toEqual([0, 0, 0, 0, 0]);
  });

  it('leaves frames, ids and effects alone and does not mutate its input', () => {
    const before = project();
    const snapshot = structuredClone(before);
    const { project: after } = reassignLayer(before, { targetLayer: 7, sceneId: null });

    expect(before).toEqual(snapshot);
    after.scenes.forEach((scene, si) => {
      scene.objects.forEach((o, oi) => {
        expect(o).toEqual({ ...snapshot.scenes[si].objects[oi], layer: 7 });
      });
    });
  });

  it('is idempotent', () => {
    const once = reassignLayer(project(), { targetLayer: 2, sceneId: 1 }).project;
    const twice = reassignLayer(once, { targetLayer: 2, sceneId: 1 }).project;
    expect(twice).toEqual(once);
  });

  it('treats an unknown scene as an empty selection', () => {
    const before = project();
    const res = reassignLayer(before, { targetLayer: 3, sceneId: 42 });
    expect(res.matched).toBe(0);
    expect(res.project).toEqual(before);
  });
});
