import type { Project } from './projectTypes';

export type ReassignOptions = {
  targetLayer: number;
  sceneId: number | null;   // null = every scene
};

export type ReassignResult = {
  project: Project;
  matched: number;
};

/**
 * Move every object of the selected scene(s) onto `targetLayer`.
 * Frames, ids and effects are left alone, so running it twice changes nothing more.
 */
export function reassignLayer(project: Project, { targetLayer, sceneId }: ReassignOptions): ReassignResult {
  let matched = 0;

  const scenes = project.scenes.map(scene => {
    if (sceneId !== null && scene.sceneId !== sceneId) return scene;
    matched += scene.objects.length;
    return {
      ...scene,
      objects: scene.objects.map(o => ({ ...o, layer: targetLayer })),
    };
  });

  return { project: { ...project, scenes }, matched };
}
