import type { Aup2Field } from '../types/aup2';

export type Field = Aup2Field;

export type Effect = {
  index: number;       // K of [objectId.K]
  fields: Field[];     // carried verbatim
};

export type SceneObject = {
  objectId: number;    // unique across the whole project
  sceneId: number;
  layer: number;
  frameStart: number;  // inclusive
  frameEnd: number;    // inclusive
  focus: boolean;
  effects: Effect[];
  fields: Field[];     // every field of the block in file order, layer/frame included
};

export type Scene = {
  sceneId: number;
  fields: Field[];     // the [scene.N] block's own fields
  objects: SceneObject[];
};

export type Project = {
  globals: Field[] | null;   // [project] block, null when the file has none
  scenes: Scene[];
};

export type ProjectSummary = {
  scenes: number;
  objects: number;
  effects: number;
  layerDistribution: Record<number, number>;
};

export type FrameOverlap = {
  sceneId: number;
  layer: number;
  first: number;       // objectId
  second: number;      // objectId
};
