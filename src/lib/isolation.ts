import { compactFrames, type CompactResult } from './frames';
import type { Project } from './projectTypes';

/**
 * Compact each scene on its own: every (scene, layer) group is re-based to
 * its own smallest original frameStart, so frame numbers in one scene never
 * push objects of another. The same repacking `adjustFrames` runs; asking
 * for isolation turns compaction on.
 */
export function isolateScenes(project: Project, { sceneId }: { sceneId: number | null }): CompactResult {
  return compactFrames(project, { sceneId });
}
