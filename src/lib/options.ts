import { z } from 'zod';
import { OptionRangeError } from './errors';

const Index = z.number().int('must be an integer').nonnegative('must be zero or greater');

export const TransformOptionsSchema = z.object({
  targetLayer: Index.nullable().default(0),     // null keeps every layer as is
  sceneId: Index.nullable().default(null),      // null = all scenes
  adjustFrames: z.boolean().default(false),
  isolateScenes: z.boolean().default(false),    // implies adjustFrames
  renumberObjects: z.boolean().default(true),
});

export type TransformOptions = z.infer<typeof TransformOptionsSchema>;
export type TransformOptionsInput = z.input<typeof TransformOptionsSchema>;

export function resolveTransformOptions(input: TransformOptionsInput = {}): TransformOptions {
  const res = TransformOptionsSchema.safeParse(input);
  if (!res.success) {
    const issue = res.error.issues[0];
    throw new OptionRangeError(String(issue.path[0] ?? 'options'), issue.message);
  }
  return res.data;
}
