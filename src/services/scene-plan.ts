import { z } from 'zod';
import { PipelineError } from '../errors.js';
import type { Scene, ScenePlan } from '../types.js';

const nonBlank = z.string().trim().min(1);

const sceneSchema = z.object({
  index: z.number().int().nonnegative(),
  title: nonBlank,
  narrationText: nonBlank,
  intent: nonBlank,
  objective: z.string().trim(),
  layout: z.string().trim().optional(),
});

const scenePlanSchema = z
  .object({
    theoremName: nonBlank,
    theoremDescription: z.string().trim(),
    scenes: z.array(sceneSchema).min(1, 'scene plan is empty'),
  })
  .superRefine((plan, ctx) => {
    const seen = new Set<number>();
    for (const scene of plan.scenes) {
      if (seen.has(scene.index)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scenes'], message: `duplicate scene index ${scene.index}` });
      }
      seen.add(scene.index);
      if (scene.index >= plan.scenes.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scenes'],
          message: `scene index ${scene.index} out of range 0..${plan.scenes.length - 1}`,
        });
      }
    }
  });

/**
 * Validate a plan and freeze it. Scenes come back sorted by index; once
 * created, neither the plan nor its scenes can be modified.
 */
export function createScenePlan(input: unknown): ScenePlan {
  const parsed = scenePlanSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new PipelineError(`Invalid scene plan: ${issues}`);
  }

  const scenes = [...parsed.data.scenes]
    .sort((a, b) => a.index - b.index)
    .map((scene): Scene => Object.freeze({ ...scene }));

  return Object.freeze({
    theoremName: parsed.data.theoremName,
    theoremDescription: parsed.data.theoremDescription,
    scenes: Object.freeze(scenes),
  });
}
