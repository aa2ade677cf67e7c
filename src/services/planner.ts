import { PipelineError, errorMessage } from '../errors.js';
import type { ScenePlan } from '../types.js';
import type { ILlmClient } from './llm-client.js';
import { buildPlannerPrompt } from './prompts.js';
import { createScenePlan } from './scene-plan.js';
import { cleanNarration } from './narration.js';

const FIELDS = ['Title', 'Purpose', 'Description', 'Layout', 'Narration'] as const;
type Field = (typeof FIELDS)[number];

export interface PlannedScene {
  title: string;
  purpose: string;
  description: string;
  layout: string;
  narration: string;
}

/**
 * Parse `[Scene N]` blocks between `SCENE PLAN BEGIN:` and `SCENE PLAN END:`.
 * Without the markers the whole text is searched.
 */
export function parseScenePlanText(response: string): PlannedScene[] {
  const marked = /SCENE PLAN BEGIN:([\s\S]*?)SCENE PLAN END:?/.exec(response);
  const body = marked ? marked[1] : response;

  return body
    .split(/\[Scene\s+\d+\]/i)
    .map((block) => parseBlock(block))
    .filter((scene): scene is PlannedScene => scene !== null);
}

function parseBlock(block: string): PlannedScene | null {
  const values: Partial<Record<Field, string>> = {};
  const labelPattern = new RegExp(`^\\s*(?:Scene\\s+)?(${FIELDS.join('|')})(?:\\s+Script)?\\s*:`, 'i');

  let current: Field | null = null;
  for (const line of block.split('\n')) {
    const label = labelPattern.exec(line);
    if (label) {
      current = FIELDS.find((field) => field.toLowerCase() === label[1].toLowerCase()) ?? null;
      if (current) values[current] = line.slice(label[0].length).trim();
    } else if (current) {
      values[current] = `${values[current] ?? ''}\n${line}`.trim();
    }
  }

  if (Object.keys(values).length === 0) return null;
  return {
    title: values.Title ?? '',
    purpose: values.Purpose ?? '',
    description: values.Description ?? '',
    layout: values.Layout ?? '',
    narration: cleanNarration(values.Narration ?? ''),
  };
}

export class PlannerService {
  constructor(private readonly llm: ILlmClient) {}

  async plan(theoremName: string, theoremDescription: string): Promise<ScenePlan> {
    let response: string;
    try {
      response = await this.llm.complete({ prompt: buildPlannerPrompt(theoremName, theoremDescription), maxTokens: 4000 });
    } catch (err) {
      throw new PipelineError(`Planning failed: ${errorMessage(err)}`, { cause: err });
    }

    const planned = parseScenePlanText(response);
    console.log(`  [planner] ${planned.length} scene(s) for "${theoremName}"`);

    return createScenePlan({
      theoremName,
      theoremDescription,
      scenes: planned.map((scene, index) => ({
        index,
        title: scene.title || `Scene ${index + 1}`,
        narrationText: scene.narration,
        intent: scene.description,
        objective: scene.purpose,
        ...(scene.layout ? { layout: scene.layout } : {}),
      })),
    });
  }
}
