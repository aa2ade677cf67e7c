import { GenerationError, errorMessage } from '../errors.js';
import type { CodeArtifact, GenerationRequest, ICodeGenerator } from '../types.js';
import type { ILlmClient } from './llm-client.js';
import { applyKnownFix } from './known-fixes.js';
import { CODER_SYSTEM_PROMPT, buildRepairPrompt, buildScenePrompt } from './prompts.js';

const SCENE_CLASS_PATTERN = /^class\s+(\w+)\s*\(\s*(?:\w+\.)?\w*Scene\s*\)\s*:/m;

/**
 * Pull Python source out of a model reply: ```python fences first, then any
 * fence, then everything from the first `from manim import` line.
 */
export function extractCode(response: string): string | null {
  const fenced = (pattern: RegExp): string[] =>
    [...response.matchAll(pattern)].map((match) => match[1].trim()).filter(Boolean);

  const python = fenced(/```python\s*\n([\s\S]*?)```/g);
  if (python.length > 0) return python.join('\n\n');

  const any = fenced(/```[\w-]*\s*\n([\s\S]*?)```/g);
  if (any.length > 0) return any.join('\n\n');

  const lines = response.split('\n');
  const start = lines.findIndex((line) => /^\s*(from manim import|import manim)/.test(line));
  if (start === -1) return null;
  const code = lines
    .slice(start)
    .filter((line) => !line.startsWith('```'))
    .join('\n')
    .trim();
  return code || null;
}

export function findSceneClass(sourceCode: string): string | null {
  return SCENE_CLASS_PATTERN.exec(sourceCode)?.[1] ?? null;
}

export class CodeGenerationService implements ICodeGenerator {
  constructor(private readonly llm: ILlmClient) {}

  async generate(request: GenerationRequest): Promise<CodeArtifact> {
    const { theorem, scene, attemptNumber, priorAttempt, priorError } = request;

    if (priorAttempt && priorError) {
      const patched = applyKnownFix(priorAttempt.sourceCode, priorError);
      if (patched !== null) {
        console.log(`  [scene ${scene.index}] attempt ${attemptNumber}: patched a known error without the LLM`);
        return Object.freeze({
          sceneIndex: scene.index,
          sourceCode: patched,
          sceneClass: priorAttempt.sceneClass,
          attemptNumber,
        });
      }
    }

    const prompt = priorAttempt && priorError
      ? buildRepairPrompt(theorem, scene, priorAttempt, priorError)
      : buildScenePrompt(theorem, scene);

    let response: string;
    try {
      response = await this.llm.complete({ system: CODER_SYSTEM_PROMPT, prompt });
    } catch (err) {
      throw new GenerationError(`LLM request for scene ${scene.index} failed: ${errorMessage(err)}`, { cause: err });
    }

    const sourceCode = extractCode(response);
    if (!sourceCode) {
      throw new GenerationError(`Malformed LLM response for scene ${scene.index}: no code found`);
    }
    const sceneClass = findSceneClass(sourceCode);
    if (!sceneClass) {
      throw new GenerationError(`Malformed LLM response for scene ${scene.index}: no Scene subclass defined`);
    }

    return Object.freeze({
      sceneIndex: scene.index,
      sourceCode,
      sceneClass,
      attemptNumber,
    });
  }
}
