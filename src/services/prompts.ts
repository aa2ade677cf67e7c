import type { CodeArtifact, ExecutionFailure, Scene, TheoremContext } from '../types.js';

/** Longest error excerpt sent back to the model; tracebacks end with the useful part */
const MAX_ERROR_CHARS = 4000;

export const CODER_SYSTEM_PROMPT = `You are an expert Manim Community Edition developer.
You write one complete, runnable Python file per request, inside a single \`\`\`python block.
Rules:
- Start with \`from manim import *\`.
- Define exactly one class inheriting from Scene, named as instructed.
- Use Text() for all text and formulas; never MathTex, Tex or LaTeX.
- Never load images or any external file.
- Close every bracket and string literal.`;

export function buildPlannerPrompt(theoremName: string, description: string): string {
  return `You are an expert in instructional design and in ${theoremName}.
Design a short explanatory video about ${theoremName}.

Topic: ${theoremName}
Description: ${description}

Plan the video as a sequence of scenes that builds from the basic concepts to the full theorem.
For every scene give:
- Title: 2-5 words
- Purpose: what the viewer should understand after the scene
- Description: what is animated, step by step
- Layout: where things sit on screen
- Narration: the exact words spoken during the scene

Answer in exactly this format:

SCENE PLAN BEGIN:
[Scene 1]
Title: ...
Purpose: ...
Description: ...
Layout: ...
Narration: ...

[Scene 2]
...
SCENE PLAN END:`;
}

/** `Scene1_PythagoreanSetup` */
export function sceneClassName(scene: Scene): string {
  const words = scene.title
    .replace(/[^a-zA-Z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1));
  return `Scene${scene.index + 1}_${words.join('') || 'Untitled'}`;
}

function describeScene(theorem: TheoremContext, scene: Scene): string {
  return [
    `Theorem: ${theorem.theoremName}`,
    `Theorem description: ${theorem.theoremDescription}`,
    '',
    `Scene number: ${scene.index + 1}`,
    `Scene title: ${scene.title}`,
    `Scene objective: ${scene.objective}`,
    `What to animate: ${scene.intent}`,
    ...(scene.layout ? [`Layout: ${scene.layout}`] : []),
    `Narration (for pacing; do not render it as text): ${scene.narrationText}`,
  ].join('\n');
}

export function buildScenePrompt(theorem: TheoremContext, scene: Scene): string {
  return `${describeScene(theorem, scene)}

Write the Manim code for this scene. Name the scene class \`${sceneClassName(scene)}\`.`;
}

export function buildRepairPrompt(
  theorem: TheoremContext,
  scene: Scene,
  priorAttempt: CodeArtifact,
  priorError: ExecutionFailure,
): string {
  const detail = priorError.errorDetail.length > MAX_ERROR_CHARS
    ? `...${priorError.errorDetail.slice(-MAX_ERROR_CHARS)}`
    : priorError.errorDetail;

  return `${describeScene(theorem, scene)}

The code below failed (attempt ${priorAttempt.attemptNumber}) with ${priorError.errorKind}:

\`\`\`text
${detail}
\`\`\`

\`\`\`python
${priorAttempt.sourceCode}
\`\`\`

Fix the cause of this failure and return the whole corrected file. Keep the class name \`${priorAttempt.sceneClass}\` and keep everything that already works.`;
}
