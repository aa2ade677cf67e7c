import type { ExecutionFailure } from '../types.js';

/**
 * Patches for render failures common enough to fix without a model call:
 * a missing module import, frame or circle constants the scene uses without
 * defining, and names only `from manim import *` brings in.
 */

interface Patch {
  imports: string[];
  definitions: string[];
}

const NAME_ERROR = /NameError: name ['"](\w+)['"] is not defined/g;
const CANNOT_IMPORT = /ImportError: cannot import name ['"]\w+['"]/;

const MODULE_IMPORTS = new Map<string, string>([
  ['math', 'import math'],
  ['np', 'import numpy as np'],
  ['random', 'import random'],
]);

const FRAME_CONSTANTS: Patch = {
  imports: [],
  definitions: ['FRAME_HEIGHT = config.frame_height', 'FRAME_WIDTH = config.frame_width'],
};

const CIRCLE_CONSTANTS: Patch = {
  imports: ['import math'],
  definitions: ['PI = math.pi', 'TAU = 2 * math.pi'],
};

const CONSTANTS = new Map<string, Patch>([
  ['FRAME_HEIGHT', FRAME_CONSTANTS],
  ['FRAME_WIDTH', FRAME_CONSTANTS],
  ['PI', CIRCLE_CONSTANTS],
  ['TAU', CIRCLE_CONSTANTS],
]);

const MANIM_NAMES = new Set(['ORIGIN', 'UP', 'DOWN', 'LEFT', 'RIGHT', 'IN', 'OUT', 'UL', 'UR', 'DL', 'DR']);

function patchFor(name: string): Patch | null {
  const moduleImport = MODULE_IMPORTS.get(name);
  if (moduleImport) return { imports: [moduleImport], definitions: [] };
  const constants = CONSTANTS.get(name);
  if (constants) return constants;
  if (MANIM_NAMES.has(name)) return { imports: ['from manim import *'], definitions: [] };
  return null;
}

/**
 * Patch `sourceCode` for the failure it produced. Returns null when no known
 * fix applies, or when the code already carries it.
 */
export function applyKnownFix(sourceCode: string, failure: ExecutionFailure): string | null {
  const patches: Patch[] = [];
  for (const match of failure.errorDetail.matchAll(NAME_ERROR)) {
    const patch = patchFor(match[1]);
    if (patch) patches.push(patch);
  }
  if (CANNOT_IMPORT.test(failure.errorDetail)) {
    patches.push({ imports: ['from manim.constants import *'], definitions: [] });
  }

  const patched = patches.reduce(applyPatch, sourceCode);
  return patched === sourceCode ? null : patched;
}

function applyPatch(code: string, patch: Patch): string {
  const lines = code.split('\n');
  const imports = patch.imports.filter((line) => !lines.some((existing) => existing.trim() === line));
  const definitions = patch.definitions.filter((line) => !isAssigned(code, line.split(' ')[0]));
  if (imports.length === 0 && definitions.length === 0) return code;

  lines.splice(lastImportIndex(lines) + 1, 0, ...imports, ...definitions);
  return lines.join('\n');
}

function isAssigned(code: string, name: string): boolean {
  return new RegExp(`^${name}\\s*=`, 'm').test(code);
}

/** -1 when the module has no top-level import */
function lastImportIndex(lines: readonly string[]): number {
  let last = -1;
  lines.forEach((line, i) => {
    if (/^(?:import|from)\s/.test(line)) last = i;
  });
  return last;
}
