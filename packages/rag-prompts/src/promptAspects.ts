/**
 * Grounded prompt composition.
 *
 * The context handed to the generation backend is assembled through the
 * aspect pipeline: the defence preamble is the base, the citation
 * instruction and the labelled sources are appended by aspects.
 */

import { applyAspects, type Aspect } from './applyAspects.js';
import { CITATION_INSTRUCTION, INJECTION_DEFENSE } from './constants.js';

export interface PromptContext {
  preamble: string;
  citationInstruction?: string;
  labeledContext?: string;
}

export interface BuiltPrompt {
  prompt: string;
  context: PromptContext;
}

export type PromptAspect = Aspect<PromptContext, BuiltPrompt>;

async function basePromptBuilder(ctx: PromptContext): Promise<BuiltPrompt> {
  return {
    prompt: ctx.preamble,
    context: ctx,
  };
}

/**
 * Appends the citation-format instruction directly after the preamble
 */
export const citationInstructionAspect: PromptAspect = async (ctx, next) => {
  const result = await next(ctx);

  if (!ctx.citationInstruction) {
    return result;
  }

  return {
    ...result,
    prompt: `${result.prompt}${ctx.citationInstruction}`,
  };
};

/**
 * Appends the labelled source block. Must stay the outermost aspect so
 * retrieved data always comes after every instruction.
 */
export const labeledContextAspect: PromptAspect = async (ctx, next) => {
  const result = await next(ctx);

  return {
    ...result,
    prompt: `${result.prompt}\n\n${ctx.labeledContext ?? ''}`,
  };
};

export function createPromptBuilder(aspects: PromptAspect[] = []) {
  return applyAspects(basePromptBuilder, aspects);
}

export const groundedPromptBuilder = createPromptBuilder([
  labeledContextAspect,
  citationInstructionAspect,
]);

/**
 * Builds the defended context: preamble, citation instruction, labelled sources.
 */
export async function buildGroundedPrompt(labeledContext: string): Promise<string> {
  const result = await groundedPromptBuilder({
    preamble: INJECTION_DEFENSE,
    citationInstruction: CITATION_INSTRUCTION,
    labeledContext,
  });
  return result.prompt;
}
