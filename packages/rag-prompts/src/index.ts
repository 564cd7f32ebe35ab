/**
 * @package rag-prompts
 *
 * Versioned prompt text and the aspect pipeline that composes the
 * defended context for grounded generation.
 */

export {
  type PromptContext,
  type BuiltPrompt,
  type PromptAspect,
  citationInstructionAspect,
  labeledContextAspect,
  createPromptBuilder,
  groundedPromptBuilder,
  buildGroundedPrompt,
} from './promptAspects.js';

export { type Aspect, applyAspects } from './applyAspects.js';

export {
  GROUNDING_PROMPT_VERSION,
  REFUSAL_MESSAGE,
  INJECTION_DEFENSE,
  CITATION_INSTRUCTION,
  HIPAA_SYSTEM_PROMPT,
  GENERAL_SYSTEM_PROMPT,
} from './constants.js';
