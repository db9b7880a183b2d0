/**
 * Prompt and stop-marker constants for the self-feedback loop
 */

/**
 * Turn marker appended to the accumulated context to build each prompt
 */
export const SELF_TURN_MARKER = '\n### Self:\n';

/**
 * Word-count units charged per injected turn marker ("Ċ ### Self:")
 */
export const MARKER_WORD_COST = 3;

export const STOP_MARKERS: readonly string[] = Object.freeze([
  '###',             // manual sentinel
  '\n###',
  '<|eot_id|>',      // Llama end-of-turn
  '<|end_of_text|>'  // generic EOS
]);
