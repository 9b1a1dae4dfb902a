// pattern: Functional Core

/**
 * Default system prompts and placeholder substitution.
 */

import { PromptTemplateError } from './types.ts';

export const FUNCTIONS_PLACEHOLDER = '{functions}';

export const DEFAULT_CODE_SYSTEM_PROMPT = `You are an agent that solves tasks by writing small Python programs.
Each program you write is executed and its printed output is sent back to you.
Keep reasoning and writing code step by step until you can give a final answer.
Give the final answer as plain text or markdown, without code.

These functions are available:
${FUNCTIONS_PLACEHOLDER}

Explain your reasoning outside of the code.
Use only the functions above and basic Python. Imports, function definitions and classes are not available.
Use print to report every value you want to see.

Put the code for a step in ONE markdown code block, for example:
\`\`\`python
places = example_function("arg")
print(places)
\`\`\`

Run one step at a time and look at the printed result before writing the next step.
Variables you define stay available in later steps.`;

export const DEFAULT_OPEN_TAG = '<tool_call>';
export const DEFAULT_CLOSE_TAG = '</tool_call>';

/** The JSON prompt names the call tags, so it is built for the tags in use. */
export function defaultJsonSystemPrompt(openTag = DEFAULT_OPEN_TAG, closeTag = DEFAULT_CLOSE_TAG): string {
  return `You are an agent that can call functions to answer questions.

These functions are available, described as JSON schemas:
${FUNCTIONS_PLACEHOLDER}

To call a function, reply with a JSON object between ${openTag} and ${closeTag} tags:
${openTag}{"name": "function_name", "arguments": {"argument_name": "value"}}${closeTag}

To call several functions in one step, put a JSON array of such objects inside the tags.
The results are sent back to you one JSON value per line.
When you have the final answer, reply with plain text and no tool call.`;
}

/** Substitute every placeholder occurrence; throws when there is none. */
export function fillTemplate(template: string, functions: string): string {
  if (!template.includes(FUNCTIONS_PLACEHOLDER)) {
    throw new PromptTemplateError(`prompt does not contain ${FUNCTIONS_PLACEHOLDER} placeholder`);
  }
  return template.split(FUNCTIONS_PLACEHOLDER).join(functions);
}
