/**
 * Operator-facing prompt text. Every question ends with the configured
 * answer tokens, e.g. "y/n? ".
 */

export interface AnswerTokens {
  yes: string;
  no: string;
}

function choice(answers: AnswerTokens): string {
  return `${answers.yes}/${answers.no}? `;
}

export function globalsBanner(answers: AnswerTokens): string {
  return `\t\t-- Global parameters preparation --
Here you can add global variables that will be used throughout all templates.
Provide values as space separated tokens.

Example: SomeValue 123

Would you like to add Global config values: ${choice(answers)}`;
}

export function filesBanner(): string {
  return `
\t\t-- Files configuration part preparation --
This part is dedicated to specifying everything that has to do with file templates.
Each file consists of four parts:

\t1. File name       - the name of the file to be generated out of the template;
\t2. File path       - the path to where the file will be placed;
\t3. Template name   - the name of the template to use;
\t4. Local variables - the local variables specific to the specified template.

NOTE: there has to be at least one file to add.
`;
}

export function localsBanner(answers: AnswerTokens): string {
  return `\t\t--- Local variables ---
Provide values as space separated tokens.
Example: SomeValue 123

Would you like to add local config values: ${choice(answers)}`;
}

export function commandsBanner(answers: AnswerTokens): string {
  return `
\t\t-- Command post-hooks configuration preparation --
This part is dedicated to specifying everything that has to do with post-generation hooks.
Each entry consists of two parts:

\t1. Command name      - the name of the command to be called;
\t2. Command arguments - the arguments passed to the command.

Example: ls -a -l

Would you like to add post-processing commands: ${choice(answers)}`;
}

export const FILE_FIELD_PROMPTS = {
  name: 'File name: ',
  path: 'File path: ',
  template: 'Template name: ',
} as const;

export function nextValuePrompt(answers: AnswerTokens): string {
  return `Add next value: ${choice(answers)}`;
}

export function nextFilePrompt(answers: AnswerTokens): string {
  return `Add next file: ${choice(answers)}`;
}
