import type { CompletionRequest, PromptBuilder, PromptContext } from './types.js';

const DEFAULT_SYSTEM = [
  'You write source files for a software project.',
  'Return every file you create or change as a block of the form:',
  '<file path="relative/path.ext">',
  '...full file content...',
  '</file>',
  'Do not return files you did not change.'
].join('\n');

/**
 * Generic prompt policy: goal, current project files, allowed paths and
 * feedback rendered in one user message. Real deployments pass their own
 * builder per phase.
 */
export function defaultPromptBuilder(system: string = DEFAULT_SYSTEM): PromptBuilder {
  return (ctx: PromptContext): CompletionRequest => ({
    system,
    messages: [{ role: 'user', content: renderUserMessage(ctx) }]
  });
}

export function renderProjectContext(files: PromptContext['files']): string {
  return Object.keys(files)
    .sort()
    .map((path) => `<file path="${path}">\n${(files[path] ?? '').trim()}\n</file>`)
    .join('\n');
}

function renderUserMessage(ctx: PromptContext): string {
  const sections: string[] = [`Goal:\n${ctx.goal}`, `Phase: ${ctx.sibling ? `${ctx.phase}/${ctx.sibling}` : ctx.phase}`];

  const project = renderProjectContext(ctx.files);
  if (project) sections.push(`Project files:\n${project}`);
  if (ctx.allowedPaths.length > 0) sections.push(`Allowed paths: ${ctx.allowedPaths.join(', ')}`);
  if (ctx.feedback) sections.push(`Apply this feedback:\n${ctx.feedback}`);

  return sections.join('\n\n');
}
