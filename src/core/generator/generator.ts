import { GenerationError, describeError, throwIfAborted, toCancelled } from '../errors.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { extractFileBlocks } from './extract.js';
import { verifyScope } from './scope.js';
import type {
  CompletionClient,
  CompletionRequest,
  FileExtractor,
  GenerationResult,
  PromptBuilder,
  PromptContext,
  ToolSpec
} from './types.js';

export interface GeneratorOptions {
  buildPrompt: PromptBuilder;
  extractFiles?: FileExtractor;
  /** Attempts per call, including the first. */
  maxAttempts?: number;
  logger?: Logger;
  onAttempt?: (args: { ctx: PromptContext; attempt: number; ok: boolean; error?: string; files?: string[] }) => void | Promise<void>;
}

/**
 * One completion call turned into a file set.
 *
 * Stateless: every call renders its prompt from the context it is given. Any
 * failure of the call (client error, malformed blocks, writes outside the phase
 * scope) is retried with the same prompt up to `maxAttempts`, then surfaces as a
 * GenerationError.
 */
export class Generator {
  private readonly extract: FileExtractor;
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(
    private readonly client: CompletionClient,
    private readonly opts: GeneratorOptions
  ) {
    this.extract = opts.extractFiles ?? extractFileBlocks;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
    this.log = opts.logger ?? silentLogger;
  }

  async complete(ctx: PromptContext, tools?: ToolSpec[], signal?: AbortSignal): Promise<GenerationResult> {
    const request = this.opts.buildPrompt(ctx);
    const withTools: CompletionRequest = tools?.length ? { ...request, tools: [...(request.tools ?? []), ...tools] } : request;
    const prompt = renderRequest(withTools);

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      throwIfAborted(signal);
      try {
        const response = await this.client.complete(withTools, signal);
        const files = this.extract(response.text);
        const violations = verifyScope(files, ctx.allowedPaths);
        if (violations.length > 0) {
          const listed = violations.map((v) => `${v.file} (${v.reason})`).join(', ');
          throw new GenerationError(`generated files outside phase scope: ${listed}`);
        }
        await this.opts.onAttempt?.({ ctx, attempt, ok: true, files: Object.keys(files).sort() });
        return { files, rawText: response.text, prompt, attempts: attempt };
      } catch (err) {
        if (signal?.aborted) throw toCancelled(signal);
        lastError = err;
        this.log.warn('generation attempt failed', { phase: ctx.phase, sibling: ctx.sibling, attempt, error: describeError(err) });
        await this.opts.onAttempt?.({ ctx, attempt, ok: false, error: describeError(err) });
      }
    }

    throw new GenerationError(`generation failed after ${this.maxAttempts} attempt(s): ${describeError(lastError)}`, this.maxAttempts, {
      cause: lastError
    });
  }
}

function renderRequest(request: CompletionRequest): string {
  const parts: string[] = [];
  if (request.system) parts.push(`[system]\n${request.system}`);
  for (const m of request.messages) parts.push(`[${m.role}]\n${m.content}`);
  return parts.join('\n\n');
}
