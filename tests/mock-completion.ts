import type { CompletionClient, CompletionRequest, CompletionResponse } from '../src/core/generator/types.js';

export type Responder = (args: { request: CompletionRequest; call: number; prompt: string }) => string | Promise<string>;

/** Scripted completion client; `call` counts from 0 across the client's lifetime. */
export class MockCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private respond: Responder) {}

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    signal?.throwIfAborted();
    const call = this.requests.length;
    this.requests.push(request);
    const prompt = request.messages.map((m) => m.content).join('\n');
    const text = await untilAborted(Promise.resolve(this.respond({ request, call, prompt })), signal);
    return { text };
  }
}

function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/** Resolves after `ms`; never settles a response on its own when `ms` is Infinity. */
export function delay(ms: number): Promise<void> {
  if (ms === Number.POSITIVE_INFINITY) return new Promise(() => {});
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function fileBlocks(files: Record<string, string>): string {
  return Object.entries(files)
    .map(([path, content]) => `<file path="${path}">\n${content}\n</file>`)
    .join('\n');
}

/** Value of `Phase: ...` in a default-builder prompt. */
export function phaseOf(prompt: string): string {
  return /^Phase: (.+)$/m.exec(prompt)?.[1] ?? '';
}
