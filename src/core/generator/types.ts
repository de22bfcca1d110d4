import type { FileSet } from '../candidate/types.js';

export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface CompletionMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  system?: string;
  messages: CompletionMessage[];
  tools?: ToolSpec[];
  maxTokens?: number;
}

export interface CompletionResponse {
  text: string;
}

/** The single completion capability the engine consumes; provider wiring lives outside. */
export interface CompletionClient {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
}

export interface PromptContext {
  goal: string;
  phase: string;
  sibling?: string;
  /** Full file set of the node being expanded. */
  files: FileSet;
  feedback?: string;
  depth: number;
  /** Paths the phase is allowed to write; rendered into prompts by most builders. */
  allowedPaths: readonly string[];
}

/** Opaque generation policy: turns a prompt context into a completion request. */
export type PromptBuilder = (ctx: PromptContext) => CompletionRequest;

/** Extracts generated files from raw model text; throws GenerationError when the text is malformed. */
export type FileExtractor = (rawText: string) => FileSet;

export interface GenerationResult {
  files: FileSet;
  rawText: string;
  prompt: string;
  attempts: number;
}
