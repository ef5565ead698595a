// Core type definitions shared across packages

// LLM Provider Types
export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LLMCompletionOptions {
  prompt: string;
  // Prior turns sent before `prompt`; never mutated by providers
  history?: readonly ChatMessage[];
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  responseFormat?: 'text' | 'json';
}

export interface LLMProvider {
  complete(options: LLMCompletionOptions): Promise<string>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

// Progress reporting for long-running indexing work
export type IndexingStage =
  | 'entity-extraction'
  | 'relation-extraction'
  | 'community-reports';

// One event per finished unit of work; listeners do their own counting
export interface IndexingProgress {
  stage: IndexingStage;
  /** Key of the chunk or community that just finished */
  item: string;
  total: number;
  entities?: number;
  relations?: number;
}

export type ProgressCallback = (progress: IndexingProgress) => void;

// Outcome of a single insert call
export interface InsertResult {
  documents: number;
  chunks: number;
  entities: number;
  relations: number;
  communities: number;
}

export interface GraphStatistics {
  nodes: number;
  edges: number;
  communities: number;
  documents: number;
  chunks: number;
}

// Provenance of an assembled query context
export interface ContextReferences {
  entities: string[];
  communities: { level: number; title: string }[];
  chunks: { fullDocId: string; chunkOrderIndex: number }[];
}
