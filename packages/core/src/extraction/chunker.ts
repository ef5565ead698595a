// Token-window chunking of source documents
import type { TextChunk } from '@strata-rag/shared';
import { computeMdhashId } from '../utils/hash.js';
import type { Tokenizer } from '../utils/tokenizer.js';
import { ExtractionError } from './errors.js';

export interface ChunkingOptions {
  tokenizer: Tokenizer;
  maxTokenSize: number;
  overlapTokenSize: number;
}

/**
 * Split `content` into windows of `maxTokenSize` tokens that start every
 * `maxTokenSize - overlapTokenSize` tokens. `tokens` is the window's real
 * size; `content` is trimmed.
 */
export function chunkByTokenSize(
  content: string,
  fullDocId: string,
  { tokenizer, maxTokenSize, overlapTokenSize }: ChunkingOptions,
): TextChunk[] {
  const step = maxTokenSize - overlapTokenSize;
  if (step <= 0) {
    throw new ExtractionError('overlapTokenSize must be smaller than maxTokenSize');
  }

  const tokens = tokenizer.encode(content);
  const chunks: TextChunk[] = [];
  for (let start = 0, index = 0; start < tokens.length; start += step, index++) {
    const window = tokens.slice(start, start + maxTokenSize);
    chunks.push({
      tokens: window.length,
      content: tokenizer.decode(window).trim(),
      chunk_order_index: index,
      full_doc_id: fullDocId,
    });
  }
  return chunks;
}

/**
 * Chunks of every document keyed by content hash; identical chunks collapse
 */
export function chunkDocuments(
  documents: Readonly<Record<string, { content: string }>>,
  options: ChunkingOptions,
): Record<string, TextChunk> {
  const keyed: Record<string, TextChunk> = {};
  for (const [docId, doc] of Object.entries(documents)) {
    for (const chunk of chunkByTokenSize(doc.content, docId, options)) {
      keyed[computeMdhashId(chunk.content, 'chunk-')] = chunk;
    }
  }
  return keyed;
}
