// Chunking, entity and relation extraction
export { type ChunkingOptions, chunkByTokenSize, chunkDocuments } from './chunker.js';
export {
  type ChunkMap,
  type ClusteringOptions,
  type ClusterLayerRecord,
  type EmbeddedEntity,
  EntityExtractor,
  type EntityExtractorOptions,
  gleanExtraction,
  type HierarchicalClusterer,
  HierarchicalEntityExtractor,
  type HierarchicalEntityExtractorOptions,
  normalizeLoopAnswer,
} from './entity-extractor.js';
export {
  ClusteringError,
  EntityEmbeddingError,
  ExtractionError,
  isExtractionError,
} from './errors.js';
export {
  addEntityRecord,
  addRelationRecord,
  type EdgeBag,
  emptyBags,
  type EntityRecord,
  type ExtractionBags,
  groupRecords,
  mergeBags,
  type ParsedRecord,
  parseExtractionOutput,
  parseRecord,
  type RelationRecord,
  type UnrecognizedReason,
} from './record-parser.js';
