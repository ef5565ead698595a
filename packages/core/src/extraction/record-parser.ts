// Tolerant parser for delimiter-formatted extraction output
import type { ExtractionDelimiters } from '../prompts.js';
import {
  canonicalizeName,
  edgeKey,
  isFloatString,
  sortedPair,
  splitByMarkers,
  stripQuotes,
} from '../utils/text.js';

export interface EntityRecord {
  entity_name: string;
  entity_type: string;
  description: string;
  source_id: string;
}

export interface RelationRecord {
  src_id: string;
  tgt_id: string;
  weight: number;
  description: string;
  source_id: string;
  order: number;
}

export type UnrecognizedReason =
  | 'no-payload'
  | 'unknown-tag'
  | 'too-few-fields'
  | 'empty-name';

export type ParsedRecord =
  | { kind: 'entity'; entity: EntityRecord }
  | { kind: 'relation'; relation: RelationRecord }
  | { kind: 'unrecognized'; raw: string; reason: UnrecognizedReason };

export interface EdgeBag {
  /** Sorted endpoint pair */
  endpoints: [string, string];
  records: RelationRecord[];
}

/**
 * Records grouped by identity key, duplicates preserved
 */
export interface ExtractionBags {
  nodes: Map<string, EntityRecord[]>;
  edges: Map<string, EdgeBag>;
  unrecognized: number;
}

const PAYLOAD = /\((.*)\)/s;

function unrecognized(raw: string, reason: UnrecognizedReason): ParsedRecord {
  return { kind: 'unrecognized', raw, reason };
}

/**
 * Classify one record. Never throws: anything malformed comes back as
 * an `unrecognized` outcome.
 */
export function parseRecord(
  raw: string,
  chunkKey: string,
  tupleDelimiter: string,
): ParsedRecord {
  const payload = raw.match(PAYLOAD);
  if (!payload) {
    return unrecognized(raw, 'no-payload');
  }

  const fields = splitByMarkers(payload[1], [tupleDelimiter]);
  if (fields.length === 0) {
    return unrecognized(raw, 'too-few-fields');
  }

  const tag = stripQuotes(fields[0]).toLowerCase();
  if (tag === 'entity') {
    if (fields.length < 4) {
      return unrecognized(raw, 'too-few-fields');
    }
    const name = canonicalizeName(fields[1]);
    if (!name) {
      return unrecognized(raw, 'empty-name');
    }
    return {
      kind: 'entity',
      entity: {
        entity_name: name,
        entity_type: canonicalizeName(fields[2]),
        description: stripQuotes(fields[3]),
        source_id: chunkKey,
      },
    };
  }

  if (tag === 'relationship') {
    if (fields.length < 5) {
      return unrecognized(raw, 'too-few-fields');
    }
    const source = canonicalizeName(fields[1]);
    const target = canonicalizeName(fields[2]);
    if (!source || !target) {
      return unrecognized(raw, 'empty-name');
    }
    const strength = stripQuotes(fields[fields.length - 1]);
    return {
      kind: 'relation',
      relation: {
        src_id: source,
        tgt_id: target,
        weight: isFloatString(strength) ? Number.parseFloat(strength) : 1.0,
        description: stripQuotes(fields[3]),
        source_id: chunkKey,
        order: 1,
      },
    };
  }

  return unrecognized(raw, 'unknown-tag');
}

/**
 * Split raw model output into records and classify each one
 */
export function parseExtractionOutput(
  text: string,
  chunkKey: string,
  delimiters: ExtractionDelimiters,
): ParsedRecord[] {
  return splitByMarkers(text, [delimiters.record, delimiters.completion]).map(
    (raw) => parseRecord(raw, chunkKey, delimiters.tuple),
  );
}

export function emptyBags(): ExtractionBags {
  return { nodes: new Map(), edges: new Map(), unrecognized: 0 };
}

export function addEntityRecord(bags: ExtractionBags, entity: EntityRecord): void {
  const list = bags.nodes.get(entity.entity_name);
  if (list) {
    list.push(entity);
  } else {
    bags.nodes.set(entity.entity_name, [entity]);
  }
}

export function addRelationRecord(bags: ExtractionBags, relation: RelationRecord): void {
  const key = edgeKey(relation.src_id, relation.tgt_id);
  const bag = bags.edges.get(key);
  if (bag) {
    bag.records.push(relation);
  } else {
    bags.edges.set(key, {
      endpoints: sortedPair(relation.src_id, relation.tgt_id),
      records: [relation],
    });
  }
}

/**
 * Group entities by name and relations by sorted endpoint pair
 */
export function groupRecords(records: readonly ParsedRecord[]): ExtractionBags {
  const bags = emptyBags();
  for (const record of records) {
    switch (record.kind) {
      case 'entity':
        addEntityRecord(bags, record.entity);
        break;
      case 'relation':
        addRelationRecord(bags, record.relation);
        break;
      case 'unrecognized':
        bags.unrecognized += 1;
        break;
    }
  }
  return bags;
}

/**
 * Concatenate per-key record lists across bags, in argument order
 */
export function mergeBags(...all: readonly ExtractionBags[]): ExtractionBags {
  const merged = emptyBags();
  for (const bags of all) {
    for (const records of bags.nodes.values()) {
      for (const entity of records) {
        addEntityRecord(merged, entity);
      }
    }
    for (const bag of bags.edges.values()) {
      for (const relation of bag.records) {
        addRelationRecord(merged, relation);
      }
    }
    merged.unrecognized += bags.unrecognized;
  }
  return merged;
}
