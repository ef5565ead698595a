import { describe, expect, it } from 'vitest';
import { DEFAULT_DELIMITERS } from '../prompts.js';
import {
  groupRecords,
  mergeBags,
  parseExtractionOutput,
  parseRecord,
} from './record-parser.js';

const T = DEFAULT_DELIMITERS.tuple;

describe('parseRecord', () => {
  it('should parse an entity record', () => {
    const result = parseRecord(
      `("entity"${T}"alice"${T}"person"${T}"Alice is an engineer.")`,
      'chunk-1',
      T,
    );
    expect(result).toEqual({
      kind: 'entity',
      entity: {
        entity_name: 'ALICE',
        entity_type: 'PERSON',
        description: 'Alice is an engineer.',
        source_id: 'chunk-1',
      },
    });
  });

  it('should parse a relationship with a numeric strength', () => {
    const result = parseRecord(
      `("relationship"${T}"Alice"${T}"Bob"${T}"Alice works with Bob."${T}8)`,
      'chunk-1',
      T,
    );
    expect(result).toEqual({
      kind: 'relation',
      relation: {
        src_id: 'ALICE',
        tgt_id: 'BOB',
        weight: 8,
        description: 'Alice works with Bob.',
        source_id: 'chunk-1',
        order: 1,
      },
    });
  });

  it('should default the weight when the last field is not a number', () => {
    const result = parseRecord(
      `("relationship"${T}"A"${T}"B"${T}"linked"${T}"strong")`,
      'c',
      T,
    );
    expect(result.kind === 'relation' && result.relation.weight).toBe(1);
  });

  it('should accept a quoted numeric strength', () => {
    const result = parseRecord(`("relationship"${T}A${T}B${T}d${T}"2.5")`, 'c', T);
    expect(result.kind === 'relation' && result.relation.weight).toBe(2.5);
  });

  it('should keep parentheses inside descriptions', () => {
    const result = parseRecord(
      `("entity"${T}"ACME"${T}"organization"${T}"Acme (formerly Apex) makes tools.")`,
      'c',
      T,
    );
    expect(result.kind === 'entity' && result.entity.description).toBe(
      'Acme (formerly Apex) makes tools.',
    );
  });

  it('should report records without a payload', () => {
    expect(parseRecord('just prose', 'c', T)).toEqual({
      kind: 'unrecognized',
      raw: 'just prose',
      reason: 'no-payload',
    });
  });

  it('should report entities with too few fields', () => {
    const result = parseRecord(`("entity"${T}"ALICE"${T}"person")`, 'c', T);
    expect(result.kind === 'unrecognized' && result.reason).toBe('too-few-fields');
  });

  it('should report relationships with too few fields', () => {
    const result = parseRecord(`("relationship"${T}A${T}B${T}desc)`, 'c', T);
    expect(result.kind === 'unrecognized' && result.reason).toBe('too-few-fields');
  });

  it('should report unknown tags', () => {
    const result = parseRecord(`("event"${T}A${T}B${T}desc)`, 'c', T);
    expect(result.kind === 'unrecognized' && result.reason).toBe('unknown-tag');
  });

  it('should report empty names', () => {
    const result = parseRecord(`("entity"${T}""${T}"person"${T}"nobody")`, 'c', T);
    expect(result.kind === 'unrecognized' && result.reason).toBe('empty-name');
  });
});

describe('parseExtractionOutput', () => {
  it('should split on record and completion delimiters', () => {
    const text = [
      `("entity"${T}"ALICE"${T}"person"${T}"An engineer.")`,
      `("entity"${T}"BOB"${T}"person"${T}"A designer.")`,
      `("relationship"${T}"ALICE"${T}"BOB"${T}"Colleagues."${T}3)<|COMPLETE|>`,
    ].join('##\n');

    const records = parseExtractionOutput(text, 'chunk-9', DEFAULT_DELIMITERS);

    expect(records.map((r) => r.kind)).toEqual(['entity', 'entity', 'relation']);
  });
});

describe('groupRecords', () => {
  it('should keep duplicates and merge symmetric edges', () => {
    const text = [
      `("entity"${T}"BOB"${T}"person"${T}"First.")`,
      `("entity"${T}"bob"${T}"person"${T}"Second.")`,
      `("relationship"${T}"BOB"${T}"ALICE"${T}"x"${T}1)`,
      `("relationship"${T}"ALICE"${T}"BOB"${T}"y"${T}2)`,
      'garbage',
    ].join('##');

    const bags = groupRecords(parseExtractionOutput(text, 'c1', DEFAULT_DELIMITERS));

    expect(bags.nodes.get('BOB')?.map((r) => r.description)).toEqual([
      'First.',
      'Second.',
    ]);
    expect(bags.edges.size).toBe(1);
    const [edge] = [...bags.edges.values()];
    expect(edge.endpoints).toEqual(['ALICE', 'BOB']);
    expect(edge.records.map((r) => r.weight)).toEqual([1, 2]);
    expect(bags.unrecognized).toBe(1);
  });
});

describe('mergeBags', () => {
  it('should concatenate lists per key', () => {
    const a = groupRecords(
      parseExtractionOutput(`("entity"${T}A${T}t${T}one)`, 'c1', DEFAULT_DELIMITERS),
    );
    const b = groupRecords(
      parseExtractionOutput(
        `("entity"${T}A${T}t${T}two)##(broken`,
        'c2',
        DEFAULT_DELIMITERS,
      ),
    );

    const merged = mergeBags(a, b);

    expect(merged.nodes.get('A')?.map((r) => r.source_id)).toEqual(['c1', 'c2']);
    expect(merged.unrecognized).toBe(1);
  });
});
