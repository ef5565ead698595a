export { listOfListToCsv, type CsvCell } from './csv.js';
export { computeMdhashId } from './hash.js';
export { extractJsonObject } from './json.js';
export {
  canonicalizeName,
  cleanStr,
  edgeKey,
  isFloatString,
  sortedPair,
  splitByMarkers,
  stripQuotes,
} from './text.js';
export { TiktokenTokenizer, type Tokenizer } from './tokenizer.js';
export { truncateListByTokenSize } from './truncate.js';
