// Community reports
export {
  CommunityReportGenerator,
  reportJsonToString,
} from './report-generator.js';
export type { CommunityReportGeneratorOptions } from './report-generator.js';
export {
  packCommunityDescription,
  packSubCommunityReports,
} from './report-packer.js';
export type {
  PackedCommunity,
  PackOptions,
  ReportLookup,
  SubCommunityPack,
} from './report-packer.js';
export { CommunityReportError, isCommunityReportError } from './errors.js';
