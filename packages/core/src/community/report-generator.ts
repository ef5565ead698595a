// Generate community reports level by level, finest level first
import {
  type Community,
  type CommunityReport,
  type CommunityReportJson,
  CommunityReportJsonSchema,
  type LLMProvider,
  type ProgressCallback,
} from '@strata-rag/shared';
import { createLogger, type Logger } from '../logger.js';
import { formatPrompt, PROMPTS } from '../prompts.js';
import type { GraphStorage } from '../storage/interface.js';
import { extractJsonObject } from '../utils/json.js';
import type { Tokenizer } from '../utils/tokenizer.js';
import { CommunityReportError } from './errors.js';
import { packCommunityDescription, type ReportLookup } from './report-packer.js';

export interface CommunityReportGeneratorOptions {
  graph: GraphStorage;
  /** Capable model; called once per community */
  llm: LLMProvider;
  tokenizer: Tokenizer;
  maxTokenSize: number;
  forceSubCommunities?: boolean;
  onProgress?: ProgressCallback;
  logger?: Logger;
}

/**
 * Stored report text: title heading followed by the summary
 */
export function reportJsonToString(report: CommunityReportJson): string {
  return `# ${report.title ?? 'Report'}\n\n${report.summary ?? ''}`;
}

export class CommunityReportGenerator {
  private readonly logger: Logger;

  constructor(private readonly options: CommunityReportGeneratorOptions) {
    this.logger = options.logger ?? createLogger('community-reports');
  }

  /**
   * Levels run one after another, highest level number first, so coarser
   * communities can reuse their children's reports. Communities within a
   * level run concurrently.
   */
  async generate(): Promise<Record<string, CommunityReport>> {
    const schema = await this.options.graph.communitySchema();
    const entries = Object.entries(schema);
    const levels = [...new Set(entries.map(([, c]) => c.level))].sort((a, b) => b - a);
    this.logger.info('Generating community reports', {
      communities: entries.length,
      levels,
    });

    const reports: Record<string, CommunityReport> = {};
    for (const level of levels) {
      const levelEntries = entries.filter(([, c]) => c.level === level);
      const results = await Promise.all(
        levelEntries.map(([id, community]) =>
          this.generateOne(id, community, reports, entries.length),
        ),
      );
      levelEntries.forEach(([id, community], i) => {
        reports[id] = {
          ...community,
          report_string: reportJsonToString(results[i]),
          report_json: results[i],
        };
      });
      this.logger.info('Community level reported', {
        level,
        communities: levelEntries.length,
      });
    }
    return reports;
  }

  private async generateOne(
    id: string,
    community: Community,
    alreadyReports: ReportLookup,
    total: number,
  ): Promise<CommunityReportJson> {
    const packed = await packCommunityDescription(this.options.graph, community, {
      tokenizer: this.options.tokenizer,
      maxTokenSize: this.options.maxTokenSize,
      alreadyReports,
      forceSubCommunities: this.options.forceSubCommunities,
      logger: this.logger,
    });
    const response = await this.options.llm.complete({
      prompt: formatPrompt(PROMPTS.communityReport, { input_text: packed.text }),
      responseFormat: 'json',
    });

    const raw = extractJsonObject(response);
    if (raw === null) {
      throw new CommunityReportError(`Report for community ${id} is not valid JSON`, id);
    }
    const report = CommunityReportJsonSchema.parse(raw);
    this.options.onProgress?.({ stage: 'community-reports', item: id, total });
    return report;
  }
}
