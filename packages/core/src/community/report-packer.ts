// Pack a community's entities, relations and sub-community reports into
// a token-bounded prompt input
import type { Community, CommunityReport } from '@strata-rag/shared';
import { createLogger, type Logger } from '../logger.js';
import type { GraphStorage } from '../storage/interface.js';
import { listOfListToCsv } from '../utils/csv.js';
import { edgeKey } from '../utils/text.js';
import type { Tokenizer } from '../utils/tokenizer.js';
import { truncateListByTokenSize } from '../utils/truncate.js';

const NODE_FIELDS = ['id', 'entity', 'type', 'description', 'degree'];
const EDGE_FIELDS = ['id', 'source', 'target', 'description', 'rank'];
const SUB_COMMUNITY_FIELDS = ['id', 'report', 'rating', 'importance'];

// [id, entity, type, description, degree]
type NodeRow = [number, string, string, string, number];
// [id, source, target, description, rank]
type EdgeRow = [number, string, string, string, number];

export type ReportLookup = Readonly<Record<string, CommunityReport>>;

export interface PackOptions {
  tokenizer: Tokenizer;
  maxTokenSize: number;
  /** Reports of already processed (finer) communities */
  alreadyReports: ReportLookup;
  /** Include sub-community reports even when nothing was truncated */
  forceSubCommunities?: boolean;
  logger?: Logger;
}

export interface PackedCommunity {
  text: string;
  truncated: boolean;
  usedSubCommunities: boolean;
}

export interface SubCommunityPack {
  describe: string;
  tokens: number;
  coveredNodes: Set<string>;
  /** Edge keys of covered edges */
  coveredEdges: Set<string>;
}

const byRankDesc = (a: NodeRow | EdgeRow, b: NodeRow | EdgeRow) => b[4] - a[4];

/**
 * Table of available sub-community reports, most frequent first, and the
 * nodes and edges those reports already describe
 */
export function packSubCommunityReports(
  community: Community,
  maxTokenSize: number,
  alreadyReports: ReportLookup,
  tokenizer: Tokenizer,
): SubCommunityPack {
  const available = community.sub_communities
    .filter((id) => Object.hasOwn(alreadyReports, id))
    .map((id) => alreadyReports[id])
    .sort((a, b) => b.occurrence - a.occurrence);
  const included = truncateListByTokenSize(
    available,
    (report) => report.report_string,
    maxTokenSize,
    tokenizer,
  );

  const describe = listOfListToCsv([
    SUB_COMMUNITY_FIELDS,
    ...included.map((report, i) => [
      i,
      report.report_string,
      report.report_json.rating ?? -1,
      report.occurrence,
    ]),
  ]);

  const coveredNodes = new Set<string>();
  const coveredEdges = new Set<string>();
  for (const report of included) {
    for (const node of report.nodes) {
      coveredNodes.add(node);
    }
    for (const [a, b] of report.edges) {
      coveredEdges.add(edgeKey(a, b));
    }
  }

  return {
    describe,
    tokens: tokenizer.encode(describe).length,
    coveredNodes,
    coveredEdges,
  };
}

/**
 * Build the report prompt input for one community. Rows are ranked by
 * degree; when a table overflows half the budget and sub-community reports
 * exist, those reports are included and uncovered rows are packed first.
 */
export async function packCommunityDescription(
  graph: GraphStorage,
  community: Community,
  options: PackOptions,
): Promise<PackedCommunity> {
  const logger = options.logger ?? createLogger('report-packer');
  const { tokenizer, maxTokenSize, alreadyReports } = options;

  const nodesInOrder = [...community.nodes].sort();
  const edgesInOrder = [...community.edges].sort(([a1, b1], [a2, b2]) => {
    const left = a1 + b1;
    const right = a2 + b2;
    return left < right ? -1 : left > right ? 1 : 0;
  });

  const [nodeData, nodeDegrees, edgeData, edgeDegrees] = await Promise.all([
    Promise.all(nodesInOrder.map((name) => graph.getNode(name))),
    Promise.all(nodesInOrder.map((name) => graph.nodeDegree(name))),
    Promise.all(edgesInOrder.map(([a, b]) => graph.getEdge(a, b))),
    Promise.all(edgesInOrder.map(([a, b]) => graph.edgeDegree(a, b))),
  ]);

  const nodeRows = nodesInOrder
    .map((name, i): NodeRow => {
      const data = nodeData[i];
      if (!data) {
        logger.warn('Community node missing from graph', { community: community.title, node: name });
      }
      return [
        i,
        name,
        data?.entity_type ?? 'UNKNOWN',
        data?.description ?? 'UNKNOWN',
        nodeDegrees[i],
      ];
    })
    .sort(byRankDesc);

  const edgeRows = edgesInOrder
    .map(([source, target], i): EdgeRow => {
      const data = edgeData[i];
      if (!data) {
        logger.warn('Community edge missing from graph', {
          community: community.title,
          source,
          target,
        });
      }
      return [i, source, target, data?.description ?? 'UNKNOWN', edgeDegrees[i]];
    })
    .sort(byRankDesc);

  const describeRow = (row: NodeRow | EdgeRow) => row[3];
  const half = Math.floor(maxTokenSize / 2);
  let nodesPacked = truncateListByTokenSize(nodeRows, describeRow, half, tokenizer);
  let edgesPacked = truncateListByTokenSize(edgeRows, describeRow, half, tokenizer);

  const truncated =
    nodesPacked.length < nodeRows.length || edgesPacked.length < edgeRows.length;
  const hasSubReports = community.sub_communities.some((id) =>
    Object.hasOwn(alreadyReports, id),
  );
  const useSubCommunities = (truncated && hasSubReports) || options.forceSubCommunities === true;

  let reportDescribe = '';
  if (useSubCommunities) {
    logger.debug('Packing community with sub-community reports', {
      community: community.title,
      truncated,
    });
    const sub = packSubCommunityReports(community, maxTokenSize, alreadyReports, tokenizer);
    reportDescribe = sub.describe;

    const remaining = Math.floor((maxTokenSize - sub.tokens) / 2);
    const isCoveredNode = (row: NodeRow) => sub.coveredNodes.has(row[1]);
    const isCoveredEdge = (row: EdgeRow) => sub.coveredEdges.has(edgeKey(row[1], row[2]));
    nodesPacked = truncateListByTokenSize(
      [...nodeRows.filter((r) => !isCoveredNode(r)), ...nodeRows.filter(isCoveredNode)],
      describeRow,
      remaining,
      tokenizer,
    );
    edgesPacked = truncateListByTokenSize(
      [...edgeRows.filter((r) => !isCoveredEdge(r)), ...edgeRows.filter(isCoveredEdge)],
      describeRow,
      remaining,
      tokenizer,
    );
  }

  const nodesDescribe = listOfListToCsv([NODE_FIELDS, ...nodesPacked]);
  const edgesDescribe = listOfListToCsv([EDGE_FIELDS, ...edgesPacked]);
  const text = `-----Reports-----
\`\`\`csv
${reportDescribe}
\`\`\`
-----Entities-----
\`\`\`csv
${nodesDescribe}
\`\`\`
-----Relationships-----
\`\`\`csv
${edgesDescribe}
\`\`\``;

  return { text, truncated, usedSubCommunities: useSubCommunities };
}
