// Reasoning path through a sequence of key entities
import type { GraphStorage } from '../storage/interface.js';

/**
 * Walk from the first stop through every other stop in order, joining
 * consecutive stops by their shortest path. Unreachable stops are appended
 * directly, so every stop appears on the path.
 */
export async function findPathWithRequiredNodes(
  graph: GraphStorage,
  stops: readonly string[],
): Promise<string[]> {
  if (stops.length === 0) {
    return [];
  }

  const path = [stops[0]];
  for (let i = 1; i < stops.length; i++) {
    const segment = await graph.shortestPath(stops[i - 1], stops[i]);
    if (segment && segment.length > 0) {
      path.push(...segment.slice(1));
    } else {
      path.push(stops[i]);
    }
  }
  return path;
}
