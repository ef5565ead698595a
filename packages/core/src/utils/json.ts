// Lenient JSON extraction from model responses

/**
 * Parse the first JSON object in `text`, tolerating code fences and
 * leading or trailing prose. Returns null when nothing parses.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const candidates: string[] = [text.trim()];

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    candidates.push(fenced[1].trim());
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed !== null) {
      return parsed;
    }
  }
  return null;
}

function tryParse(candidate: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch {
    return null;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}
