/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Returns null when the text is not a JSON object.
 */
import { logger } from '@/services/logger';

function stripFences(raw: string): string {
  let txt = raw.trim();
  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}

export function safeParseJson(raw: string, context: string): Record<string, unknown> | null {
  const txt = stripFences(raw);

  try {
    const parsed = asObject(JSON.parse(txt));
    if (parsed) return parsed;
    logger.warn('safeParseJson:non_object', { context, raw: txt.slice(0, 300) });
    return null;
  } catch {
    try {
      const parsed = asObject(JSON.parse(txt.replace(/'/g, '"')));
      if (parsed) return parsed;
    } catch {
      // fall through to the warning below
    }
    logger.warn('safeParseJson:parse_error', {
      context,
      error: 'Invalid JSON after stripping fences',
      raw: txt.slice(0, 300),
    });
    return null;
  }
}
