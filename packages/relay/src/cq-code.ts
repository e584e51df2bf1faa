// CQ Code - OneBot string message format ("hi [CQ:image,file=a.png]")

import type { WireSegment } from './types.js';

const CQ_PATTERN = /\[CQ:([A-Za-z0-9_.-]+)((?:,[^\]]*)?)\]/g;

export function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/\[/g, '&#91;').replace(/]/g, '&#93;');
}

export function escapeParam(value: string): string {
  return escapeText(value).replace(/,/g, '&#44;');
}

export function unescapeCq(value: string): string {
  return value
    .replace(/&#44;/g, ',')
    .replace(/&#91;/g, '[')
    .replace(/&#93;/g, ']')
    .replace(/&amp;/g, '&');
}

export function parseCqCode(message: string): WireSegment[] {
  const segments: WireSegment[] = [];
  let last = 0;

  for (const match of message.matchAll(CQ_PATTERN)) {
    const start = match.index ?? 0;
    if (start > last) {
      segments.push({ type: 'text', data: { text: unescapeCq(message.slice(last, start)) } });
    }

    const data: Record<string, unknown> = {};
    for (const pair of match[2].split(',')) {
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      data[pair.slice(0, eq)] = unescapeCq(pair.slice(eq + 1));
    }
    segments.push({ type: match[1], data });
    last = start + match[0].length;
  }

  if (last < message.length) {
    segments.push({ type: 'text', data: { text: unescapeCq(message.slice(last)) } });
  }
  return segments;
}

export function renderCqCode(segments: readonly WireSegment[]): string {
  return segments
    .map((segment) => {
      if (segment.type === 'text') {
        return escapeText(String(segment.data.text ?? ''));
      }
      const params = Object.entries(segment.data)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `,${key}=${escapeParam(String(value))}`)
        .join('');
      return `[CQ:${segment.type}${params}]`;
    })
    .join('');
}
