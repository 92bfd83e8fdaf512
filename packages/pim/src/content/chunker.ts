/**
 * Content chunker
 *
 * Splits embedding text into bounded chunks. Text that fits is returned as a single
 * chunk, untouched. Longer text is split greedily on the coarsest boundary that works
 * (paragraph, line, sentence, word) and every chunk is prefixed with the title and a
 * `[Part i of n]` marker. Prefix and marker count against the chunk length: a long
 * title is shortened at a word boundary (or left out), and markers are left out when
 * the budget is too small to hold them. Words are never cut, so a single word longer
 * than the budget becomes its own oversized chunk.
 */

/** Approximate characters per token. */
export const CHARS_PER_TOKEN = 4;

/** Room kept for the `[Part i of n]\n` marker; enough up to 999 parts. */
export const PART_MARKER_RESERVE = 18;

/** Smallest body worth keeping decoration (marker, title) for. */
export const MIN_BODY_CHARS = 16;

export type ContentChunk = Readonly<{
  /** Zero-based; chunk 0 is the primary chunk. */
  index: number;
  text: string;
}>;

export type ChunkerOptions = Readonly<{
  maxTokensPerChunk: number;
}>;

type Boundary = Readonly<{ pattern: RegExp; joiner: string }>;

type Layout = Readonly<{
  titlePrefix: string;
  markers: boolean;
  budget: number;
}>;

const BOUNDARIES: readonly Boundary[] = [
  { pattern: /\n{2,}/, joiner: '\n\n' },
  { pattern: /\n/, joiner: '\n' },
  { pattern: /(?<=[.!?])\s+/, joiner: ' ' },
  { pattern: /\s+/, joiner: ' ' },
];

export function estimateTokenCount(text: string): number {
  if (!text.trim()) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

function splitToBudget(text: string, budget: number, level: number): string[] {
  if (text.length <= budget) return [text];

  const boundary = BOUNDARIES[level];
  if (!boundary) return [text];

  const segments = text
    .split(boundary.pattern)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  const pieces: string[] = [];
  let current = '';

  for (const segment of segments) {
    if (segment.length > budget) {
      if (current) {
        pieces.push(current);
        current = '';
      }
      pieces.push(...splitToBudget(segment, budget, level + 1));
      continue;
    }

    const candidate = current ? `${current}${boundary.joiner}${segment}` : segment;
    if (candidate.length <= budget) {
      current = candidate;
    } else {
      pieces.push(current);
      current = segment;
    }
  }

  if (current) pieces.push(current);
  return pieces;
}

function partMarker(part: number, total: number): string {
  return `[Part ${part} of ${total}]\n`;
}

function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const cut = text.slice(0, maxLength + 1);
  const lastSpace = cut.lastIndexOf(' ');
  return lastSpace > 0 ? cut.slice(0, lastSpace).trimEnd() : '';
}

function fitTitlePrefix(title: string, room: number): string {
  const decoration = 'Title: \n'.length;
  const titleRoom = Math.min(Math.floor(room / 2), room - MIN_BODY_CHARS) - decoration;
  if (!title || titleRoom <= 0) return '';
  const fitted = truncateAtWord(title, titleRoom);
  return fitted ? `Title: ${fitted}\n` : '';
}

function planLayout(maxChars: number, title: string, markerReserve: number): Layout {
  const markers = maxChars - markerReserve >= MIN_BODY_CHARS;
  const room = markers ? maxChars - markerReserve : maxChars;
  const titlePrefix = fitTitlePrefix(title, room);
  return { titlePrefix, markers, budget: room - titlePrefix.length };
}

export function chunkContent(
  content: string,
  title: string | null | undefined,
  options: ChunkerOptions
): ContentChunk[] {
  if (!Number.isInteger(options.maxTokensPerChunk) || options.maxTokensPerChunk <= 0) {
    throw new Error(`Invalid maxTokensPerChunk: ${options.maxTokensPerChunk}`);
  }

  const text = content.trim();
  if (!text) return [];

  const maxChars = options.maxTokensPerChunk * CHARS_PER_TOKEN;
  if (text.length <= maxChars) return [{ index: 0, text }];

  const titleText = title?.trim().replace(/\s+/g, ' ') ?? '';
  let markerReserve = PART_MARKER_RESERVE;

  for (;;) {
    const layout = planLayout(maxChars, titleText, markerReserve);
    const bodies = splitToBudget(text, layout.budget, 0);
    const total = bodies.length;

    // More parts than the reserve allows for: widen it and lay out again.
    const markerLength = partMarker(total, total).length;
    if (layout.markers && markerLength > markerReserve) {
      markerReserve = markerLength;
      continue;
    }

    return bodies.map((body, index) => ({
      index,
      text: `${layout.titlePrefix}${layout.markers ? partMarker(index + 1, total) : ''}${body}`,
    }));
  }
}
