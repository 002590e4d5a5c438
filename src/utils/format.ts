/**
 * Text formatting utilities
 */

export const TELEGRAM_MAX_LENGTH = 4096;

/**
 * Escape HTML for Telegram HTML parse mode.
 * Escapes: & < > " '
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** dd.mm.yyyy in local time */
export function formatDate(date: Date): string {
  return `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()}`;
}

/** dd.mm.yyyy hh:mm in local time */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** yyyy-mm-dd in local time */
export function formatIsoDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Where to end the first piece of an over-long line: never inside a tag, an
 * entity or a surrogate pair, and at the last space when there is one.
 * Returns the piece end and where the remainder starts.
 */
function cutPoint(line: string, maxLength: number): { end: number; resume: number } {
  let cut = maxLength;
  if (isLowSurrogate(line.charCodeAt(cut)) && cut > 1) cut--;

  let markupStart = -1;
  let lastSpace = -1;
  for (let i = 0; i < cut; i++) {
    const char = line[i];
    if (markupStart < 0) {
      if (char === '<' || char === '&') markupStart = i;
      else if (char === ' ') lastSpace = i;
    } else if ((line[markupStart] === '<' && char === '>') || (line[markupStart] === '&' && char === ';')) {
      markupStart = -1;
    }
  }

  if (markupStart < 0 && line[cut] === ' ') return { end: cut, resume: cut + 1 };
  if (markupStart > 0) cut = markupStart;
  if (lastSpace > 0) return { end: lastSpace, resume: lastSpace + 1 };
  return { end: cut, resume: cut };
}

function cutLine(line: string, maxLength: number): string[] {
  const pieces: string[] = [];
  let rest = line;

  while (rest.length > maxLength) {
    const { end, resume } = cutPoint(rest, maxLength);
    pieces.push(rest.slice(0, end));
    rest = rest.slice(resume);
  }

  if (rest) pieces.push(rest);
  return pieces;
}

function pack(pieces: string[], separator: string, maxLength: number): string[] {
  const packed: string[] = [];
  let current = '';

  for (const piece of pieces) {
    const candidate = current ? `${current}${separator}${piece}` : piece;
    if (candidate.length <= maxLength) {
      current = candidate;
    } else {
      if (current) packed.push(current);
      current = piece;
    }
  }

  if (current) packed.push(current);
  return packed;
}

/** A block over the limit falls back to line boundaries, then to cutting lines. */
function fitBlock(block: string, maxLength: number): string[] {
  if (block.length <= maxLength) return [block];

  const lines = block
    .split('\n')
    .flatMap((line) => (line.length <= maxLength ? [line] : cutLine(line, maxLength)));
  return pack(lines, '\n', maxLength);
}

/**
 * Split a message into chunks of at most `maxLength` characters.
 *
 * Blocks separated by blank lines are records and stay whole whenever they fit
 * in one chunk; chunks are packed greedily in order.
 */
export function splitTelegramMessage(text: string, maxLength = TELEGRAM_MAX_LENGTH): string[] {
  if (text.length <= maxLength) return text.trim() ? [text] : [];

  const blocks = text
    .split(/\n{2,}/)
    .map((block) => block.trim())
    .filter(Boolean)
    .flatMap((block) => fitBlock(block, maxLength));

  return pack(blocks, '\n\n', maxLength);
}
