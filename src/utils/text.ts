import { createHash } from 'node:crypto';

export function md5Hex(text: string): string {
  return createHash('md5').update(text).digest('hex');
}

/**
 * Keep the head and tail of an oversized text, two thirds from the head.
 */
export function truncateMiddle(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const head = Math.floor((maxChars * 2) / 3);
  const tail = maxChars - head;
  const dropped = text.length - head - tail;
  return `${text.slice(0, head)}\n...[truncated ${dropped} chars]...\n${text.slice(text.length - tail)}`;
}

export function tailLines(text: string, count: number): string {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.slice(-count).join('\n');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
