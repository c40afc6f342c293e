import type { CorrelationMode } from '@customer360/core';
import { Sentiment } from '@customer360/core';

const INSTRUCTION = 'Classify sentiment (Positive / Negative / Neutral) for each line';
const TAGGED_INSTRUCTION = `${INSTRUCTION}. Answer with one line per item, starting with the [n] tag of the item`;
const TAGGED_LINE = /^\s*(?:[-*]\s*)?\[(\d+)\]\s*(.*)$/;

/** Build one request for a partition of feedback texts, one line per text. */
export function buildPrompt(texts: readonly string[], correlation: CorrelationMode): string {
  const lines = texts.map((text, i) => {
    const flat = text.replace(/\s+/g, ' ').trim();
    return correlation === 'tagged' ? `[${String(i + 1)}] ${flat}` : `- ${flat}`;
  });
  const instruction = correlation === 'tagged' ? TAGGED_INSTRUCTION : INSTRUCTION;
  return `${instruction}:\n\n${lines.join('\n')}\n`;
}

/** Map a response line to a label. Keywords are checked as positive, negative, then neutral. */
export function parseSentimentLabel(line: string): Sentiment {
  const lower = line.toLowerCase();
  if (lower.includes('positive')) return Sentiment.POSITIVE;
  if (lower.includes('negative')) return Sentiment.NEGATIVE;
  if (lower.includes('neutral')) return Sentiment.NEUTRAL;
  return Sentiment.UNKNOWN;
}

/** Non-blank response lines, trimmed. */
export function responseLines(response: string): string[] {
  return response
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/** Line `i` labels item `i`; items past the end of the response are `Unknown`. */
export function matchPositional(lines: readonly string[], itemCount: number): Sentiment[] {
  return Array.from({ length: itemCount }, (_, i) => {
    const line = lines[i];
    return line === undefined ? Sentiment.UNKNOWN : parseSentimentLabel(line);
  });
}

/**
 * Lines echoing `[n]` label item `n` (1-based). The first answer for a tag
 * wins; items never echoed are `Unknown`.
 */
export function matchTagged(lines: readonly string[], itemCount: number): Sentiment[] {
  const labels: Sentiment[] = Array.from({ length: itemCount }, () => Sentiment.UNKNOWN);
  const answered = new Set<number>();

  for (const line of lines) {
    const match = TAGGED_LINE.exec(line);
    if (!match) continue;
    const index = Number(match[1]) - 1;
    if (index < 0 || index >= itemCount || answered.has(index)) continue;
    answered.add(index);
    labels[index] = parseSentimentLabel(match[2] ?? '');
  }

  return labels;
}

/**
 * A customer's overall label: the most frequent known label, `Neutral` when
 * different labels tie, `Unknown` when no label is known.
 */
export function resolveSentiment(labels: readonly Sentiment[]): Sentiment {
  const counts = new Map<Sentiment, number>();
  for (const label of labels) {
    if (label === Sentiment.UNKNOWN) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  let best: Sentiment = Sentiment.UNKNOWN;
  let bestCount = 0;
  let tied = false;
  for (const [label, count] of counts) {
    if (count > bestCount) {
      best = label;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }

  return tied ? Sentiment.NEUTRAL : best;
}
