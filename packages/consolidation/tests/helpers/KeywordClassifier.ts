import type { SentimentClassifier } from '@customer360/core';

const TAGGED = /^\[(\d+)\] (.*)$/;
const BULLET = /^- (.*)$/;

/**
 * Answers every prompt line by keyword: "great" or "love" is Positive,
 * "terrible" or "awful" is Negative, anything else Neutral.
 */
export class KeywordClassifier implements SentimentClassifier {
  readonly prompts: string[] = [];

  classify(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const answers: string[] = [];
    for (const line of prompt.split('\n')) {
      const tagged = TAGGED.exec(line);
      if (tagged) {
        answers.push(`[${tagged[1] ?? ''}] ${label(tagged[2] ?? '')}`);
        continue;
      }
      const bullet = BULLET.exec(line);
      if (bullet) answers.push(label(bullet[1] ?? ''));
    }
    return Promise.resolve(answers.join('\n'));
  }
}

function label(text: string): string {
  if (/great|love/.test(text)) return 'Positive';
  if (/terrible|awful/.test(text)) return 'Negative';
  return 'Neutral';
}
