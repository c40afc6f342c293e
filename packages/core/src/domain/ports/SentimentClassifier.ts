/**
 * Port for the text-classification service.
 *
 * Receives one free-text prompt embedding several feedback lines and answers
 * with free text, ideally one line per submitted feedback.
 */
export interface SentimentClassifier {
  classify(prompt: string): Promise<string>;
}
