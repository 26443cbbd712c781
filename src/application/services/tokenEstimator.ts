import { getEncoding, type Tiktoken } from "js-tiktoken";
import type { TokenEstimatorPort } from "../../core/ports/outboundPorts";

/**
 * Counts tokens with the same `cl100k_base` encoding the embedding model sizes its input by.
 * Special-token markers inside filing text are encoded as ordinary text.
 */
export class TiktokenEstimator implements TokenEstimatorPort {
  constructor(
    private readonly encoding: Tiktoken = getEncoding("cl100k_base"),
  ) {}

  count(text: string): number {
    if (!text) {
      return 0;
    }

    return this.encode(text).length;
  }

  encode(text: string): number[] {
    return this.encoding.encode(text, [], []);
  }

  decode(tokens: number[]): string {
    return this.encoding.decode(tokens);
  }
}

/**
 * Cuts text to at most `maxTokens` tokens, returning it untouched when it already fits.
 */
export const truncateToTokens = (
  estimator: TokenEstimatorPort,
  text: string,
  maxTokens: number,
): string => {
  const tokens = estimator.encode(text);
  if (tokens.length <= maxTokens) {
    return text;
  }

  return estimator.decode(tokens.slice(0, maxTokens));
};
