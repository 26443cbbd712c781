import type { FilingType, Section } from "../../core/entities/filing";
import type {
  LlmPort,
  TokenEstimatorPort,
} from "../../core/ports/outboundPorts";
import { describeBoundaryError } from "../../core/entities/appError";
import { logger, type Logger } from "../../shared/logger/logger";
import { truncateToTokens } from "./tokenEstimator";

export type TopicTaggerOptions = {
  enabled: boolean;
  maxInputTokens: number;
  maxTopics: number;
};

export const defaultTopicTaggerOptions: TopicTaggerOptions = {
  enabled: true,
  maxInputTokens: 3000,
  maxTopics: 8,
};

export type TopicRequest = {
  ticker: string;
  filingType: FilingType;
  section: Section;
};

const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Reads a JSON array of phrases out of a model reply, tolerating code fences
 * and prose around the array. Returns null when no array can be recovered.
 */
export const parseTopicList = (raw: string, maxTopics = 8): string[] | null => {
  let content = raw.trim();
  const fenced = FENCED.exec(content);
  if (fenced?.[1] !== undefined) {
    content = fenced[1].trim();
  }

  const open = content.indexOf("[");
  const close = content.lastIndexOf("]");
  if (open === -1 || close <= open) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(open, close + 1));
  } catch {
    return null;
  }

  if (!Array.isArray(parsed)) {
    return null;
  }

  const seen = new Set<string>();
  const topics: string[] = [];
  for (const item of parsed) {
    if (typeof item !== "string" && typeof item !== "number") {
      continue;
    }
    const topic = String(item).trim();
    const key = topic.toLowerCase();
    if (!topic || seen.has(key)) {
      continue;
    }
    seen.add(key);
    topics.push(topic);
  }

  return topics.slice(0, maxTopics);
};

export const buildTopicPrompt = (
  request: TopicRequest,
  sectionText: string,
): string =>
  [
    "Extract 3-8 key topic phrases from this SEC filing section.",
    "",
    "Return ONLY a JSON array of short phrases (2-5 words each).",
    "Prefer specific risks, strategies, financial themes or notable disclosures over generic labels.",
    "",
    `Company: ${request.ticker.toUpperCase()}`,
    `Filing type: ${request.filingType}`,
    `Section: ${request.section.sectionName}`,
    "",
    "Section text (may be truncated):",
    sectionText,
  ].join("\n");

/**
 * Adds free-form topic phrases per section. Topics are enrichment only:
 * every failure path yields an empty list.
 */
export class TopicTagger {
  constructor(
    private readonly llm: LlmPort,
    private readonly estimator: TokenEstimatorPort,
    private readonly options: TopicTaggerOptions = defaultTopicTaggerOptions,
    private readonly log: Logger = logger.child({ component: "topic-tagger" }),
  ) {}

  async extractTopics(request: TopicRequest): Promise<string[]> {
    if (!this.options.enabled) {
      return [];
    }

    const sectionText = this.sectionText(request.section);
    if (!sectionText) {
      return [];
    }

    const prompt = buildTopicPrompt(
      request,
      truncateToTokens(this.estimator, sectionText, this.options.maxInputTokens),
    );

    const completion = await this.llm.complete(prompt);
    if (completion.isErr()) {
      this.log.warn(
        {
          ticker: request.ticker,
          section: request.section.sectionName,
          error: describeBoundaryError(completion.error),
        },
        "Topic extraction failed",
      );
      return [];
    }

    const topics = parseTopicList(completion.value, this.options.maxTopics);
    if (!topics) {
      this.log.warn(
        { ticker: request.ticker, section: request.section.sectionName },
        "Topic extraction returned no JSON array",
      );
      return [];
    }

    return topics;
  }

  private sectionText(section: Section): string {
    const text = section.blocks
      .filter((block) => block.kind === "text")
      .map((block) => block.text)
      .join("\n\n")
      .trim();

    if (text) {
      return text;
    }

    return section.blocks
      .map((block) => block.text)
      .join("\n\n")
      .trim();
  }
}
