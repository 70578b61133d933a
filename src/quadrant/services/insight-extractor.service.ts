import { Injectable } from '@nestjs/common';
import {
  DEFAULT_MAX_INSIGHTS,
  INSIGHT_DEDUPE_JACCARD,
  MAX_DOCUMENT_TOPICS,
  MAX_INSIGHTS_CEILING,
  MIN_CONTENT_LENGTH,
  MIN_SENTENCE_CHARS,
  OVERVIEW_TOPIC_COUNT,
  SUPPORTED_LANGUAGES,
} from '../config/quadrant.constants';
import { ExtractionError } from '../errors/quadrant.errors';
import {
  DocumentTopic,
  ExtractionOptions,
  Insight,
  InsightExtractionResult,
  TextStatistics,
} from '../types/quadrant.types';
import { detectLanguage } from '../utils/language.util';
import { complexityLevel, fleschReadingEase } from '../utils/readability.util';
import { labelSentiment, scoreSentiment } from '../utils/sentiment.util';
import { isNearDuplicate } from '../utils/similarity.util';
import {
  cleanText,
  clipAtWordBoundary,
  contentTokens,
  extractEntities,
  roundTo,
  splitSentences,
  tokenizeWords,
} from '../utils/text.util';

interface SentenceCandidate {
  text: string;
  position: number;
  distinct: string[];
  rawSalience: number;
}

// positional weight falls linearly from 1 at the first sentence to this value
const LAST_SENTENCE_WEIGHT = 0.5;

// largest value, or 0 when empty; no spread, long texts exceed the argument limit
function maxOf(values: Iterable<number>): number {
  let max = 0;
  for (const value of values) {
    if (value > max) {
      max = value;
    }
  }
  return max;
}

function byFrequencyThenTerm(
  termFrequency: ReadonlyMap<string, number>,
): (a: string, b: string) => number {
  return (a, b) =>
    (termFrequency.get(b) ?? 0) - (termFrequency.get(a) ?? 0) ||
    (a < b ? -1 : a > b ? 1 : 0);
}

@Injectable()
export class InsightExtractorService {
  extract(text: string, options: ExtractionOptions = {}): Insight[] {
    return this.analyzeText(text, options).insights;
  }

  analyzeText(
    text: string,
    options: ExtractionOptions = {},
  ): InsightExtractionResult {
    const cleaned = cleanText(text);
    this.assertExtractable(cleaned, options.minLength);
    const language = this.resolveLanguage(cleaned, options.language);

    const sentences = splitSentences(text);
    const { candidates, termFrequency } = this.buildCandidates(sentences);
    const insights = this.selectInsights(
      candidates,
      this.resolveMaxInsights(options.maxInsights),
    );
    const topics = this.rankTopics(termFrequency);
    const statistics = this.buildStatistics(cleaned, sentences, language);

    return {
      insights,
      topics,
      statistics,
      overview: this.describe(insights, topics, statistics, options.title),
    };
  }

  private assertExtractable(cleaned: string, minLengthRaw?: number): void {
    if (!cleaned) {
      throw new ExtractionError(
        'EmptyContent',
        'text',
        0,
        'text is empty after removing markup and whitespace',
      );
    }

    const minLength = this.resolveMinLength(minLengthRaw);
    if (cleaned.length < minLength) {
      throw new ExtractionError(
        'TooShort',
        'text',
        cleaned.length,
        `text too short for analysis: ${cleaned.length} characters (minimum: ${minLength})`,
      );
    }
  }

  private resolveLanguage(cleaned: string, hint?: string): string {
    const requested = (hint ?? 'auto').trim().toLowerCase();
    const language =
      requested === '' || requested === 'auto'
        ? detectLanguage(cleaned)
        : requested;

    if (!SUPPORTED_LANGUAGES.has(language)) {
      throw new ExtractionError(
        'UnsupportedLanguage',
        'language',
        language,
        `language '${language}' is not supported (supported: ${[...SUPPORTED_LANGUAGES].join(', ')})`,
      );
    }
    return language;
  }

  private buildCandidates(sentences: string[]): {
    candidates: SentenceCandidate[];
    termFrequency: Map<string, number>;
  } {
    const kept = sentences
      .filter((sentence) => sentence.length >= MIN_SENTENCE_CHARS)
      .map((sentence) => clipAtWordBoundary(sentence));

    const termFrequency = new Map<string, number>();
    const tokenized = kept.map((sentence) => {
      const tokens = contentTokens(sentence);
      tokens.forEach((token) =>
        termFrequency.set(token, (termFrequency.get(token) ?? 0) + 1),
      );
      return tokens;
    });
    const maxFrequency = maxOf(termFrequency.values());
    const lastIndex = Math.max(1, kept.length - 1);
    const compareTerms = byFrequencyThenTerm(termFrequency);

    const candidates = kept.map((sentence, position) => {
      const tokens = tokenized[position];
      const distinct = [...new Set(tokens)];
      const frequency =
        distinct.length === 0 || maxFrequency === 0
          ? 0
          : distinct.reduce(
              (sum, token) =>
                sum + (termFrequency.get(token) ?? 0) / maxFrequency,
              0,
            ) / distinct.length;
      const positional =
        kept.length <= 1
          ? 1
          : 1 - (1 - LAST_SENTENCE_WEIGHT) * (position / lastIndex);

      // topic picks the most document-frequent token, ties alphabetical
      distinct.sort(compareTerms);

      return {
        text: sentence,
        position,
        distinct,
        rawSalience: frequency * positional,
      };
    });

    return { candidates, termFrequency };
  }

  private selectInsights(
    candidates: SentenceCandidate[],
    maxInsights: number,
  ): Insight[] {
    const maxRaw = maxOf(candidates.map((c) => c.rawSalience));
    const ordered = [...candidates].sort(
      (a, b) => b.rawSalience - a.rawSalience || a.position - b.position,
    );

    const kept: SentenceCandidate[] = [];
    const keptTokenSets: Set<string>[] = [];
    for (const candidate of ordered) {
      if (kept.length >= maxInsights) {
        break;
      }
      const tokenSet = new Set(candidate.distinct);
      if (isNearDuplicate(tokenSet, keptTokenSets, INSIGHT_DEDUPE_JACCARD)) {
        continue;
      }
      kept.push(candidate);
      keptTokenSets.push(tokenSet);
    }

    return kept.map((candidate) => ({
      text: candidate.text,
      topic: candidate.distinct[0] ?? '',
      salience:
        maxRaw > 0 ? roundTo(candidate.rawSalience / maxRaw, 4) : 0,
      sentiment: scoreSentiment(candidate.text),
      entities: extractEntities(candidate.text),
      keywords: candidate.distinct,
      position: candidate.position,
    }));
  }

  private rankTopics(termFrequency: Map<string, number>): DocumentTopic[] {
    const maxFrequency = maxOf(termFrequency.values());
    if (maxFrequency === 0) {
      return [];
    }
    return [...termFrequency.keys()]
      .sort(byFrequencyThenTerm(termFrequency))
      .slice(0, MAX_DOCUMENT_TOPICS)
      .map((term) => {
        const frequency = termFrequency.get(term) ?? 0;
        return {
          term,
          frequency,
          relevance: roundTo(frequency / maxFrequency, 4),
        };
      });
  }

  private buildStatistics(
    cleaned: string,
    sentences: string[],
    language: string,
  ): TextStatistics {
    const words = tokenizeWords(cleaned);
    const overallSentiment = scoreSentiment(cleaned);
    // syllable counts are only meaningful for English
    const readabilityScore =
      language === 'en' ? fleschReadingEase(words, sentences.length) : null;
    return {
      language,
      characterCount: cleaned.length,
      wordCount: words.length,
      sentenceCount: sentences.length,
      averageSentenceLength:
        sentences.length > 0 ? roundTo(words.length / sentences.length, 2) : 0,
      overallSentiment,
      sentimentLabel: labelSentiment(overallSentiment),
      readabilityScore,
      complexityLevel: complexityLevel(readabilityScore),
    };
  }

  /** One-line plain-text account of what the extraction found. */
  private describe(
    insights: Insight[],
    topics: DocumentTopic[],
    statistics: TextStatistics,
    title?: string,
  ): string {
    const parts: string[] = [];
    const trimmedTitle = title?.trim();
    if (trimmedTitle) {
      parts.push(`Analysis of '${trimmedTitle}'`);
    }
    if (topics.length > 0) {
      const names = topics
        .slice(0, OVERVIEW_TOPIC_COUNT)
        .map((topic) => topic.term);
      parts.push(`Main topics: ${names.join(', ')}`);
    }
    if (insights.length > 0) {
      parts.push(`Identified ${insights.length} key insights`);
    }
    const entityCount = new Set(insights.flatMap((insight) => insight.entities))
      .size;
    if (entityCount > 0) {
      parts.push(`Extracted ${entityCount} named entities`);
    }
    parts.push(
      `Overall sentiment: ${statistics.sentimentLabel.replace('_', ' ')}`,
    );
    return `${parts.join('. ')}.`;
  }

  private resolveMaxInsights(raw: number | undefined): number {
    if (raw == null || !Number.isFinite(raw)) {
      return DEFAULT_MAX_INSIGHTS;
    }
    const normalized = Math.floor(raw);
    if (normalized <= 0) {
      return DEFAULT_MAX_INSIGHTS;
    }
    return Math.min(MAX_INSIGHTS_CEILING, normalized);
  }

  private resolveMinLength(raw: number | undefined): number {
    if (raw == null || !Number.isFinite(raw) || raw < 0) {
      return MIN_CONTENT_LENGTH;
    }
    return Math.floor(raw);
  }
}
