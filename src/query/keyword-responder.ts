/**
 * Rule-based question answering over a QueryContext.
 *
 * Questions are bucketed by lowercase substring, first match wins:
 * goal, player, time, summary, then a general fallback. Confidence and
 * relevance values are fixed per bucket and are not calibrated.
 */

import type { RelevantTimestamp } from '../types/api.ts';
import { formatClock, tokenize, type QueryContext } from './context.ts';

export type ResponseFormat = 'detailed' | 'summary' | 'timestamps';

export type QuestionBucket = 'goal' | 'player' | 'time' | 'summary' | 'general';

export interface KeywordAnswer {
  readonly answer: string;
  readonly confidence: number;
  readonly timestamps: RelevantTimestamp[];
  readonly players: string[];
}

const BUCKET_KEYWORDS: ReadonlyArray<readonly [QuestionBucket, readonly string[]]> = [
  ['goal', ['goal', 'score', 'scored']],
  ['player', ['player', 'who']],
  ['time', ['when', 'time', 'timestamp']],
  ['summary', ['summary', 'what happened', 'overview']],
];

const MAX_TIME_EVENTS = 5;
const MAX_SUMMARY_ACTIONS = 3;
const MAX_FORMATTED_TIMESTAMPS = 3;

export function classifyQuestion(question: string): QuestionBucket {
  const lower = question.toLowerCase();
  for (const [bucket, keywords] of BUCKET_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return bucket;
    }
  }
  return 'general';
}

/** Answers a question, then reshapes the answer text for the requested format. */
export function answerQuestion(
  question: string,
  ctx: QueryContext,
  format: ResponseFormat = 'detailed',
): KeywordAnswer {
  const answer = answerByBucket(question, ctx);

  if (format === 'summary') {
    return { ...answer, answer: firstSentences(answer.answer, 2) };
  }
  if (format === 'timestamps') {
    return { ...answer, answer: withKeyTimestamps(answer.answer, answer.timestamps) };
  }
  return answer;
}

function answerByBucket(question: string, ctx: QueryContext): KeywordAnswer {
  switch (classifyQuestion(question)) {
    case 'goal':
      return answerGoals(ctx);
    case 'player':
      return answerPlayers(question, ctx);
    case 'time':
      return answerTimes(ctx);
    case 'summary':
      return answerSummary(ctx);
    case 'general':
      return answerGeneral(question, ctx);
  }
}

function answerGoals(ctx: QueryContext): KeywordAnswer {
  const goals = ctx.playerActions.filter((action) => action.action.toLowerCase().includes('goal'));

  if (goals.length === 0) {
    return {
      answer: 'No goals were detected in this video analysis.',
      confidence: 0.6,
      timestamps: [],
      players: [],
    };
  }

  const players = new PlayerList();
  const timestamps: RelevantTimestamp[] = [];
  const lines: string[] = [];

  for (const goal of goals) {
    const player = goal.player || 'Unknown player';
    players.add(goal.player);
    timestamps.push({ timestamp: goal.timestamp, description: `${player} scored`, relevance: 1.0 });
    lines.push(`${player} scored at ${formatClock(goal.timestamp)}`);
  }

  return {
    answer: `Goals in this video: ${lines.join('; ')}`,
    confidence: 0.8,
    timestamps,
    players: players.toArray(),
  };
}

function answerPlayers(question: string, ctx: QueryContext): KeywordAnswer {
  const names = candidateNames(question);
  const matches = ctx.playerActions.filter((action) => {
    const player = action.player.toLowerCase();
    return player !== '' && names.some((name) => player.includes(name));
  });

  if (matches.length === 0) {
    return {
      answer: 'No specific player actions found matching your query.',
      confidence: 0.4,
      timestamps: [],
      players: [],
    };
  }

  const players = new PlayerList();
  const timestamps: RelevantTimestamp[] = [];
  const lines: string[] = [];

  for (const action of matches) {
    players.add(action.player);
    timestamps.push({
      timestamp: action.timestamp,
      description: `${action.player} ${action.action}`,
      relevance: 0.9,
    });
    lines.push(`${action.player} ${action.action} at ${formatClock(action.timestamp)}`);
  }

  return {
    answer: `Player actions found: ${lines.join('; ')}`,
    confidence: 0.7,
    timestamps,
    players: players.toArray(),
  };
}

function answerTimes(ctx: QueryContext): KeywordAnswer {
  const events = [
    ...ctx.playerActions.map((action) => ({
      timestamp: action.timestamp,
      description: `${action.player} ${action.action}`.trim(),
    })),
    ...ctx.chapters.map((chapter) => ({ timestamp: chapter.timestamp, description: chapter.title })),
  ]
    .sort((a, b) => a.timestamp - b.timestamp)
    .slice(0, MAX_TIME_EVENTS);

  if (events.length === 0) {
    return {
      answer: 'No timestamped events found in the analysis.',
      confidence: 0.6,
      timestamps: [],
      players: [],
    };
  }

  return {
    answer: `Key timestamps in the video: ${events.map((e) => `${formatClock(e.timestamp)}: ${e.description}`).join('; ')}`,
    confidence: 0.8,
    timestamps: events.map((e) => ({ ...e, relevance: 0.8 })),
    players: [],
  };
}

function answerSummary(ctx: QueryContext): KeywordAnswer {
  const parts: string[] = [];
  const players = new PlayerList();
  const timestamps: RelevantTimestamp[] = [];

  if (ctx.gameContext.location) {
    parts.push(`Game at ${ctx.gameContext.location}`);
  }

  for (const action of ctx.playerActions.slice(0, MAX_SUMMARY_ACTIONS)) {
    parts.push(`${action.player} ${action.action} at ${formatClock(action.timestamp)}`);
    players.add(action.player);
    timestamps.push({
      timestamp: action.timestamp,
      description: `${action.player} ${action.action}`,
      relevance: 0.9,
    });
  }

  if (parts.length === 0) {
    return {
      answer: 'This video contains gameplay footage with various player actions and game events.',
      confidence: 0.5,
      timestamps: [],
      players: [],
    };
  }

  return { answer: parts.join('. '), confidence: 0.9, timestamps, players: players.toArray() };
}

function answerGeneral(question: string, ctx: QueryContext): KeywordAnswer {
  const keywords = new Set(tokenize(question));
  const players = new PlayerList();
  const timestamps: RelevantTimestamp[] = [];

  for (const action of ctx.playerActions) {
    const words = tokenize(`${action.player} ${action.action} ${action.description}`);
    if (words.some((word) => keywords.has(word))) {
      players.add(action.player);
      timestamps.push({
        timestamp: action.timestamp,
        description: `${action.player} ${action.action}`,
        relevance: 0.7,
      });
    }
  }

  return {
    answer: 'I found some information related to your question in the video analysis.',
    confidence: 0.5,
    timestamps,
    players: players.toArray(),
  };
}

/** Capitalized question words longer than two letters, lowercased for matching. */
function candidateNames(question: string): string[] {
  return question
    .split(/\s+/)
    .map((word) => word.replace(/[^\p{L}\p{N}'-]/gu, ''))
    .filter((word) => word.length > 2 && /^\p{Lu}/u.test(word))
    .map((word) => word.toLowerCase());
}

/** Keeps the first `count` sentences of a text. */
export function firstSentences(text: string, count: number): string {
  const sentences = text.split(/(?<=[.!?])\s+/);
  if (sentences.length <= count) return text;
  return sentences.slice(0, count).join(' ');
}

function withKeyTimestamps(answer: string, timestamps: RelevantTimestamp[]): string {
  if (timestamps.length === 0) return answer;

  const listed = timestamps
    .slice(0, MAX_FORMATTED_TIMESTAMPS)
    .map((ts) => `${formatClock(ts.timestamp)}: ${ts.description}`)
    .join('; ');
  return `${answer}\n\nKey timestamps: ${listed}`;
}

/** Insertion-ordered, de-duplicated player names; blanks are skipped. */
class PlayerList {
  private readonly names = new Set<string>();

  add(name: string): void {
    if (name) this.names.add(name);
  }

  toArray(): string[] {
    return [...this.names];
  }
}
