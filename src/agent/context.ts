/**
 * Prompt and supporting-evidence helpers for agent-backed question answering.
 */

import type { RelevantTimestamp } from '../types/api.ts';
import { formatClock, tokenize, type QueryContext } from '../query/context.ts';

const MAX_CONTEXT_ITEMS = 5;
const MAX_RELEVANT_TIMESTAMPS = 5;

/** Renders the analysis as plain text for the agent. */
export function buildAnalysisContext(ctx: QueryContext): string {
  const lines: string[] = [];

  if (ctx.gameEvents.length > 0) {
    lines.push(`Game Events (${ctx.gameEvents.length} total):`);
    for (const event of ctx.gameEvents.slice(0, MAX_CONTEXT_ITEMS)) {
      lines.push(`- ${event.event} at ${formatClock(event.timestamp)}: ${event.description}`);
    }
  }

  if (ctx.playerActions.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(`Player Actions (${ctx.playerActions.length} total):`);
    for (const action of ctx.playerActions.slice(0, MAX_CONTEXT_ITEMS)) {
      lines.push(`- ${action.player || 'Unknown player'} ${action.action} at ${formatClock(action.timestamp)}`);
    }
  }

  const { location, atmosphere } = ctx.gameContext;
  if (location || atmosphere) {
    if (lines.length > 0) lines.push('');
    lines.push('Game Context:');
    if (location) lines.push(`- Location: ${location}`);
    if (atmosphere) lines.push(`- Atmosphere: ${atmosphere}`);
  }

  if (lines.length > 0) lines.push('');
  lines.push('Analysis Metadata:');
  lines.push(`- Total Chapters: ${ctx.chapters.length}`);
  lines.push(`- Blueprint Confidence: ${ctx.analysisConfidence}`);

  return lines.join('\n');
}

export function buildAgentPrompt(question: string, ctx: QueryContext): string {
  return [
    'Game Analysis Context:',
    buildAnalysisContext(ctx),
    '',
    `User Question: ${question}`,
    '',
    'Answer the question from the structured game analysis above.',
    'Include specific timestamps, player names, and confidence scores when available.',
    'If the data does not cover the question, say so clearly.',
  ].join('\n');
}

/** Game events (0.9) then player actions (0.8) sharing a word with the question; at most five. */
export function extractRelevantTimestamps(ctx: QueryContext, question: string): RelevantTimestamp[] {
  const words = new Set(tokenize(question));
  const overlaps = (text: string) => tokenize(text).some((word) => words.has(word));
  const found: RelevantTimestamp[] = [];

  for (const event of ctx.gameEvents) {
    if (overlaps(`${event.event} ${event.description}`)) {
      found.push({ timestamp: event.timestamp, description: `${event.event}: ${event.description}`, relevance: 0.9 });
    }
  }

  for (const action of ctx.playerActions) {
    if (overlaps(`${action.player} ${action.action}`)) {
      found.push({ timestamp: action.timestamp, description: `${action.player} ${action.action}`.trim(), relevance: 0.8 });
    }
  }

  return found.slice(0, MAX_RELEVANT_TIMESTAMPS);
}

/** Named players whose name or action shares a word with the question. */
export function extractRelatedPlayers(ctx: QueryContext, question: string): string[] {
  const words = new Set(tokenize(question));
  const players = new Set<string>();

  for (const action of ctx.playerActions) {
    if (!action.player) continue;
    if (tokenize(`${action.player} ${action.action}`).some((word) => words.has(word))) {
      players.add(action.player);
    }
  }

  return [...players];
}
