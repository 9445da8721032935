/**
 * Transcript formatting shared by every prompt builder
 */

import type { Turn } from '../../../types/debate.js';

/**
 * Label a turn the way the models see it: `FOR: ...`, `AGAINST: ...`, `MODERATOR: ...`
 */
export function formatTurn(turn: Turn): string {
  return `${turn.side.toUpperCase()}: ${turn.text}`;
}

/**
 * Render turns one per line
 */
export function formatTranscript(turns: readonly Turn[]): string {
  return turns.map(formatTurn).join('\n');
}

/**
 * Most recent `window` turns; 0 keeps everything
 */
export function windowHistory(turns: readonly Turn[], window: number): readonly Turn[] {
  if (window <= 0 || turns.length <= window) {
    return turns;
  }
  return turns.slice(turns.length - window);
}
