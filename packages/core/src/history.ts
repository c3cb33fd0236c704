import type { Message } from './messages.js';

/**
 * Bounds history growth between turns.
 * Must be pure and must keep every tool message paired with the
 * assistant tool call it answers.
 */
export interface HistoryStrategy {
  trim(messages: readonly Message[]): Message[];
}
