import type { HistoryConfig, HistoryStrategy, Message } from '@gramloop/core';

export const DEFAULT_MAX_HISTORY_SHARE = 0.5;

/** Rough token estimate: ~4 chars per token. */
function estimateTokens(chars: number): number {
  return Math.ceil(chars / 4);
}

export function estimateMessageTokens(msg: Message): number {
  let chars = msg.content.length;
  if (msg.toolCalls) {
    for (const tc of msg.toolCalls) {
      chars += tc.name.length + JSON.stringify(tc.arguments).length + tc.id.length;
    }
  }
  return estimateTokens(chars);
}

function isInstruction(msg: Message | undefined): msg is Message {
  return msg !== undefined && (msg.role === 'system' || msg.role === 'developer');
}

/**
 * Repair orphaned tool call / tool result pairs after trimming.
 *
 * - Drop `tool` messages whose `toolCallId` has no matching
 *   `toolCalls[].id` in any remaining assistant message.
 * - Strip `toolCalls` from assistant messages whose tool results
 *   were all dropped; keep only the answered calls otherwise.
 */
export function repairOrphans(messages: readonly Message[]): Message[] {
  const toolCallIds = new Set<string>();
  for (const msg of messages) {
    if (msg.role === 'assistant' && msg.toolCalls) {
      for (const tc of msg.toolCalls) toolCallIds.add(tc.id);
    }
  }

  const filtered = messages.filter((msg) => {
    if (msg.role === 'tool' && msg.toolCallId) {
      return toolCallIds.has(msg.toolCallId);
    }
    return true;
  });

  const remainingResultIds = new Set<string>();
  for (const msg of filtered) {
    if (msg.role === 'tool' && msg.toolCallId) {
      remainingResultIds.add(msg.toolCallId);
    }
  }

  return filtered.map((msg): Message => {
    if (msg.role === 'assistant' && msg.toolCalls && msg.toolCalls.length > 0) {
      const survivingCalls = msg.toolCalls.filter((tc) => remainingResultIds.has(tc.id));
      if (survivingCalls.length === 0) {
        const { toolCalls: _dropped, ...rest } = msg;
        return rest;
      }
      if (survivingCalls.length < msg.toolCalls.length) {
        return { ...msg, toolCalls: survivingCalls };
      }
    }
    return msg;
  });
}

/** Sends the whole history every turn. */
export class KeepAllHistory implements HistoryStrategy {
  trim(messages: readonly Message[]): Message[] {
    return [...messages];
  }
}

/**
 * Keeps the newest `maxMessages` messages. A leading system/developer
 * message is always kept and counts toward the limit.
 */
export class SlidingWindowHistory implements HistoryStrategy {
  constructor(private readonly maxMessages: number) {
    if (!Number.isInteger(maxMessages) || maxMessages < 2) {
      throw new RangeError(`maxMessages must be an integer >= 2, got ${maxMessages}`);
    }
  }

  trim(messages: readonly Message[]): Message[] {
    if (messages.length <= this.maxMessages) return [...messages];

    const [first] = messages;
    if (isInstruction(first)) {
      const tail = messages.slice(1).slice(-(this.maxMessages - 1));
      return [first, ...repairOrphans(tail)];
    }
    return repairOrphans(messages.slice(-this.maxMessages));
  }
}

export interface TokenBudgetOptions {
  contextWindow: number;
  maxHistoryShare?: number;
}

/**
 * Keeps the newest messages that fit a token budget.
 *
 * 1. Separate a leading system/developer message from history
 * 2. historyBudget = min(contextWindow - instructionTokens, contextWindow * maxHistoryShare)
 * 3. If history fits, return unchanged
 * 4. Otherwise keep newest messages that fit (drop oldest first)
 * 5. Run orphan repair on the result
 */
export class TokenBudgetHistory implements HistoryStrategy {
  private readonly contextWindow: number;
  private readonly maxHistoryShare: number;

  constructor(options: TokenBudgetOptions) {
    this.contextWindow = options.contextWindow;
    this.maxHistoryShare = options.maxHistoryShare ?? DEFAULT_MAX_HISTORY_SHARE;
  }

  trim(messages: readonly Message[]): Message[] {
    const [first] = messages;
    const lead = isInstruction(first) ? [first] : [];
    const history = messages.slice(lead.length);

    const leadTokens = lead.reduce((sum, msg) => sum + estimateMessageTokens(msg), 0);
    const historyBudget = Math.min(
      this.contextWindow - leadTokens,
      this.contextWindow * this.maxHistoryShare,
    );

    const historyTokens = history.reduce((sum, msg) => sum + estimateMessageTokens(msg), 0);
    if (historyTokens <= historyBudget) return [...messages];

    let budget = historyBudget;
    let keepFrom = history.length;
    for (let i = history.length - 1; i >= 0; i--) {
      const msg = history[i];
      if (!msg) break;
      const tokens = estimateMessageTokens(msg);
      if (budget - tokens < 0) break;
      budget -= tokens;
      keepFrom = i;
    }

    return [...lead, ...repairOrphans(history.slice(keepFrom))];
  }
}

export function createHistoryStrategy(config: HistoryConfig): HistoryStrategy {
  switch (config.strategy) {
    case 'keep-all':
      return new KeepAllHistory();
    case 'sliding-window':
      return new SlidingWindowHistory(config.maxMessages);
    case 'token-budget':
      return new TokenBudgetHistory(config);
  }
}
