import type { ErrorKind } from './errors.js';
import type { GrammarStrategy } from './config.js';
import type { TokenUsage } from './model.js';

/** Why a run stopped. */
export type TerminationReason = 'no_tool_calls' | 'max_turns' | 'fatal_error';

/** Events emitted by the kernel at fixed points of the turn loop. */
export type KernelEvent =
  | {
      type: 'run_started';
      maxTurns: number;
      toolCount: number;
      initialMessageCount: number;
    }
  | {
      type: 'request_issued';
      turn: number;
      messageCount: number;
      toolCount: number;
      strategy: GrammarStrategy;
    }
  | {
      type: 'response_received';
      turn: number;
      durationMs: number;
      text: string;
      toolCallCount: number;
      parseErrorCount: number;
      usage?: TokenUsage;
    }
  | {
      type: 'tool_call_issued';
      turn: number;
      callId: string;
      toolName: string;
      arguments: Readonly<Record<string, unknown>>;
    }
  | {
      type: 'tool_result_received';
      turn: number;
      callId: string;
      toolName: string;
      isError: boolean;
      durationMs: number;
      outputPreview: string;
    }
  | {
      type: 'turn_complete';
      turn: number;
      toolCallCount: number;
      errorCount: number;
    }
  | {
      type: 'run_ended';
      turns: number;
      terminationReason: TerminationReason;
      durationMs: number;
      usage: TokenUsage;
    }
  | {
      type: 'error';
      turn: number;
      kind: ErrorKind;
      message: string;
    };

/** Narrow a KernelEvent by its `type`. */
export type KernelEventOf<T extends KernelEvent['type']> = Extract<KernelEvent, { type: T }>;

/**
 * External event consumer. Fire-and-forget: the kernel never awaits
 * the returned promise, and failures never reach the loop.
 */
export interface Observer {
  onEvent(event: KernelEvent): void | Promise<void>;
}
