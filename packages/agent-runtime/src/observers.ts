import { describeError, silentLogger } from '@gramloop/core';
import type { KernelEvent, Logger, Observer } from '@gramloop/core';

/**
 * Deliver `event` without letting the observer affect the caller.
 * Sync throws and rejected promises are logged at warn.
 */
export function notifyObserver(observer: Observer, event: KernelEvent, logger: Logger, label = 'observer'): void {
  try {
    const pending = observer.onEvent(event);
    if (pending instanceof Promise) {
      pending.catch((err: unknown) => {
        logger.warn(`${label} failed on ${event.type}: ${describeError(err)}`);
      });
    }
  } catch (err) {
    logger.warn(`${label} failed on ${event.type}: ${describeError(err)}`);
  }
}

/** Fans each event out to named observers, isolating their failures. */
export class CompositeObserver implements Observer {
  private observers = new Map<string, Observer>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /** Register under `name`, replacing any observer already there. */
  add(name: string, observer: Observer): { dispose: () => void } {
    this.observers.set(name, observer);
    return {
      dispose: () => {
        if (this.observers.get(name) === observer) this.observers.delete(name);
      },
    };
  }

  remove(name: string): boolean {
    return this.observers.delete(name);
  }

  has(name: string): boolean {
    return this.observers.has(name);
  }

  get size(): number {
    return this.observers.size;
  }

  onEvent(event: KernelEvent): void {
    for (const [name, observer] of this.observers) {
      notifyObserver(observer, event, this.logger, `Observer "${name}"`);
    }
  }
}

function preview(text: string, max = 120): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

/** Writes one log line per event. */
export class LoggingObserver implements Observer {
  constructor(private readonly logger: Logger) {}

  onEvent(event: KernelEvent): void {
    switch (event.type) {
      case 'run_started':
        this.logger.info(
          `Run started (${event.initialMessageCount} messages, ${event.toolCount} tools, max ${event.maxTurns} turns)`,
        );
        break;
      case 'request_issued':
        this.logger.debug(
          `Turn ${event.turn}: request with ${event.messageCount} messages, ${event.toolCount} tools [${event.strategy}]`,
        );
        break;
      case 'response_received':
        this.logger.debug(
          `Turn ${event.turn}: response in ${event.durationMs}ms, ${event.toolCallCount} calls, ${event.parseErrorCount} parse errors`,
        );
        if (event.text) this.logger.debug(`Turn ${event.turn}: ${preview(event.text)}`);
        break;
      case 'tool_call_issued':
        this.logger.info(`Turn ${event.turn}: ${event.toolName}(${JSON.stringify(event.arguments)}) [${event.callId}]`);
        break;
      case 'tool_result_received': {
        const line = `Turn ${event.turn}: ${event.toolName} -> ${preview(event.outputPreview)} (${event.durationMs}ms)`;
        if (event.isError) this.logger.warn(line);
        else this.logger.info(line);
        break;
      }
      case 'turn_complete':
        this.logger.debug(`Turn ${event.turn} complete: ${event.toolCallCount} calls, ${event.errorCount} errors`);
        break;
      case 'run_ended':
        this.logger.info(
          `Run ended after ${event.turns} turns: ${event.terminationReason} (${event.durationMs}ms, ${event.usage.total} tokens)`,
        );
        break;
      case 'error':
        this.logger.error(`Turn ${event.turn}: ${event.kind} error: ${event.message}`);
        break;
    }
  }
}

/** Discards every event. */
export class NullObserver implements Observer {
  onEvent(): void {}
}
