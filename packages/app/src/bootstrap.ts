import { ConfigurationError, createConsoleLogger, loadConfig } from '@gramloop/core';
import type { GramloopConfig, Logger, Message, ModelClient } from '@gramloop/core';
import { AgentKernel, CompositeObserver, LoggingObserver, OpenAICompatibleClient } from '@gramloop/agent-runtime';
import type { RunResult } from '@gramloop/agent-runtime';
import { ToolRegistry } from '@gramloop/tools';
import { registerCalculatorTools } from './calculator-tools.js';

export interface BootstrapOptions {
  configPath: string;
  /** Source of `GRAMLOOP_*` overrides. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Override the model client (e.g. for testing with a mock). */
  client?: ModelClient;
  /** Passed to the default HTTP client. */
  fetch?: typeof fetch;
}

export interface App {
  config: GramloopConfig;
  kernel: AgentKernel;
  tools: ToolRegistry;
  observer: CompositeObserver;
  logger: Logger;
  /** Run one prompt as a fresh conversation. */
  ask(prompt: string, signal?: AbortSignal): Promise<RunResult>;
}

/**
 * Wire the application:
 * 1. Load and validate config (with env overrides)
 * 2. Register the calculator tools
 * 3. Create the model client and observers
 * 4. Construct the kernel
 */
export function bootstrap(options: BootstrapOptions): App {
  const result = loadConfig(options.configPath, options.env ?? process.env);
  if (!result.valid || !result.config) {
    const errorMessages = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${errorMessages}`);
  }
  const config = result.config;
  const logger = options.logger ?? createConsoleLogger(config.logLevel);

  const tools = registerCalculatorTools(new ToolRegistry());

  const client =
    options.client ??
    new OpenAICompatibleClient({ ...config.model, ...(options.fetch ? { fetch: options.fetch } : {}) });

  const observer = new CompositeObserver(logger);
  observer.add('log', new LoggingObserver(logger));

  const kernel = new AgentKernel({ client, tools, config: config.kernel, observer, logger });
  logger.debug(
    `Kernel ready: ${config.kernel.modelFamily} family, ${config.kernel.grammarStrategy} strategy, ${tools.size} tools`,
  );

  return {
    config,
    kernel,
    tools,
    observer,
    logger,
    ask: (prompt, signal) => {
      const messages: Message[] = [{ role: 'user', content: prompt }];
      return kernel.run(messages, { signal });
    },
  };
}
