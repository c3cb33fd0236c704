/** Token accounting for one completion or a whole run. */
export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

/** A tool call in OpenAI chat-completions wire shape. */
export interface WireToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    /** JSON-encoded argument object. */
    arguments: string;
  };
}

/** A message as sent to the inference endpoint. */
export interface WireMessage {
  role: string;
  content: string;
  tool_calls?: WireToolCall[];
  tool_call_id?: string;
  name?: string;
}

/** A first-class tool descriptor for endpoints that accept a tool list. */
export interface WireTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/** A fully formatted completion request. */
export interface ModelRequest {
  messages: WireMessage[];
  tools?: WireTool[];
  /** Extra request-body fields carrying a decoding constraint. */
  constraint?: Record<string, unknown>;
}

export interface ModelResponse {
  text: string;
  /** Structured calls, when the endpoint parsed them itself. */
  nativeToolCalls?: WireToolCall[];
  usage?: TokenUsage;
  finishReason?: string;
}

export interface CompleteOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Inference endpoint collaborator.
 * Implementations reject with a `TransportError` on network/protocol failure.
 */
export interface ModelClient {
  readonly id: string;
  /** Whether `request.constraint` is forwarded to the endpoint. */
  readonly acceptsConstraints: boolean;
  complete(request: ModelRequest, options?: CompleteOptions): Promise<ModelResponse>;
}
