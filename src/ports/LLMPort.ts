export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  /** Receives partial text in arrival order when the adapter streams. */
  onText?: (fragment: string) => void;
}

export interface LLMResponse {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMPort {
  generateText(request: LLMRequest): Promise<LLMResponse>;
}
