/**
 * Simulated downstream model.
 *
 * Stands in for a completion endpoint. It is only reached after admission,
 * with the token count already charged to the session.
 */

export interface CompletionRequest {
  prompt: string;
  tokens: number;
}

export interface CompletionResult {
  response: string;
  tokens: number;
}

export interface ModelClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export class SimulatedModel implements ModelClient {
  constructor(private readonly latencyMs = 0) {}

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }
    return {
      response: `[model] ${request.prompt}`,
      tokens: request.tokens,
    };
  }
}
