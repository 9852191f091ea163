/**
 * Session Gate Client
 *
 * Talks to a running API server. The session id handed out by the server is
 * kept and sent on every following call.
 */

export interface ClientConfig {
  baseUrl: string;
  sessionId?: string;
}

export interface RateLimitInfo {
  remainingRequests: number | null;
  remainingTokens: number | null;
  retryAfterSeconds: number | null;
}

export interface ChatResult {
  status: number;
  sessionId: string | null;
  body: unknown;
  rateLimit: RateLimitInfo;
}

function headerNumber(headers: Headers, name: string): number | null {
  const value = headers.get(name);
  return value === null ? null : Number(value);
}

export class SessionGateClient {
  private sessionId: string | null;

  constructor(private readonly config: ClientConfig) {
    this.sessionId = config.sessionId ?? null;
  }

  get currentSessionId(): string | null {
    return this.sessionId;
  }

  async chat(prompt: string, tokens: number): Promise<ChatResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.sessionId) {
      headers['X-Session-Id'] = this.sessionId;
    }

    const response = await fetch(new URL('/api/chat', this.config.baseUrl), {
      method: 'POST',
      headers,
      body: JSON.stringify({ prompt, tokens }),
    });

    const sessionId = response.headers.get('X-Session-Id');
    if (sessionId) {
      this.sessionId = sessionId;
    }

    const contentType = response.headers.get('content-type') ?? '';
    const body: unknown = contentType.includes('json') ? await response.json() : await response.text();

    return {
      status: response.status,
      sessionId: this.sessionId,
      body,
      rateLimit: {
        remainingRequests: headerNumber(response.headers, 'X-RateLimit-Remaining-Requests'),
        remainingTokens: headerNumber(response.headers, 'X-RateLimit-Remaining-Tokens'),
        retryAfterSeconds: headerNumber(response.headers, 'Retry-After'),
      },
    };
  }
}
