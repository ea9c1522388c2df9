import { TransportError } from './errors';
import type { TransportChannelPort, TransportStream } from './types';

export type SseTransportOptions = Readonly<{
  fetchImpl?: typeof fetch;
  /** Path appended to the endpoint for outbound messages. */
  sendPath?: string;
}>;

const normalizeBaseUrl = (baseUrl: string): string =>
  baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

/**
 * Splits complete events off the front of `buffer`. Returns the `data`
 * payloads and the unconsumed remainder.
 */
export const parseSseChunk = (
  buffer: string
): Readonly<{ messages: string[]; rest: string }> => {
  const normalized = buffer.replace(/\r\n?/g, '\n');
  const blocks = normalized.split('\n\n');
  const rest = blocks.pop() ?? '';
  const messages: string[] = [];
  for (const block of blocks) {
    const data: string[] = [];
    for (const line of block.split('\n')) {
      if (line.startsWith(':')) continue;
      if (line === 'data') {
        data.push('');
      } else if (line.startsWith('data:')) {
        const value = line.slice(5);
        data.push(value.startsWith(' ') ? value.slice(1) : value);
      }
    }
    if (data.length > 0) messages.push(data.join('\n'));
  }
  return { messages, rest };
};

class SseStream implements TransportStream {
  private closed = false;
  private consumed = false;

  constructor(
    private readonly body: ReadableStream<Uint8Array>,
    private readonly abort: AbortController,
    private readonly post: (message: string) => Promise<void>
  ) {}

  send(message: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError('Event stream is closed'));
    }
    return this.post(message);
  }

  messages(): AsyncIterable<string> {
    if (this.consumed) {
      throw new TransportError('Message stream can only be consumed once');
    }
    this.consumed = true;
    return this.iterate();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.abort.abort();
  }

  private async *iterate(): AsyncGenerator<string> {
    const reader = this.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });
        const parsed = parseSseChunk(buffer);
        buffer = parsed.rest;
        for (const message of parsed.messages) {
          yield message;
        }
      }
    } catch (error) {
      if (this.closed) return;
      throw new TransportError('Event stream failed', { cause: error });
    } finally {
      reader.releaseLock();
    }
    if (!this.closed) {
      throw new TransportError('Event stream ended');
    }
  }
}

export class SseTransport implements TransportChannelPort {
  private readonly fetchImpl: typeof fetch;
  private readonly sendPath: string;

  constructor(options: SseTransportOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sendPath = options.sendPath ?? '/messages';
  }

  async open(
    endpoint: string,
    credentials: string | null
  ): Promise<TransportStream> {
    const baseUrl = normalizeBaseUrl(endpoint);
    const authHeaders: Record<string, string> = credentials
      ? { authorization: `Bearer ${credentials}` }
      : {};
    const abort = new AbortController();
    let response: Response;
    try {
      response = await this.fetchImpl(baseUrl, {
        headers: { accept: 'text/event-stream', ...authHeaders },
        signal: abort.signal,
      });
    } catch (error) {
      throw new TransportError(`Cannot connect to ${baseUrl}`, {
        cause: error,
      });
    }
    if (!response.ok || !response.body) {
      abort.abort();
      throw new TransportError(
        `Event stream request failed with status ${response.status}`
      );
    }
    const post = async (message: string): Promise<void> => {
      let result: Response;
      try {
        result = await this.fetchImpl(`${baseUrl}${this.sendPath}`, {
          method: 'POST',
          headers: { 'content-type': 'application/json', ...authHeaders },
          body: message,
        });
      } catch (error) {
        throw new TransportError('Failed to send message', { cause: error });
      }
      if (!result.ok) {
        throw new TransportError(
          `Send failed with status ${result.status}`
        );
      }
    };
    return new SseStream(response.body, abort, post);
  }
}
