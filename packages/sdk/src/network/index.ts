/**
 * Network module - HTTP transport used by the command runner
 * @module network
 */

import type { HttpMethod } from '../command/index.js';

/**
 * Fully prepared HTTP request
 */
export interface WebRequest {
  target: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Raw HTTP response; `body` is null when the server sent none
 */
export interface WebResponse {
  status: number;
  body: string | null;
}

/**
 * Progress of a transfer, `amount` between 0 and 1
 */
export interface DataTransferProgress {
  amount: number;
}

export type ProgressSink = (progress: DataTransferProgress) => void;

/**
 * Per-call transport options
 */
export interface WebRequestOptions {
  uploadProgress?: ProgressSink;
  downloadProgress?: ProgressSink;
  signal?: AbortSignal;
}

/**
 * Transport capability: performs one HTTP exchange.
 * Rejects only for transport-level failures (connection refused, DNS,
 * timeouts, abort); any HTTP status is a resolved response.
 */
export interface WebClient {
  execute(request: WebRequest, options?: WebRequestOptions): Promise<WebResponse>;
}

/**
 * Configuration for the fetch transport
 */
export interface FetchWebClientConfig {
  /** Abort requests that take longer than this many milliseconds; 0 disables */
  timeout?: number;
  fetch?: typeof fetch;
}

/**
 * Transport over the global `fetch`
 */
export class FetchWebClient implements WebClient {
  private config: Required<FetchWebClientConfig>;

  private defaultConfig: Required<FetchWebClientConfig> = {
    timeout: 30000,
    fetch: (input, init) => fetch(input, init),
  };

  constructor(config: FetchWebClientConfig = {}) {
    this.config = { ...this.defaultConfig, ...config };
  }

  async execute(request: WebRequest, options: WebRequestOptions = {}): Promise<WebResponse> {
    const signals: AbortSignal[] = [];
    if (options.signal) {
      signals.push(options.signal);
    }
    if (this.config.timeout > 0) {
      signals.push(AbortSignal.timeout(this.config.timeout));
    }

    const { signal, release } = linkSignals(signals);
    options.uploadProgress?.({ amount: 0 });

    try {
      const response = await this.config.fetch(request.target, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal,
      });

      options.uploadProgress?.({ amount: 1 });

      const body = options.downloadProgress
        ? await readWithProgress(response, options.downloadProgress)
        : await response.text();

      return {
        status: response.status,
        body: body.length > 0 ? body : null,
      };
    } finally {
      release();
    }
  }
}

interface LinkedSignal {
  signal?: AbortSignal;
  /** Detach the listeners placed on the source signals */
  release: () => void;
}

function linkSignals(signals: AbortSignal[]): LinkedSignal {
  if (signals.length <= 1) {
    return { signal: signals[0], release: () => undefined };
  }

  const controller = new AbortController();
  const listeners: Array<[AbortSignal, () => void]> = [];
  const release = () => {
    for (const [signal, listener] of listeners) {
      signal.removeEventListener('abort', listener);
    }
    listeners.length = 0;
  };

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const listener = () => {
      controller.abort(signal.reason);
      release();
    };
    signal.addEventListener('abort', listener, { once: true });
    listeners.push([signal, listener]);
  }

  if (controller.signal.aborted) {
    release();
  }
  return { signal: controller.signal, release };
}

/**
 * Read the body chunk by chunk, reporting progress against Content-Length
 */
async function readWithProgress(response: Response, sink: ProgressSink): Promise<string> {
  const total = Number(response.headers.get('Content-Length') ?? 0);
  const reader = response.body?.getReader();

  if (!reader) {
    sink({ amount: 1 });
    return '';
  }

  const decoder = new TextDecoder();
  let received = 0;
  let text = '';

  sink({ amount: 0 });

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    received += value.byteLength;
    text += decoder.decode(value, { stream: true });
    if (total > 0) {
      sink({ amount: Math.min(received / total, 1) });
    }
  }

  text += decoder.decode();
  sink({ amount: 1 });
  return text;
}
