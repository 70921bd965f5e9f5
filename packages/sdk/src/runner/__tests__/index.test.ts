/**
 * Command runner unit tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command, HeaderName } from '../../command/index.js';
import type { ConnectionConfig, RetryConfig } from '../../config/index.js';
import { ErrorCode, ObjectStoreError, OperationCancelledError } from '../../errors/index.js';
import { createLogger } from '../../logger/index.js';
import type { WebRequest, WebRequestOptions, WebResponse } from '../../network/index.js';
import { CLIENT_VERSION } from '../../version.js';
import {
  CommandRunner,
  CommandState,
  interpretResponse,
  type CommandTransition,
  type SessionProvider,
} from '../index.js';

const INSTALLATION_ID = '7f0c7c0e-8b1a-4d4e-9a52-1f2b3c4d5e6f';

const connection: ConnectionConfig = {
  serverUrl: 'http://localhost:1337/',
  applicationId: 'test-app',
  clientKey: 'test-client-key',
  masterKey: 'test-secret',
};

const ok = (body: string | null, status = 200): WebResponse => ({ status, body });

// Mock transport replaying queued responses; an Error entry is thrown
const createWebClient = (...responses: Array<WebResponse | Error>) => {
  const queue = [...responses];
  const execute = vi.fn(
    async (_request: WebRequest, _options?: WebRequestOptions): Promise<WebResponse> => {
      const next = queue.shift();
      if (next === undefined) {
        throw new Error('unexpected request');
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    }
  );
  return { execute };
};

const createRunner = (
  webClient: ReturnType<typeof createWebClient>,
  options: { retry?: RetryConfig; connection?: Partial<ConnectionConfig>; session?: SessionProvider } = {}
) =>
  new CommandRunner({
    webClient,
    installation: { get: vi.fn(async () => INSTALLATION_ID) },
    connection: { ...connection, ...options.connection },
    session: options.session,
    retry: { retryDelay: 0, ...options.retry },
    logger: createLogger({ level: 'silent' }),
  });

const requestAt = (webClient: ReturnType<typeof createWebClient>, index: number): WebRequest => {
  const request = webClient.execute.mock.calls[index]?.[0];
  if (!request) {
    throw new Error(`no request #${index}`);
  }
  return request;
};

const getCommand = new Command({ endpoint: 'classes/Todo/abc', method: 'GET' });

const rejection = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
};

const expectStoreError = async (
  promise: Promise<unknown>,
  code: ErrorCode
): Promise<ObjectStoreError> => {
  const error = await rejection(promise);
  expect(error).toBeInstanceOf(ObjectStoreError);
  if (!(error instanceof ObjectStoreError)) {
    throw error;
  }
  expect(error.code).toBe(code);
  return error;
};

describe('interpretResponse', () => {
  it('should normalize successful bodies to a mapping', () => {
    expect(interpretResponse(ok('{"objectId":"abc"}', 201))).toEqual({
      outcome: 'success',
      result: { statusCode: 201, data: { objectId: 'abc' } },
    });
    expect(interpretResponse(ok('[1,2]'))).toEqual({
      outcome: 'success',
      result: { statusCode: 200, data: { results: [1, 2] } },
    });
    expect(interpretResponse(ok(null, 204))).toEqual({
      outcome: 'success',
      result: { statusCode: 204, data: {} },
    });
    expect(interpretResponse(ok('  '))).toEqual({
      outcome: 'success',
      result: { statusCode: 200, data: {} },
    });
  });
});

describe('CommandRunner', () => {
  describe('success', () => {
    it('should return the decoded object', async () => {
      const webClient = createWebClient(ok('{"objectId":"abc","title":"write tests"}'));
      const runner = createRunner(webClient);

      const result = await runner.run(getCommand);

      expect(result).toEqual({ statusCode: 200, data: { objectId: 'abc', title: 'write tests' } });
      expect(webClient.execute).toHaveBeenCalledTimes(1);
    });

    it('should wrap array bodies in results', async () => {
      const runner = createRunner(createWebClient(ok('[{"a":1},{"a":2}]')));

      const result = await runner.run(getCommand);

      expect(result.data).toEqual({ results: [{ a: 1 }, { a: 2 }] });
    });

    it('should return an empty mapping for empty bodies', async () => {
      const runner = createRunner(createWebClient(ok(null)));

      await expect(runner.run(getCommand)).resolves.toEqual({ statusCode: 200, data: {} });
    });

    it('should fail without retrying on malformed bodies', async () => {
      for (const body of ['42', '"text"', '<html>oops</html>']) {
        const webClient = createWebClient(ok(body), ok('{}'));
        const runner = createRunner(webClient);

        const error = await expectStoreError(runner.run(getCommand), ErrorCode.OtherCause);

        expect(error.message).toMatch(/^Malformed response/);
        expect(webClient.execute).toHaveBeenCalledTimes(1);
      }
    });
  });

  describe('request preparation', () => {
    it('should attach identity headers', async () => {
      const webClient = createWebClient(ok('{}'));
      const runner = createRunner(webClient);

      await runner.run(getCommand);

      const request = requestAt(webClient, 0);
      expect(request.target).toBe('http://localhost:1337/1/classes/Todo/abc');
      expect(request.method).toBe('GET');
      expect(request.body).toBeUndefined();
      expect(request.headers[HeaderName.ClientVersion]).toBe(CLIENT_VERSION);
      expect(request.headers[HeaderName.InstallationId]).toBe(INSTALLATION_ID);
      expect(request.headers[HeaderName.ApplicationId]).toBe('test-app');
      expect(request.headers[HeaderName.ClientKey]).toBe('test-client-key');
      expect(request.headers[HeaderName.RequestId]).toMatch(/^[0-9a-f-]{36}$/);
      expect(request.headers[HeaderName.MasterKey]).toBeUndefined();
      expect(request.headers[HeaderName.ContentType]).toBeUndefined();
    });

    it('should serialize bodies as JSON', async () => {
      const webClient = createWebClient(ok('{"objectId":"abc"}', 201));
      const runner = createRunner(webClient);

      await runner.run(
        new Command({ endpoint: 'classes/Todo', method: 'POST', body: { title: 'write tests' } })
      );

      const request = requestAt(webClient, 0);
      expect(request.body).toBe('{"title":"write tests"}');
      expect(request.headers[HeaderName.ContentType]).toBe('application/json');
    });

    it('should send the master key only on request', async () => {
      const webClient = createWebClient(ok('{}'), ok('{}'));
      const runner = createRunner(webClient);

      await runner.run(getCommand, { useMasterKey: true });
      await runner.run(getCommand);

      expect(requestAt(webClient, 0).headers[HeaderName.MasterKey]).toBe('test-secret');
      expect(requestAt(webClient, 1).headers[HeaderName.MasterKey]).toBeUndefined();
    });

    it('should not send a master key that is not configured', async () => {
      const webClient = createWebClient(ok('{}'));
      const runner = createRunner(webClient, { connection: { masterKey: undefined } });

      await runner.run(getCommand, { useMasterKey: true });

      expect(requestAt(webClient, 0).headers[HeaderName.MasterKey]).toBeUndefined();
    });

    it('should attach version and auxiliary headers', async () => {
      const webClient = createWebClient(ok('{}'));
      const runner = createRunner(webClient, {
        connection: {
          auxiliaryHeaders: { 'X-Tenant': 'tenant-1' },
          versionInfo: { buildVersion: '42', displayVersion: '1.2.0', osVersion: 'linux' },
        },
      });

      await runner.run(getCommand);

      const { headers } = requestAt(webClient, 0);
      expect(headers['X-Tenant']).toBe('tenant-1');
      expect(headers[HeaderName.AppBuildVersion]).toBe('42');
      expect(headers[HeaderName.AppDisplayVersion]).toBe('1.2.0');
      expect(headers[HeaderName.OSVersion]).toBe('linux');
    });

    it('should use the session context when the command has no token', async () => {
      const session: SessionProvider = { getSessionToken: vi.fn(async () => 'r:context-session') };
      const webClient = createWebClient(ok('{}'), ok('{}'));
      const runner = createRunner(webClient, { session });

      await runner.run(getCommand);
      await runner.run(
        new Command({ endpoint: 'users/me', method: 'GET', sessionToken: 'r:explicit-session' })
      );

      expect(requestAt(webClient, 0).headers[HeaderName.SessionToken]).toBe('r:context-session');
      expect(requestAt(webClient, 1).headers[HeaderName.SessionToken]).toBe('r:explicit-session');
      expect(session.getSessionToken).toHaveBeenCalledTimes(1);
    });

    it('should forward progress sinks to the transport', async () => {
      const webClient = createWebClient(ok('{}'));
      const runner = createRunner(webClient);
      const uploadProgress = vi.fn();
      const downloadProgress = vi.fn();

      await runner.run(getCommand, { uploadProgress, downloadProgress });

      const options = webClient.execute.mock.calls[0]?.[1];
      expect(options?.uploadProgress).toBe(uploadProgress);
      expect(options?.downloadProgress).toBe(downloadProgress);
    });
  });

  describe('client errors', () => {
    it('should decode structured errors without retrying', async () => {
      const webClient = createWebClient(ok('{"code":101,"error":"Object not found."}', 404));
      const runner = createRunner(webClient);

      const error = await expectStoreError(runner.run(getCommand), ErrorCode.ObjectNotFound);

      expect(error.message).toBe('Object not found.');
      expect(error.status).toBe(404);
      expect(error.serverCode).toBe(101);
      expect(webClient.execute).toHaveBeenCalledTimes(1);
    });

    it('should keep unknown server codes', async () => {
      const runner = createRunner(createWebClient(ok('{"code":999,"error":"Mystery."}', 400)));

      const error = await expectStoreError(runner.run(getCommand), ErrorCode.OtherCause);

      expect(error.message).toBe('Mystery.');
      expect(error.serverCode).toBe(999);
    });

    it('should report undecodable error bodies with the status', async () => {
      const runner = createRunner(createWebClient(ok('Forbidden', 403)));

      const error = await expectStoreError(runner.run(getCommand), ErrorCode.OtherCause);

      expect(error.status).toBe(403);
      expect(error.serverCode).toBeUndefined();
      expect(error.message).toBe('Request failed with status 403: Forbidden');
    });
  });

  describe('retries', () => {
    it('should retry server errors and keep the request id', async () => {
      const webClient = createWebClient(ok(null, 500), ok('{"code":1,"error":"busy"}', 503), ok('{"done":true}'));
      const runner = createRunner(webClient);

      const result = await runner.run(getCommand);

      expect(result.data).toEqual({ done: true });
      expect(webClient.execute).toHaveBeenCalledTimes(3);
      const ids = [0, 1, 2].map((index) => requestAt(webClient, index).headers[HeaderName.RequestId]);
      expect(new Set(ids).size).toBe(1);
    });

    it('should use a new request id per invocation', async () => {
      const webClient = createWebClient(ok('{}'), ok('{}'));
      const runner = createRunner(webClient);

      await runner.run(getCommand);
      await runner.run(getCommand);

      expect(requestAt(webClient, 0).headers[HeaderName.RequestId]).not.toBe(
        requestAt(webClient, 1).headers[HeaderName.RequestId]
      );
    });

    it('should give up after maxRetries as an internal server error', async () => {
      const webClient = createWebClient(
        ok(null, 500),
        ok(null, 500),
        ok('{"code":101,"error":"Object not found."}', 500),
        ok('{}')
      );
      const runner = createRunner(webClient, { retry: { maxRetries: 2 } });

      const error = await expectStoreError(runner.run(getCommand), ErrorCode.InternalServerError);

      expect(error.message).toBe('Object not found.');
      expect(error.serverCode).toBe(101);
      expect(error.status).toBe(500);
      expect(webClient.execute).toHaveBeenCalledTimes(3);
    });

    it('should fall back to InternalServerError for undecodable 5xx bodies', async () => {
      const runner = createRunner(createWebClient(ok('Bad Gateway', 502)), {
        retry: { maxRetries: 0 },
      });

      const error = await expectStoreError(runner.run(getCommand), ErrorCode.InternalServerError);

      expect(error.status).toBe(502);
    });

    it('should retry connection failures', async () => {
      const webClient = createWebClient(new TypeError('fetch failed'), ok('{"ok":true}'));
      const runner = createRunner(webClient);

      await expect(runner.run(getCommand)).resolves.toEqual({ statusCode: 200, data: { ok: true } });
      expect(webClient.execute).toHaveBeenCalledTimes(2);
    });

    it('should report exhausted connection failures as ConnectionFailed', async () => {
      const failure = new TypeError('fetch failed');
      const webClient = createWebClient(failure, failure);
      const runner = createRunner(webClient, { retry: { maxRetries: 1 } });

      const error = await expectStoreError(runner.run(getCommand), ErrorCode.ConnectionFailed);

      expect(error.cause).toBe(failure);
      expect(error.message).toBe('Connection failed: fetch failed');
    });

    it('should not retry at all with maxRetries 0', async () => {
      const webClient = createWebClient(new TypeError('fetch failed'), ok('{}'));
      const runner = createRunner(webClient, { retry: { maxRetries: 0 } });

      await expectStoreError(runner.run(getCommand), ErrorCode.ConnectionFailed);
      expect(webClient.execute).toHaveBeenCalledTimes(1);
    });

    it('should propagate installation failures without retrying', async () => {
      const webClient = createWebClient(ok('{}'));
      const failure = new Error('storage unavailable');
      const runner = new CommandRunner({
        webClient,
        installation: { get: vi.fn().mockRejectedValue(failure) },
        connection,
        retry: { retryDelay: 0 },
        logger: createLogger({ level: 'silent' }),
      });

      await expect(runner.run(getCommand)).rejects.toBe(failure);
      expect(webClient.execute).not.toHaveBeenCalled();
    });
  });

  describe('backoff', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should grow delays exponentially up to the cap', () => {
      const runner = createRunner(createWebClient(), {
        retry: { retryDelay: 1000, retryBackoffMultiplier: 2, maxRetryDelay: 10000 },
      });

      expect([0, 1, 2, 3, 4].map((attempt) => runner.calculateRetryDelay(attempt))).toEqual([
        1000, 2000, 4000, 8000, 10000,
      ]);
    });

    it('should wait between attempts', async () => {
      const webClient = createWebClient(ok(null, 500), ok(null, 500), ok('{}'));
      const runner = createRunner(webClient, { retry: { retryDelay: 1000 } });

      const result = runner.run(getCommand);

      await vi.advanceTimersByTimeAsync(999);
      expect(webClient.execute).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(webClient.execute).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1999);
      expect(webClient.execute).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1);
      expect(webClient.execute).toHaveBeenCalledTimes(3);

      await expect(result).resolves.toEqual({ statusCode: 200, data: {} });
    });
  });

  describe('cancellation', () => {
    it('should not dispatch when already aborted', async () => {
      const webClient = createWebClient(ok('{}'));
      const runner = createRunner(webClient);
      const controller = new AbortController();
      controller.abort();

      const error = await rejection(runner.run(getCommand, { signal: controller.signal }));

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error).not.toBeInstanceOf(ObjectStoreError);
      expect(webClient.execute).not.toHaveBeenCalled();
    });

    it('should pass the signal to the transport', async () => {
      const webClient = createWebClient(ok('{}'));
      const runner = createRunner(webClient);
      const controller = new AbortController();

      await runner.run(getCommand, { signal: controller.signal });

      expect(webClient.execute.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
    });

    it('should settle as cancelled when aborted mid-request', async () => {
      const controller = new AbortController();
      const webClient = createWebClient();
      webClient.execute.mockImplementationOnce(async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      });
      const runner = createRunner(webClient);

      const error = await rejection(runner.run(getCommand, { signal: controller.signal }));

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(webClient.execute).toHaveBeenCalledTimes(1);
    });

    it('should stop waiting for a retry when aborted', async () => {
      const controller = new AbortController();
      const webClient = createWebClient(ok(null, 500), ok('{}'));
      const runner = createRunner(webClient, { retry: { retryDelay: 60000 } });
      const subscription = runner.transitions$.subscribe((transition) => {
        if (transition.state === CommandState.RETRYING) {
          controller.abort();
        }
      });

      const error = await rejection(runner.run(getCommand, { signal: controller.signal }));

      subscription.unsubscribe();
      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(webClient.execute).toHaveBeenCalledTimes(1);
    });
  });

  describe('transitions$', () => {
    it('should publish every state change', async () => {
      const webClient = createWebClient(ok(null, 503), ok('{}'));
      const runner = createRunner(webClient);
      const transitions: CommandTransition[] = [];
      runner.transitions$.subscribe((transition) => transitions.push(transition));

      await runner.run(getCommand);

      expect(transitions.map(({ state, attempt }) => [state, attempt])).toEqual([
        [CommandState.BUILT, 0],
        [CommandState.DISPATCHED, 0],
        [CommandState.RETRYING, 0],
        [CommandState.DISPATCHED, 1],
        [CommandState.SUCCEEDED, 1],
      ]);
      expect(new Set(transitions.map(({ requestId }) => requestId)).size).toBe(1);
      expect(transitions[2]?.error?.status).toBe(503);
      expect(transitions[2]?.delay).toBe(0);
      expect(transitions[0]?.path).toBe('/1/classes/Todo/abc');
    });

    it('should publish the failure', async () => {
      const runner = createRunner(createWebClient(ok('{"code":101,"error":"gone"}', 404)));
      const states: CommandState[] = [];
      runner.transitions$.subscribe(({ state }) => states.push(state));

      await expectStoreError(runner.run(getCommand), ErrorCode.ObjectNotFound);

      expect(states).toEqual([CommandState.BUILT, CommandState.DISPATCHED, CommandState.FAILED]);
    });

    it('should complete on destroy', () => {
      const runner = createRunner(createWebClient());
      const complete = vi.fn();
      runner.transitions$.subscribe({ complete });

      runner.destroy();

      expect(complete).toHaveBeenCalledTimes(1);
    });
  });
});
