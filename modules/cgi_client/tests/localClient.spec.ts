import { CgiError, invocationError, isCgiError } from '../src/cgiErrors.js';
import { LocalCgiClient, buildEnvironment } from '../src/localClient.js';
import type { Logger, LogRecord } from '../src/logger.js';
import { getMetricsSnapshot, resetMetrics } from '../src/metrics.js';
import type { ProcessResult, ProcessRunner, ProcessRunOptions } from '../src/processRunner.js';

type StubOutcome = Partial<ProcessResult> | Error;

class StubProcessRunner implements ProcessRunner {
  public readonly calls: Array<{ command: string; args: string[]; options: ProcessRunOptions }> = [];
  private readonly outcomes: StubOutcome[];

  constructor(...outcomes: StubOutcome[]) {
    this.outcomes = outcomes;
  }

  async run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessResult> {
    this.calls.push({ command, args, options });
    const outcome = this.outcomes.shift() ?? echoOutcome(options);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return {
      exitCode: 0,
      signal: null,
      stdout: Buffer.alloc(0),
      stderr: Buffer.alloc(0),
      ...outcome
    };
  }

  get lastCall(): { command: string; args: string[]; options: ProcessRunOptions } {
    const call = this.calls[this.calls.length - 1];
    if (!call) {
      throw new Error('runner was not called');
    }
    return call;
  }
}

class RecordingLogger implements Logger {
  public readonly records: LogRecord[] = [];
  debug = (record: LogRecord): void => {
    this.records.push(record);
  };
  info = (record: LogRecord): void => {
    this.records.push(record);
  };
  warn = (record: LogRecord): void => {
    this.records.push(record);
  };
  error = (record: LogRecord): void => {
    this.records.push(record);
  };
}

function echoOutcome(options: ProcessRunOptions): Partial<ProcessResult> {
  const content = JSON.stringify({
    stdin: Buffer.from(options.input ?? new Uint8Array()).toString('utf-8'),
    env: options.env
  });
  return { stdout: Buffer.from(`HTTP/1.1 200 OK\nContent-Type: application/json\n\n${content}`) };
}

function response(text: string, extra: Partial<ProcessResult> = {}): Partial<ProcessResult> {
  return { stdout: Buffer.from(text, 'utf-8'), ...extra };
}

async function captureError(promise: Promise<unknown>): Promise<CgiError> {
  try {
    await promise;
  } catch (error) {
    if (isCgiError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the call to fail');
}

function createClient(target: string, runner: ProcessRunner, environment?: Record<string, string>) {
  return new LocalCgiClient(target, { runner, logger: new RecordingLogger() }, { environment });
}

describe('LocalCgiClient', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('passes the query string to the program on GET', async () => {
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner);

    await client.get({ param: 123 });

    expect(runner.lastCall.command).toBe('/path/to/script');
    expect(runner.lastCall.args).toEqual([]);
    expect(runner.lastCall.options.env).toEqual({ REQUEST_METHOD: 'GET', QUERY_STRING: 'param=123' });
    expect(client.status).toBe(200);
    expect(client.headers.get('Content-Type')).toBe('application/json');
    const content = JSON.parse(client.content.toString('utf-8'));
    expect(content.env.QUERY_STRING).toBe('param=123');
    expect(content.stdin).toBe('');
  });

  it('encodes repeated query keys', async () => {
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner);

    await client.get({ tag: ['a', 'b'], q: 'x y' });

    expect(runner.lastCall.options.env.QUERY_STRING).toBe('tag=a&tag=b&q=x+y');
  });

  it('sends an empty query string when GET has no parameters', async () => {
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner);

    await client.get();

    expect(runner.lastCall.options.env).toEqual({ REQUEST_METHOD: 'GET', QUERY_STRING: '' });
  });

  it('form-encodes mapping data on POST', async () => {
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner);

    await client.post({ param: 123 });

    expect(runner.lastCall.options.env).toEqual({
      REQUEST_METHOD: 'POST',
      CONTENT_LENGTH: '9',
      CONTENT_TYPE: 'application/x-www-form-urlencoded'
    });
    expect(JSON.parse(client.content.toString('utf-8')).stdin).toBe('param=123');
  });

  it('posts text as the literal body under text/plain by default', async () => {
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner);

    await client.post('content');

    expect(runner.lastCall.options.env.CONTENT_TYPE).toBe('text/plain');
    expect(runner.lastCall.options.env.CONTENT_LENGTH).toBe('7');
    expect(client.headers.get('content-type')).toBe('application/json');
    expect(JSON.parse(client.content.toString('utf-8')).stdin).toBe('content');
  });

  it('measures CONTENT_LENGTH in bytes', async () => {
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner);

    await client.post('héllo', 'text/markdown');

    expect(runner.lastCall.options.env.CONTENT_LENGTH).toBe('6');
    expect(runner.lastCall.options.env.CONTENT_TYPE).toBe('text/markdown');
  });

  it('splits the target into a program and arguments', async () => {
    const runner = new StubProcessRunner();
    const client = createClient(`/usr/bin/env "my script.py" --flag='a b'`, runner);

    await client.get();

    expect(runner.lastCall.command).toBe('/usr/bin/env');
    expect(runner.lastCall.args).toEqual(['my script.py', '--flag=a b']);
  });

  it('adds configured variables without letting them override CGI variables', async () => {
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner, { PATH: '/usr/bin', REQUEST_METHOD: 'DELETE' });

    await client.get({ a: 1 });

    expect(runner.lastCall.options.env).toEqual({
      PATH: '/usr/bin',
      REQUEST_METHOD: 'GET',
      QUERY_STRING: 'a=1'
    });
    expect(client.environment).toEqual(runner.lastCall.options.env);
  });

  it('never passes the caller environment to the program', async () => {
    process.env.CGI_CLIENT_SPEC_MARKER = 'leak';
    const runner = new StubProcessRunner();
    const client = createClient('/path/to/script', runner);

    try {
      await client.post('x');
    } finally {
      delete process.env.CGI_CLIENT_SPEC_MARKER;
    }

    expect(Object.keys(runner.lastCall.options.env).sort()).toEqual([
      'CONTENT_LENGTH',
      'CONTENT_TYPE',
      'REQUEST_METHOD'
    ]);
  });

  it('decodes repeated Set-Cookie headers into a list', async () => {
    const runner = new StubProcessRunner(
      response('HTTP/1.1 200 OK\nSet-Cookie: name=cookie1\nSet-Cookie: name=cookie2\n\n')
    );
    const client = createClient('/path/to/script', runner);

    const result = await client.get();

    expect(client.headers.get('set-cookie')).toEqual(['name=cookie1', 'name=cookie2']);
    expect(result.headers.toRecord()).toEqual({ 'set-cookie': ['name=cookie1', 'name=cookie2'] });
  });

  it('keeps content after the blank line verbatim', async () => {
    const runner = new StubProcessRunner(response('Content-Type: text/plain\n\nline one\n\nline two\n'));
    const client = createClient('/path/to/script', runner);

    await client.get();

    expect(client.status).toBeUndefined();
    expect(client.content.toString('utf-8')).toBe('line one\n\nline two\n');
  });

  it('captures stderr on success', async () => {
    const runner = new StubProcessRunner(response('HTTP/1.1 200 OK\n\n', { stderr: Buffer.from('warning: slow\n') }));
    const client = createClient('/path/to/script', runner);

    const result = await client.get();

    expect(client.stderr).toBe('warning: slow\n');
    expect(result.stderr).toBe('warning: slow\n');
    expect(client.exitCode).toBe(0);
  });

  it('replaces the previous result on every call', async () => {
    const runner = new StubProcessRunner(
      response('HTTP/1.1 201 Created\nSet-Cookie: a=1\nSet-Cookie: b=2\n\nfirst'),
      response('X-Only: second\n\nsecond')
    );
    const client = createClient('/path/to/script', runner);

    await client.post({ a: 1 });
    await client.get();

    expect(client.status).toBeUndefined();
    expect(client.headers.toRecord()).toEqual({ 'x-only': 'second' });
    expect(client.content.toString('utf-8')).toBe('second');
    expect(client.environment).toEqual({ REQUEST_METHOD: 'GET', QUERY_STRING: '' });
  });

  it('raises an exit status error but keeps the decoded output', async () => {
    const runner = new StubProcessRunner(
      response('HTTP/1.1 500 Internal Server Error\nContent-Type: text/plain\n\noops', {
        exitCode: 2,
        stderr: Buffer.from('boom')
      })
    );
    const client = createClient('/path/to/script', runner);

    const error = await captureError(client.get());

    expect(error.classification).toBe('EXIT_STATUS');
    expect(error.exitCode).toBe(2);
    expect(error.stderr).toBe('boom');
    expect(error.message).toBe('/path/to/script exited with status 2');
    expect(error.cause).toBeUndefined();
    expect(client.status).toBe(500);
    expect(client.content.toString('utf-8')).toBe('oops');
    expect(client.stderr).toBe('boom');
  });

  it('reports termination by signal as an exit status error', async () => {
    const runner = new StubProcessRunner({ exitCode: null, signal: 'SIGKILL' });
    const client = createClient('/path/to/script', runner);

    const error = await captureError(client.get());

    expect(error.classification).toBe('EXIT_STATUS');
    expect(error.exitCode).toBeNull();
    expect(error.signal).toBe('SIGKILL');
    expect(error.message).toBe('/path/to/script was terminated by SIGKILL');
  });

  it('attaches the decode failure when a failing program prints garbage', async () => {
    const runner = new StubProcessRunner(response('garbage\n', { exitCode: 1, stderr: Buffer.from('trace') }));
    const client = createClient('/path/to/script', runner);

    const error = await captureError(client.get());

    expect(error.classification).toBe('EXIT_STATUS');
    expect(error.cause).toBeInstanceOf(CgiError);
    expect(error.cause).toMatchObject({ classification: 'DECODE' });
    expect(client.headers.size).toBe(0);
    expect(client.content.length).toBe(0);
    expect(client.stderr).toBe('trace');
  });

  it('raises a decode error and leaves no partial result', async () => {
    const runner = new StubProcessRunner(
      response('HTTP/1.1 200 OK\n\nfirst'),
      response('HTTP/1.1 200 OK\nContent-Type: text/plain\nbroken header\n\nbody')
    );
    const client = createClient('/path/to/script', runner);
    await client.get();

    const error = await captureError(client.get());

    expect(error.classification).toBe('DECODE');
    expect(error.message).toContain('broken header');
    expect(client.status).toBeUndefined();
    expect(client.headers.size).toBe(0);
    expect(client.content.length).toBe(0);
  });

  it('passes invocation errors from the runner through', async () => {
    const failure = invocationError('Failed to start /path/to/script: spawn ENOENT');
    const runner = new StubProcessRunner(failure);
    const client = createClient('/path/to/script', runner);

    await expect(client.get()).rejects.toBe(failure);
    expect(client.exitCode).toBeUndefined();
  });

  it('wraps unexpected runner failures as invocation errors', async () => {
    const cause = new Error('spawn EACCES');
    const runner = new StubProcessRunner(cause);
    const client = createClient('/path/to/script', runner);

    const error = await captureError(client.post('x'));

    expect(error.classification).toBe('INVOCATION');
    expect(error.message).toBe('Failed to run /path/to/script');
    expect(error.cause).toBe(cause);
  });

  it('rejects an empty or malformed target at construction', () => {
    const runner = new StubProcessRunner();

    expect(() => createClient('   ', runner)).toThrow('Local CGI target is an empty command line');
    expect(() => createClient(`script "unterminated`, runner)).toThrow(CgiError);
  });

  it('logs and counts completed and failed calls', async () => {
    const logger = new RecordingLogger();
    const runner = new StubProcessRunner(response('HTTP/1.1 200 OK\n\n'), response('bad\n\n'));
    const client = new LocalCgiClient('/path/to/script', { runner, logger });

    await client.get();
    await captureError(client.post('x'));

    const completed = logger.records.find((record) => record.message === 'CGI call completed');
    expect(completed?.level).toBe('info');
    expect(completed?.metadata).toMatchObject({ backend: 'local', method: 'GET', status: 200 });
    const failed = logger.records.find((record) => record.message === 'CGI call failed');
    expect(failed?.level).toBe('warn');
    expect(failed?.metadata).toMatchObject({ backend: 'local', method: 'POST', classification: 'DECODE' });

    const metrics = getMetricsSnapshot();
    expect(metrics.calls.GET).toEqual({ total: 1, success: 1, error: 0 });
    expect(metrics.calls.POST).toEqual({ total: 1, success: 0, error: 1 });
    expect(metrics.backends.local).toEqual({ total: 2, success: 1, error: 1 });
    expect(metrics.classifications.POST).toEqual({ DECODE: 1 });
  });
});

describe('buildEnvironment', () => {
  it('includes QUERY_STRING on POST only when one is given', () => {
    expect(
      buildEnvironment({ method: 'POST', queryString: 'id=7', body: Buffer.from('abc'), contentType: 'text/csv' })
    ).toEqual({
      REQUEST_METHOD: 'POST',
      QUERY_STRING: 'id=7',
      CONTENT_LENGTH: '3',
      CONTENT_TYPE: 'text/csv'
    });
    expect(buildEnvironment({ method: 'POST' })).toEqual({
      REQUEST_METHOD: 'POST',
      CONTENT_LENGTH: '0',
      CONTENT_TYPE: 'text/plain'
    });
  });
});
