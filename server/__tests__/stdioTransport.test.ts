/**
 * Unit Tests: Stdio Transport
 *
 * The subprocess is replaced by an in-process child with stream-backed
 * stdio, so framing, stdin backpressure and shutdown run without spawning.
 */

import { EventEmitter } from 'events';
import { PassThrough, Writable } from 'stream';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createStdioTransportFactory } from '../dataService/stdioTransport';
import type { TransportHandlers } from '../dataService/types';
import { TransportError } from '../utils/errorHandler';

const mockSpawn = vi.hoisted(() => vi.fn());

vi.mock('child_process', () => ({ spawn: mockSpawn }));

class FakeChild extends EventEmitter {
  readonly pid = 4242;
  readonly written: string[] = [];
  private readonly callbacks: Array<(error?: Error | null) => void> = [];

  // Holds every write until flush(), like a reader that stopped consuming
  readonly stdin = new Writable({
    highWaterMark: 16,
    write: (chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) => {
      this.written.push(chunk.toString());
      this.callbacks.push(callback);
    },
  });
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  readonly kill = vi.fn((signal: NodeJS.Signals) => {
    this.emit('exit', null, signal);
    return true;
  });

  async flush(): Promise<void> {
    while (this.callbacks.length > 0) {
      this.callbacks.shift()?.();
      await new Promise(resolve => setImmediate(resolve));
    }
  }
}

function handlers(): TransportHandlers & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    onLine: line => lines.push(line),
    onExit: vi.fn(),
    onError: vi.fn(),
  };
}

const CONFIG = { command: 'research-data-service', args: ['--stdio'], cwd: '/srv/data', env: { PATH: '/usr/bin' } };

describe('stdio transport', () => {
  let child: FakeChild;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    child = new FakeChild();
    mockSpawn.mockReturnValue(child);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('spawns the configured command with piped stdio', () => {
    createStdioTransportFactory(CONFIG)(handlers());

    expect(mockSpawn).toHaveBeenCalledWith('research-data-service', ['--stdio'], {
      cwd: '/srv/data',
      env: { PATH: '/usr/bin' },
      stdio: ['pipe', 'pipe', 'pipe'],
    });
  });

  it('frames requests and responses by line', async () => {
    const sink = handlers();
    const transport = createStdioTransportFactory(CONFIG)(sink);

    transport.send('{"id":1}');
    child.stdout.write('{"id":1,"result":{}}\n{"id":2');
    child.stdout.write(',"result":{}}\n');
    await new Promise(resolve => setImmediate(resolve));

    expect(child.written).toEqual(['{"id":1}\n']);
    expect(sink.lines).toEqual(['{"id":1,"result":{}}', '{"id":2,"result":{}}']);
  });

  it('warns once while stdin is backed up and again after it drains', async () => {
    const transport = createStdioTransportFactory(CONFIG)(handlers());
    const request = `{"method":"${'x'.repeat(20)}"}`;

    transport.send(request);
    transport.send(request);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('[StdioTransport] Process 4242 is not draining stdin, buffering requests');

    await child.flush();
    transport.send(request);

    expect(console.warn).toHaveBeenCalledTimes(2);
    expect(child.written).toEqual([`${request}\n`, `${request}\n`, `${request}\n`]);
  });

  it('reports exit and refuses writes afterwards', () => {
    const sink = handlers();
    const transport = createStdioTransportFactory(CONFIG)(sink);

    child.emit('exit', 1, null);

    expect(sink.onExit).toHaveBeenCalledWith(1, null);
    expect(() => transport.send('{}')).toThrow(TransportError);
  });

  it('kills a process that ignores stdin closing past the grace period', async () => {
    const transport = createStdioTransportFactory({ ...CONFIG, shutdownGraceMs: 10 })(handlers());

    await transport.close();

    expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    expect(console.warn).toHaveBeenCalledWith('[StdioTransport] Process 4242 did not exit within 10ms, killing');
  });
});
