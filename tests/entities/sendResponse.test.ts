// tests/entities/sendResponse.test.ts
import { beginChunkedResponse, formatHead, sendResponse } from '../../src/entities/sendResponse';
import logger from '../../src/utils/logger';
import { FakeSocket, flush } from '../helpers/fakeSocket';

jest.mock('../../src/utils/logger');

describe('formatHead', () => {
  test('writes the status line and headers in insertion order', () => {
    expect(formatHead(201, { 'Content-Type': 'text/plain', 'X-One': '1' })).toBe(
      'HTTP/1.1 201 Created\r\nContent-Type: text/plain\r\nX-One: 1\r\n\r\n',
    );
  });

  test('handles an empty header block and unknown status codes', () => {
    expect(formatHead(204, {})).toBe('HTTP/1.1 204 No Content\r\n\r\n');
    expect(formatHead(499, {})).toBe('HTTP/1.1 499 Status\r\n\r\n');
  });
});

describe('sendResponse', () => {
  let socket: FakeSocket;

  beforeEach(() => {
    jest.clearAllMocks();
    socket = new FakeSocket();
  });

  test('writes headers only if no body', async () => {
    sendResponse(socket, 200, { 'Content-Type': 'text/plain' });
    await flush();
    expect(socket.written).toBe('HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 0\r\n\r\n');
    expect(socket.ended).toBe(false);
  });

  test('writes headers and string body', async () => {
    sendResponse(socket, 200, { 'Content-Type': 'text/plain' }, 'Hello');
    await flush();
    expect(socket.written).toBe('HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 5\r\n\r\nHello');
  });

  test('counts bytes, not characters, for Content-Length', async () => {
    sendResponse(socket, 200, { 'Content-Type': 'text/plain; charset=utf-8' }, 'héllo');
    await flush();
    expect(socket.written).toContain('Content-Length: 6\r\n');
  });

  test('keeps a caller-supplied Content-Length', async () => {
    sendResponse(socket, 200, { 'Content-Type': 'text/plain', 'content-length': '5' }, 'Hello');
    await flush();
    expect(socket.written).toBe('HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\ncontent-length: 5\r\n\r\nHello');
  });

  test('defaults the content type of a body and warns', async () => {
    const binaryData = Buffer.from([0x01, 0x02, 0x03, 0x04]);
    sendResponse(socket, 200, {}, binaryData);
    await flush();
    expect(Buffer.concat(socket.chunks).subarray(-4)).toEqual(binaryData);
    expect(socket.written).toContain('Content-Length: 4\r\nContent-Type: application/octet-stream\r\n\r\n');
    expect(logger.warn).toHaveBeenCalledWith(
      '[sendResponse] Content-Type not set, defaulting to application/octet-stream',
      { status: 200 },
    );
  });

  test('returns early if socket is destroyed', () => {
    socket.destroy();
    sendResponse(socket, 200, { 'Content-Type': 'text/plain' }, 'Should not write');
    expect(socket.chunks).toEqual([]);
    expect(logger.debug).toHaveBeenCalledWith('[sendResponse] Attempted to write to destroyed socket', {
      status: 200,
    });
  });

  test('closes the connection after the body when Connection: close is set', async () => {
    sendResponse(socket, 200, { Connection: 'close', 'Content-Type': 'text/plain' }, 'Close Me');
    await flush();
    expect(socket.written.endsWith('\r\n\r\nClose Me')).toBe(true);
    expect(socket.ended).toBe(true);
  });

  test('closes a bodiless response with Connection: close', async () => {
    sendResponse(socket, 408, { Connection: 'close' });
    await flush();
    expect(socket.ended).toBe(true);
  });
});

describe('beginChunkedResponse', () => {
  let socket: FakeSocket;

  beforeEach(() => {
    jest.clearAllMocks();
    socket = new FakeSocket();
  });

  test('frames each chunk and the terminator', async () => {
    const response = beginChunkedResponse(socket, {
      status: 200,
      headers: { 'Content-Type': 'text/plain' },
    });
    expect(response.sendChunk('Hello')).toBe(true);
    expect(response.sendChunk('')).toBe(true);
    response.sendChunk(Buffer.from(' World'));
    response.endResponse();
    await flush();

    expect(socket.written).toBe(
      'HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nTransfer-Encoding: chunked\r\n\r\n' +
        '5\r\nHello\r\n6\r\n World\r\n0\r\n\r\n',
    );
    expect(socket.ended).toBe(false);
  });

  test('ends the socket when Connection: close is set', async () => {
    const { endResponse } = beginChunkedResponse(socket, { status: 200, headers: { Connection: 'close' } });
    endResponse();
    await flush();
    expect(socket.written.endsWith('0\r\n\r\n')).toBe(true);
    expect(socket.ended).toBe(true);
  });

  test('returns no-op functions if socket is destroyed initially', () => {
    socket.destroy();
    const { sendChunk, endResponse } = beginChunkedResponse(socket, { status: 200, headers: {} });
    expect(sendChunk('data')).toBe(false);
    expect(() => endResponse()).not.toThrow();
    expect(socket.chunks).toEqual([]);
  });

  test('stops writing once the socket is destroyed', async () => {
    const { sendChunk, endResponse } = beginChunkedResponse(socket, { status: 200, headers: {} });
    await flush();
    const written = socket.written;
    socket.destroy();

    expect(sendChunk('late')).toBe(false);
    endResponse();
    expect(socket.written).toBe(written);
    expect(logger.warn).toHaveBeenCalledWith(
      '[beginChunkedResponse] Attempted to end response on destroyed socket',
    );
  });
});
