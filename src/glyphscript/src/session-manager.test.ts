import { describe, expect, it, vi } from 'vitest';
import { ErrorCode } from './errors.js';
import { render } from './pipeline.js';
import { renderMessage, SessionManager } from './session-manager.js';
import type { ServerMessage } from './types.js';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

/** A connection whose writes stay pending until released. */
function gatedConnection() {
  const sent: ServerMessage[] = [];
  const gates: Array<() => void> = [];
  const send = vi.fn((message: ServerMessage) => {
    sent.push(message);
    return new Promise<void>(resolve => gates.push(resolve));
  });
  const release = (index: number) => {
    const gate = gates[index];
    if (!gate) throw new Error(`no write ${index} to release`);
    gate();
  };
  return { sent, send, release };
}

function outputs(messages: ServerMessage[]): string[] {
  return messages.map(m => (m.type === 'render' ? m.output : m.type));
}

describe('SessionManager', () => {
  it('opens sessions under distinct hex ids and closes them', () => {
    const manager = new SessionManager(1000);
    const a = manager.openSession(() => undefined);
    const b = manager.openSession(() => undefined);
    expect(a).toMatch(/^[0-9a-f]{32}$/);
    expect(a).not.toBe(b);
    expect(manager.getSessionIds()).toEqual([a, b]);
    expect(manager.closeSession(a)).toBe(true);
    expect(manager.closeSession(a)).toBe(false);
    expect(manager.getSessionIds()).toEqual([b]);
  });

  it('rejects unknown sessions', async () => {
    const manager = new SessionManager(1000);
    await expect(manager.submit('missing', 'rect')).rejects.toThrow('Session not found: missing');
  });

  it('renders only the latest source submitted while a render is in flight', async () => {
    const manager = new SessionManager(1000);
    const { sent, send, release } = gatedConnection();
    const id = manager.openSession(send);

    const first = manager.submit(id, 'rect size 1x1');
    await manager.submit(id, 'rect size 2x2');
    await manager.submit(id, 'rect size 3x3');
    expect(send).toHaveBeenCalledTimes(1);

    release(0);
    await flush();
    expect(send).toHaveBeenCalledTimes(2);
    release(1);
    await first;

    expect(outputs(sent)).toEqual([render('rect size 1x1'), render('rect size 3x3')]);
  });

  it('renders immediately again once idle', async () => {
    const manager = new SessionManager(1000);
    const sent: ServerMessage[] = [];
    const id = manager.openSession(message => {
      sent.push(message);
    });
    await manager.submit(id, 'circle');
    await manager.submit(id, 'rect');
    expect(outputs(sent)).toEqual([render('circle'), render('rect')]);
  });

  it('discards pending work when the session closes', async () => {
    const manager = new SessionManager(1000);
    const { sent, send, release } = gatedConnection();
    const id = manager.openSession(send);

    const first = manager.submit(id, 'circle');
    await manager.submit(id, 'rect');
    manager.closeSession(id);
    release(0);
    await first;

    expect(outputs(sent)).toEqual([render('circle')]);
  });
});

describe('SessionManager.handleMessage', () => {
  async function exchange(raw: string, maxSourceLength = 1000): Promise<ServerMessage[]> {
    const manager = new SessionManager(maxSourceLength);
    const sent: ServerMessage[] = [];
    const id = manager.openSession(message => {
      sent.push(message);
    });
    await manager.handleMessage(id, raw);
    return sent;
  }

  it('renders source messages', async () => {
    expect(await exchange(JSON.stringify({ type: 'source', payload: 'rect $missing' }))).toEqual([
      renderMessage('rect $missing'),
    ]);
  });

  it('answers pings', async () => {
    expect(await exchange('{"type":"ping"}')).toEqual([{ type: 'pong' }]);
  });

  it('treats text that is not JSON as source', async () => {
    expect(outputs(await exchange('circle radius 4'))).toEqual([render('circle radius 4')]);
  });

  it('rejects unknown message objects', async () => {
    const [reply] = await exchange('{"type":"shout","payload":"rect"}');
    expect(reply).toMatchObject({
      type: 'error',
      message: 'Unrecognized message',
      errors: [{ code: ErrorCode.WsInvalidMessage, category: 'transport', severity: 'error' }],
    });
  });

  it('rejects sources over the length limit without rendering', async () => {
    const [reply] = await exchange(JSON.stringify({ type: 'source', payload: 'rect size 10x10' }), 8);
    expect(reply).toEqual({
      type: 'error',
      message: 'Source is 15 characters, over the limit of 8',
      errors: [
        {
          code: ErrorCode.WsInvalidPayload,
          category: 'transport',
          message: 'Source is 15 characters, over the limit of 8',
          line: 0,
          column: 0,
          severity: 'error',
        },
      ],
    });
  });
});

describe('renderMessage', () => {
  it('carries the document and its diagnostics', () => {
    const message = renderMessage('rect $missing');
    expect(message).toMatchObject({ type: 'render', output: render('rect $missing') });
    expect(message.type === 'render' && message.errors.map(e => e.code)).toEqual([ErrorCode.ParseUndefinedVar]);
  });
});
