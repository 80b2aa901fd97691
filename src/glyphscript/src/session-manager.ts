import crypto from 'crypto';
import { diagnostic, ErrorCode, errorsToResponse, hasFatal, summarizeErrors, toRecord } from './errors.js';
import { renderWithErrors } from './pipeline.js';
import { ClientMessageSchema, type ErrorMessage, type Send, type ServerMessage } from './types.js';

interface Session {
  send: Send;
  rendering: boolean;
  pending: string | undefined;
  closed: boolean;
}

function errorMessage(code: ErrorCode, message: string, context?: string): ErrorMessage {
  return { type: 'error', message, errors: [toRecord(diagnostic(code, message, undefined, { context }))] };
}

export function renderMessage(source: string): ServerMessage {
  const { svg, errors } = renderWithErrors(source);
  if (hasFatal(errors)) {
    return { type: 'error', message: summarizeErrors(errors), errors: errorsToResponse(errors) };
  }
  return { type: 'render', output: svg, errors: errorsToResponse(errors) };
}

/**
 * Tracks live connections and renders their sources. Each connection has at
 * most one render in flight; sources arriving meanwhile overwrite a single
 * pending slot, so only the latest one is rendered next.
 */
export class SessionManager {
  private maxSourceLength: number;
  private sessions: Map<string, Session>;

  constructor(maxSourceLength: number) {
    this.maxSourceLength = maxSourceLength;
    this.sessions = new Map();
  }

  private generateSessionId(): string {
    return crypto.randomBytes(16).toString('hex');
  }

  private getSession(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new Error(`Session not found: ${id}`);
    }
    return session;
  }

  getSessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  openSession(send: Send): string {
    const id = this.generateSessionId();
    this.sessions.set(id, { send, rendering: false, pending: undefined, closed: false });
    return id;
  }

  /** Drops the session; a superseded pending source is discarded unrendered. */
  closeSession(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    session.closed = true;
    session.pending = undefined;
    return this.sessions.delete(id);
  }

  /**
   * Handles one inbound frame. Text that is not JSON is taken as raw source;
   * a JSON object must be a known client message.
   */
  async handleMessage(id: string, raw: string): Promise<void> {
    const session = this.getSession(id);

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return this.submit(id, raw);
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      return this.submit(id, raw);
    }

    const parsed = ClientMessageSchema.safeParse(data);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(issue => issue.message).join('; ');
      await session.send(errorMessage(ErrorCode.WsInvalidMessage, 'Unrecognized message', detail));
      return;
    }

    switch (parsed.data.type) {
      case 'ping':
        await session.send({ type: 'pong' });
        return;
      case 'source':
        return this.submit(id, parsed.data.payload);
    }
  }

  async submit(id: string, source: string): Promise<void> {
    const session = this.getSession(id);

    if (source.length > this.maxSourceLength) {
      await session.send(
        errorMessage(
          ErrorCode.WsInvalidPayload,
          `Source is ${source.length} characters, over the limit of ${this.maxSourceLength}`,
        ),
      );
      return;
    }

    if (session.rendering) {
      session.pending = source;
      return;
    }

    session.rendering = true;
    try {
      let next: string | undefined = source;
      while (next !== undefined && !session.closed) {
        session.pending = undefined;
        await session.send(renderMessage(next));
        next = session.pending;
      }
    } finally {
      session.rendering = false;
    }
  }
}
