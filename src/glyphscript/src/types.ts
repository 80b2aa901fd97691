import { z } from 'zod';
import type { ErrorRecord } from './errors.js';

export const SourceMessageSchema = z.object({
  type: z.literal('source'),
  payload: z.string(),
});

export const PingMessageSchema = z.object({
  type: z.literal('ping'),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [SourceMessageSchema, PingMessageSchema]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export interface RenderMessage {
  type: 'render';
  output: string;
  errors: ErrorRecord[];
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  errors: ErrorRecord[];
}

export interface PongMessage {
  type: 'pong';
}

export type ServerMessage = RenderMessage | ErrorMessage | PongMessage;

/** Delivers one frame to a connection; resolves once the frame is written. */
export type Send = (message: ServerMessage) => void | Promise<void>;
