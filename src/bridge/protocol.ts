/**
 * WebSocket wire protocol: `{type, data}` JSON envelopes.
 *
 * Shell output travels base64-encoded so arbitrary terminal bytes survive the
 * JSON text frame; input is the UTF-8 text typed in the terminal.
 */

import { z } from 'zod';

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('auth'), data: z.object({ key: z.string().min(1) }) }),
  z.object({ type: z.literal('host_key_confirm'), data: z.object({ accept: z.boolean() }) }),
  z.object({ type: z.literal('input'), data: z.object({ data: z.string() }) }),
  z.object({
    type: z.literal('resize'),
    data: z.object({
      rows: z.number().int().min(1).max(1000),
      cols: z.number().int().min(1).max(1000),
    }),
  }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('close') }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientMessageType = ClientMessage['type'];

const CLIENT_TYPES: ReadonlySet<string> = new Set<ClientMessageType>([
  'auth',
  'host_key_confirm',
  'input',
  'resize',
  'ping',
  'close',
]);

const EnvelopeSchema = z.object({ type: z.string() });

export type ClientFrame =
  | { kind: 'message'; message: ClientMessage }
  | { kind: 'unknown'; type: string }
  | { kind: 'malformed'; reason: string };

export function parseClientFrame(raw: string): ClientFrame {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { kind: 'malformed', reason: 'invalid JSON' };
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { kind: 'malformed', reason: 'missing message type' };
  }
  if (!CLIENT_TYPES.has(envelope.data.type)) {
    return { kind: 'unknown', type: envelope.data.type };
  }

  const message = ClientMessageSchema.safeParse(json);
  if (!message.success) {
    return { kind: 'malformed', reason: `invalid ${envelope.data.type} payload` };
  }
  return { kind: 'message', message: message.data };
}

export function isMessageOfType<T extends ClientMessageType>(
  message: ClientMessage,
  type: T,
): message is Extract<ClientMessage, { type: T }> {
  return message.type === type;
}

export type ServerMessage =
  | { type: 'ready' }
  | { type: 'connected'; data: { host_key: string } }
  | {
      type: 'host_key_verify';
      data: { status: 'new' | 'mismatch'; fingerprint: string; stored_key?: string };
    }
  | { type: 'output'; data: { data: string } }
  | { type: 'pong' }
  | { type: 'error'; data: { error: string } };

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify({ type: message.type, data: 'data' in message ? message.data : null });
}

export function encodeOutput(chunk: Buffer): ServerMessage {
  return { type: 'output', data: { data: chunk.toString('base64') } };
}
