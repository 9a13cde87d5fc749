/**
 * JSON frames exchanged with the event gateway
 *
 * Client -> gateway: hello, bye
 * Gateway -> client: welcome, event, error
 */

import { z } from 'zod';

export const HelloFrameSchema = z.object({
  type: z.literal('hello'),
  clientId: z.number().int(),
  readonly: z.boolean(),
  account: z.string(),
});

export const ByeFrameSchema = z.object({
  type: z.literal('bye'),
});

export const WelcomeFrameSchema = z.object({
  type: z.literal('welcome'),
  serverVersion: z.string().optional(),
});

export const EventFrameSchema = z.object({
  type: z.literal('event'),
  event: z.string().min(1),
  args: z.array(z.unknown()).default([]),
});

export const ErrorFrameSchema = z.object({
  type: z.literal('error'),
  code: z.string().optional(),
  message: z.string(),
});

export const ServerFrameSchema = z.discriminatedUnion('type', [WelcomeFrameSchema, EventFrameSchema, ErrorFrameSchema]);

export type HelloFrame = z.infer<typeof HelloFrameSchema>;
export type ByeFrame = z.infer<typeof ByeFrameSchema>;
export type ClientFrame = HelloFrame | ByeFrame;
export type ServerFrame = z.infer<typeof ServerFrameSchema>;

/**
 * Parse a frame received from the gateway
 *
 * @throws {Error} If the frame is not JSON or not a known frame
 */
export function parseServerFrame(raw: string): ServerFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new Error(`Invalid JSON frame: ${raw.slice(0, 100)}`);
  }

  const result = ServerFrameSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid frame: ${result.error.issues.map((issue) => issue.message).join(', ')}`);
  }
  return result.data;
}

export function serializeFrame(frame: ClientFrame | ServerFrame): string {
  return JSON.stringify(frame);
}
