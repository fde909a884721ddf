import { z } from 'zod';

export const SourceStates = ['idle', 'running', 'unavailable', 'stopped'] as const;

export const PingSchema = z.object({
  type: z.literal('ping'),
  t_ms: z.number().nonnegative().optional()
});

export const RequestStatusSchema = z.object({
  type: z.literal('request_status')
});

export const ClientMessageSchema = z.discriminatedUnion('type', [PingSchema, RequestStatusSchema]);

export const StreamStatusSchema = z.object({
  type: z.literal('stream_status'),
  camera: z.enum(SourceStates),
  backend: z.enum(['rpicam', 'v4l2', 'mock']),
  resolution: z.string().regex(/^\d+x\d+$/),
  captureFps: z.number().positive(),
  streamFps: z.number().positive(),
  measuredFps: z.number().nonnegative(),
  framesCaptured: z.number().int().nonnegative(),
  captureErrors: z.number().int().nonnegative(),
  clients: z.number().int().nonnegative(),
  lastFrameAt: z.number().nullable(),
  ts_ms: z.number().nonnegative()
});

export const PongSchema = z.object({
  type: z.literal('pong'),
  t_ms: z.number().nonnegative().optional(),
  server_ms: z.number().nonnegative()
});

export const ErrorSchema = z.object({
  type: z.literal('error'),
  code: z.string().min(1),
  message: z.string().min(1)
});

export type StreamStatus = z.infer<typeof StreamStatusSchema>;
export type Pong = z.infer<typeof PongSchema>;
export type ErrorMessage = z.infer<typeof ErrorSchema>;

export type ServerMessage = StreamStatus | Pong | ErrorMessage;
