import { z } from 'zod';

// IPC messages from a conversion worker to the parent process
export const workerMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('started'),
    url: z.string(),
    pid: z.number().int(),
  }),
  z.object({
    type: z.literal('done'),
    url: z.string(),
    elapsedSeconds: z.number().nonnegative(),
    siteDir: z.string(),
    markdownPath: z.string(),
    jsonPath: z.string(),
  }),
  z.object({
    type: z.literal('error'),
    url: z.string(),
    elapsedSeconds: z.number().nonnegative(),
    error: z.string().min(1),
  }),
]);

export type WorkerMessage = z.infer<typeof workerMessageSchema>;
export type WorkerResult = Extract<WorkerMessage, { type: 'done' | 'error' }>;

/**
 * Send an IPC message to the parent process. Resolves once the message has
 * been handed to the channel, so the caller may exit right after.
 */
export function sendToParent(message: WorkerMessage): Promise<void> {
  return new Promise((resolve) => {
    if (!process.send) {
      resolve();
      return;
    }
    process.send(message, undefined, {}, (error) => {
      if (error) {
        console.error('Failed to send IPC message:', error);
      }
      resolve();
    });
  });
}
