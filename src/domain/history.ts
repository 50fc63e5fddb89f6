import { z } from 'zod';

export const STATE_FILE_VERSION = 1;

export const historyRecordSchema = z.object({
  advisories: z.array(z.string()),
  scannedAt: z.string(),
});

export type HistoryRecord = z.infer<typeof historyRecordSchema>;

export const stateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  updatedAt: z.string(),
  targets: z.record(historyRecordSchema),
});

export type StateFile = z.infer<typeof stateFileSchema>;

/** Target path -> advisory ids observed on the last successfully reported run. */
export type History = Map<string, HistoryRecord>;

export const emptyHistory = (): History => new Map();
