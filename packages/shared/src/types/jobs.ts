export type WriteStage = 'write' | 'finalize';

export type WriteOutcome =
  | { ok: true; key: string }
  | { ok: false; key: string; stage: WriteStage; error: string };

export interface WriteSummary {
  requested: number;
  objectsWritten: number;
  elapsedNs: bigint;
  errors: string[];
}

export interface WriteJobOptions {
  timeoutMs: number;
  objectSize: number;
}
