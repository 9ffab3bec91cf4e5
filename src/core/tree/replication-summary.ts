// SPDX-License-Identifier: Apache-2.0

export interface ReplicationFailure {
  readonly path: string;
  readonly reason: string;
}

export interface ReplicationSummary {
  written: number;
  skipped: number;
  failed: number;
  aborted: boolean;
  /** destination path of the conflict the run was aborted at */
  abortedAt?: string;
  failures: ReplicationFailure[];
}

export function emptySummary(): ReplicationSummary {
  return {written: 0, skipped: 0, failed: 0, aborted: false, failures: []};
}

export function summaryLines(summary: ReplicationSummary): string[] {
  const lines = [`written: ${summary.written}`, `skipped: ${summary.skipped}`, `failed: ${summary.failed}`];
  if (summary.aborted) {
    lines.push(`aborted at: ${summary.abortedAt ?? 'unknown'}`);
  }
  for (const failure of summary.failures) {
    lines.push(`${failure.path}: ${failure.reason}`);
  }
  return lines;
}
