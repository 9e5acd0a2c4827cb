/**
 * Per-root outcome of the last reference assignment pass.
 */
export interface AssignmentStats {
  total: number;
  success: number;
  missingPath: number;
  missingCapability: number;
}

export function emptyStats(): AssignmentStats {
  return { total: 0, success: 0, missingPath: 0, missingCapability: 0 };
}

/**
 * Last stats per root identity. Each pass overwrites the previous entry.
 */
export class AssignmentStatsStore {
  readonly #stats = new Map<string, AssignmentStats>();

  record(rootIdentity: string, stats: AssignmentStats): void {
    this.#stats.set(rootIdentity, { ...stats });
  }

  tryGetStats(rootIdentity: string): AssignmentStats | undefined {
    const stats = this.#stats.get(rootIdentity);
    return stats ? { ...stats } : undefined;
  }
}
