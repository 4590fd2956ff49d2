/**
 * Processing report
 * Tracks what happened to every candidate in every round
 */

import { CandidateOutcome, TypeKey } from "./types";

export interface ReportEntry {
  timestamp: string;
  round: number;
  typeKey: TypeKey;
  outcome: CandidateOutcome;
  detail?: string;
}

export type ReportSummary = Record<CandidateOutcome, number> & {
  rounds: number;
  candidates: number;
};

export class ProcessingReport {
  private entries: ReportEntry[] = [];

  record(round: number, typeKey: TypeKey, outcome: CandidateOutcome, detail?: string): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      round,
      typeKey,
      outcome,
      detail,
    });
  }

  getEntries(): ReportEntry[] {
    return [...this.entries];
  }

  getEntriesForType(typeKey: TypeKey): ReportEntry[] {
    return this.entries.filter((entry) => entry.typeKey === typeKey);
  }

  /**
   * Latest outcome of a candidate, if it was seen at all
   */
  finalOutcome(typeKey: TypeKey): CandidateOutcome | undefined {
    const history = this.getEntriesForType(typeKey);
    return history[history.length - 1]?.outcome;
  }

  /**
   * Counts by final outcome; a candidate deferred then emitted counts once, as emitted
   */
  getSummary(): ReportSummary {
    const summary: ReportSummary = {
      rounds: 0,
      candidates: 0,
      emitted: 0,
      rejected: 0,
      deferred: 0,
      failed: 0,
      unresolved: 0,
    };

    const finals = new Map<TypeKey, CandidateOutcome>();
    for (const entry of this.entries) {
      finals.set(entry.typeKey, entry.outcome);
      summary.rounds = Math.max(summary.rounds, entry.round);
    }

    summary.candidates = finals.size;
    for (const outcome of finals.values()) {
      summary[outcome] += 1;
    }

    return summary;
  }

  toJSON(): ReportEntry[] {
    return this.getEntries();
  }

  clear(): void {
    this.entries = [];
  }
}
