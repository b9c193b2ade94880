/**
 * Attempt Trail
 * Records every round trip the retry controller makes, whether or not its
 * response was accepted
 */

export type AttemptErrorKind = "provider" | "timeout" | "parse" | "type_mismatch";

export interface AttemptAudit {
  attempt: number;
  valid: boolean;
  provider: string;
  durationMs: number;
  errorKind?: AttemptErrorKind;
  message?: string;
  rawText?: string;
}

export interface AttemptEntry {
  timestamp: string;
  type: "attempt_accepted" | "attempt_rejected" | "request_exhausted";
  label: string;
  details: Record<string, unknown>;
}

export type AttemptDetails = Omit<AttemptAudit, "attempt" | "valid">;

export class AttemptLog {
  private entries: AttemptEntry[] = [];
  private attempts: Map<string, AttemptAudit[]> = new Map();

  /**
   * Record the outcome of one attempt for a request label
   */
  recordAttempt(label: string, attempt: number, valid: boolean, details: AttemptDetails): void {
    const audit: AttemptAudit = { attempt, valid, ...details };

    const existing = this.attempts.get(label);
    if (existing) {
      existing.push(audit);
    } else {
      this.attempts.set(label, [audit]);
    }

    this.entries.push({
      timestamp: new Date().toISOString(),
      type: valid ? "attempt_accepted" : "attempt_rejected",
      label,
      details: {
        attempt,
        provider: details.provider,
        durationMs: details.durationMs,
        errorKind: details.errorKind,
        message: details.message,
      },
    });
  }

  recordExhausted(label: string, attempts: number, message: string): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "request_exhausted",
      label,
      details: { attempts, message },
    });
  }

  getEntries(): AttemptEntry[] {
    return [...this.entries];
  }

  getAttempts(label: string): AttemptAudit[] {
    return this.attempts.get(label) ?? [];
  }

  getSummary(): {
    totalEntries: number;
    totalRequests: number;
    totalAttempts: number;
    successRate: number;
  } {
    const all = Array.from(this.attempts.values()).flat();
    const passed = all.filter((audit) => audit.valid).length;

    return {
      totalEntries: this.entries.length,
      totalRequests: this.attempts.size,
      totalAttempts: all.length,
      successRate: all.length > 0 ? passed / all.length : 0,
    };
  }

  /**
   * Export as JSON for persistence
   */
  toJSON(): { entries: AttemptEntry[]; attempts: Record<string, AttemptAudit[]> } {
    const attempts: Record<string, AttemptAudit[]> = {};
    for (const [label, audits] of this.attempts) {
      attempts[label] = audits;
    }
    return { entries: this.entries, attempts };
  }

  clear(): void {
    this.entries = [];
    this.attempts.clear();
  }
}
