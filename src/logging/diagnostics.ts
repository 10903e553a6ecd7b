/**
 * Diagnostic console lines, tagged per component.
 *
 * fine → console.debug, info → console.info, severe → console.error.
 * Lines below FAIRSCHED_LOG_LEVEL (fine | info | severe, default info) are dropped.
 */

export type DiagnosticLevel = "fine" | "info" | "severe";

const LEVEL_RANK: Record<DiagnosticLevel, number> = {
  fine: 0,
  info: 1,
  severe: 2,
};

export interface Diagnostics {
  fine(message: string): void;
  info(message: string): void;
  severe(message: string): void;
}

function isDiagnosticLevel(value: string): value is DiagnosticLevel {
  return value === "fine" || value === "info" || value === "severe";
}

/** Minimum level currently enabled. Read on every call so tests can flip it. */
export function currentLevel(): DiagnosticLevel {
  const raw = process.env["FAIRSCHED_LOG_LEVEL"]?.trim().toLowerCase();
  return raw && isDiagnosticLevel(raw) ? raw : "info";
}

export function isEnabled(level: DiagnosticLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel()];
}

export function createDiagnostics(component: string): Diagnostics {
  const prefix = `[${component}]`;
  return {
    fine(message: string): void {
      if (isEnabled("fine")) console.debug(`${prefix} ${message}`);
    },
    info(message: string): void {
      if (isEnabled("info")) console.info(`${prefix} ${message}`);
    },
    severe(message: string): void {
      console.error(`${prefix} ${message}`);
    },
  };
}

/** Message of a thrown value, whatever was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
