import { FailureKind } from '../../common/errors';

/**
 * Everything one `run` needs, resolved from CLI flags and settings.
 */
export interface RunOptions {
  /** s3://bucket/prefix or a local directory */
  source: string;
  summariesPath: string;
  aggregatedPath: string;
  reportPath: string;
  riskReportPath: string;
  /** Canonical vehicle ids to process; null processes all */
  vehicles: ReadonlySet<string> | null;
  workers: number;
  /** Maximum number of logs to schedule after resume filtering; 0 = unlimited */
  prefetch: number;
  resume: boolean;
  deadVehiclesPath: string;
  /** Ranked vehicles shown in the risk report; null shows all */
  top: number | null;
}

export interface RunFailure {
  identifier: string;
  kind: FailureKind;
  message: string;
}

export interface RunReport {
  listed: number;
  scheduled: number;
  processed: number;
  skippedAlreadyDone: number;
  failed: number;
  failures: RunFailure[];
  aborted: boolean;
  abortReason: string | null;
  durationMs: number;
}
