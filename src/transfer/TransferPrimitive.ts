/**
 * Contract of the byte-transfer mechanism a sync is applied through
 *
 * An implementation makes destRoot mirror sourceRoot under filterRules
 * (rsync merge-filter syntax: `- pattern`, `P pattern`, `+ pattern`,
 * first match wins), removing extraneous destination entries when mirror is
 * set and comparing file contents instead of size/mtime when checksum is set.
 */

export interface TransferRequest {
  sourceRoot: string;
  destRoot: string;
  filterRules: readonly string[];
  mirror: boolean;
  checksum: boolean;
}

export interface TransferOutcome {
  /** 0 on success; rsync conventions otherwise (23/24 = partial transfer) */
  exitCode: number;
  /** Relative paths that could not be transferred or removed */
  failedPaths: string[];
  /** Captured diagnostic output */
  output: string;
}

export interface TransferPrimitive {
  readonly name: string;
  transfer(request: TransferRequest): Promise<TransferOutcome>;
}

/** rsync exit code for a partial transfer due to error */
export const EXIT_PARTIAL_TRANSFER = 23;

/** rsync exit code for a partial transfer due to vanished source files */
export const EXIT_VANISHED_SOURCE = 24;
