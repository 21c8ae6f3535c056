import type { BlobRecord } from "../blobs/types.js";
import type { ConfirmationSource } from "./sources.js";

export const DEFAULT_AFFIRMATIVE_TOKENS: readonly string[] = ["y", "Y"];

export interface ConfirmationSummary {
  account: string;
  container: string;
  sourceTier: string;
  targetTier: string;
  /** Discovery artifact, or null when it could not be written. */
  auditPath: string | null;
}

export interface ConfirmationGateOptions {
  source: ConfirmationSource;
  /** Exact answers that count as yes. Default: ["y", "Y"] */
  affirmativeTokens?: readonly string[];
  /** Default: process.stdout */
  write?: (text: string) => void;
}

export interface ConfirmationGate {
  /**
   * Shows the candidate summary and blocks for one answer. True only for an
   * exact affirmative token; anything else, including no answer, declines.
   */
  requireConfirmation(
    candidates: readonly BlobRecord[],
    summary: ConfirmationSummary,
    signal?: AbortSignal,
  ): Promise<boolean>;
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KiB", "MiB", "GiB", "TiB", "PiB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[0]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export function formatSummary(
  candidates: readonly BlobRecord[],
  summary: ConfirmationSummary,
): string {
  const totalBytes = candidates.reduce((sum, r) => sum + r.contentLength, 0);
  return [
    "",
    `About to move ${candidates.length} object(s) (${formatBytes(totalBytes)}) from ${summary.sourceTier} to ${summary.targetTier}`,
    `  account:    ${summary.account}`,
    `  container:  ${summary.container}`,
    `  audit file: ${summary.auditPath ?? "not written, see the log for the candidate list"}`,
    "",
  ].join("\n");
}

export function createConfirmationGate(
  options: ConfirmationGateOptions,
): ConfirmationGate {
  const tokens = new Set(options.affirmativeTokens ?? DEFAULT_AFFIRMATIVE_TOKENS);
  const write = options.write ?? ((text: string) => process.stdout.write(text));

  return {
    async requireConfirmation(candidates, summary, signal) {
      write(formatSummary(candidates, summary) + "\n");
      const answer = await options.source.ask(
        `Proceed? [${[...tokens].join("/")} to confirm, anything else cancels] `,
        signal,
      );
      return answer !== null && tokens.has(answer);
    },
  };
}
