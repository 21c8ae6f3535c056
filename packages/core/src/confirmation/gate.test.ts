import { describe, it, expect, vi } from "vitest";
import {
  createConfirmationGate,
  formatBytes,
  formatSummary,
  type ConfirmationSummary,
} from "./gate.js";
import { createStaticConfirmationSource } from "./sources.js";
import { makeRecord } from "../test-utils/fixtures.js";

const SUMMARY: ConfirmationSummary = {
  account: "acmelogs",
  container: "archive-logs",
  sourceTier: "Archive",
  targetTier: "Hot",
  auditPath: "/var/audit/acmelogs-archive-logs-discovered.csv",
};

function gateAnswering(answer: string | null, tokens?: string[]) {
  return createConfirmationGate({
    source: createStaticConfirmationSource(answer),
    affirmativeTokens: tokens,
    write: vi.fn(),
  });
}

describe("ConfirmationGate.requireConfirmation", () => {
  it.each(["y", "Y"])("proceeds on %j", async (answer) => {
    await expect(
      gateAnswering(answer).requireConfirmation([makeRecord()], SUMMARY),
    ).resolves.toBe(true);
  });

  it.each(["", "n", "N", "yes", "Yes", " y", "y ", "\t", "1"])(
    "declines on %j",
    async (answer) => {
      await expect(
        gateAnswering(answer).requireConfirmation([makeRecord()], SUMMARY),
      ).resolves.toBe(false);
    },
  );

  it("declines when no answer arrives", async () => {
    await expect(
      gateAnswering(null).requireConfirmation([makeRecord()], SUMMARY),
    ).resolves.toBe(false);
  });

  it("honours a custom allow-list exactly", async () => {
    await expect(
      gateAnswering("y", ["y"]).requireConfirmation([makeRecord()], SUMMARY),
    ).resolves.toBe(true);
    await expect(
      gateAnswering("Y", ["y"]).requireConfirmation([makeRecord()], SUMMARY),
    ).resolves.toBe(false);
  });

  it("shows the summary before asking", async () => {
    const write = vi.fn();
    const ask = vi.fn().mockResolvedValue("n");
    const gate = createConfirmationGate({ source: { ask }, write });
    const controller = new AbortController();

    await gate.requireConfirmation([makeRecord()], SUMMARY, controller.signal);

    expect(write).toHaveBeenCalledWith(formatSummary([makeRecord()], SUMMARY) + "\n");
    expect(ask).toHaveBeenCalledWith(
      "Proceed? [y/Y to confirm, anything else cancels] ",
      controller.signal,
    );
  });
});

describe("formatSummary", () => {
  it("lists count, size, account, container and audit location", () => {
    const text = formatSummary(
      [makeRecord({ contentLength: 1024 }), makeRecord({ contentLength: 2048 })],
      SUMMARY,
    );

    expect(text.split("\n")).toEqual([
      "",
      "About to move 2 object(s) (3.0 KiB) from Archive to Hot",
      "  account:    acmelogs",
      "  container:  archive-logs",
      "  audit file: /var/audit/acmelogs-archive-logs-discovered.csv",
      "",
    ]);
  });

  it("says when the audit file is missing", () => {
    const text = formatSummary([], { ...SUMMARY, auditPath: null });
    expect(text).toContain(
      "  audit file: not written, see the log for the candidate list",
    );
  });
});

describe("formatBytes", () => {
  it("scales through binary units", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(1023)).toBe("1023 B");
    expect(formatBytes(1536)).toBe("1.5 KiB");
    expect(formatBytes(5 * 1024 ** 3)).toBe("5.0 GiB");
  });
});
