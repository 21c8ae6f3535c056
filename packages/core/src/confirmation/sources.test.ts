import { describe, it, expect, vi } from "vitest";
import { PassThrough } from "node:stream";
import {
  createReadlineConfirmationSource,
  createStaticConfirmationSource,
} from "./sources.js";

function makeStreams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf-8");
  });
  return { input, output, written: () => written };
}

describe("readline confirmation source", () => {
  it("returns the typed line without its newline", async () => {
    const { input, output, written } = makeStreams();
    const source = createReadlineConfirmationSource({ input, output });

    const answer = source.ask("Proceed? ");
    input.write("y\n");

    await expect(answer).resolves.toBe("y");
    expect(written()).toBe("Proceed? ");
  });

  it("keeps surrounding whitespace for the gate to judge", async () => {
    const { input, output } = makeStreams();
    const source = createReadlineConfirmationSource({ input, output });

    const answer = source.ask("? ");
    input.write(" y\n");

    await expect(answer).resolves.toBe(" y");
  });

  it("resolves null when input ends without an answer", async () => {
    const { input, output } = makeStreams();
    const source = createReadlineConfirmationSource({ input, output });

    const answer = source.ask("? ");
    input.end();

    await expect(answer).resolves.toBeNull();
  });

  it("resolves null when aborted while waiting", async () => {
    const { input, output } = makeStreams();
    const source = createReadlineConfirmationSource({ input, output });
    const controller = new AbortController();

    const answer = source.ask("? ", controller.signal);
    controller.abort();

    await expect(answer).resolves.toBeNull();
  });

  it("does not prompt when already aborted", async () => {
    const { input, output, written } = makeStreams();
    const source = createReadlineConfirmationSource({ input, output });

    await expect(source.ask("? ", AbortSignal.abort())).resolves.toBeNull();
    expect(written()).toBe("");
  });

  it("treats Ctrl+C at a terminal prompt as an interrupt", async () => {
    const { input, output } = makeStreams();
    const onInterrupt = vi.fn();
    const source = createReadlineConfirmationSource({
      input,
      output,
      terminal: true,
      onInterrupt,
    });

    const answer = source.ask("Proceed? ");
    input.write("\x03");

    await expect(answer).resolves.toBeNull();
    expect(onInterrupt).toHaveBeenCalledTimes(1);
  });
});

describe("static confirmation source", () => {
  it("always returns its fixed answer", async () => {
    const source = createStaticConfirmationSource("y");
    await expect(source.ask("anything")).resolves.toBe("y");
    await expect(source.ask("again")).resolves.toBe("y");
  });
});
