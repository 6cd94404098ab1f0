import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";
import { askHidden } from "../prompt.js";

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf-8");
  });
  return { input, output, written: () => written };
}

describe("askHidden with piped input", () => {
  it("resolves with the first line", async () => {
    const { input, output, written } = streams();

    const answer = askHidden("Tidepool password: ", { input, output });
    input.write("test-pass\n");
    input.end();

    await expect(answer).resolves.toBe("test-pass");
    expect(written()).toBe("Tidepool password: ");
  });

  it("joins a line split across chunks", async () => {
    const { input, output } = streams();

    const answer = askHidden("Password: ", { input, output });
    input.write("test-");
    input.write("pass\nignored\n");

    await expect(answer).resolves.toBe("test-pass");
  });

  it("accepts a last line without a newline", async () => {
    const { input, output } = streams();

    const answer = askHidden("Password: ", { input, output });
    input.end("test-pass");

    await expect(answer).resolves.toBe("test-pass");
  });

  it("rejects when input ends before any line", async () => {
    const { input, output } = streams();

    const answer = askHidden("Password: ", { input, output });
    input.end();

    await expect(answer).rejects.toThrow("No input before end of stream");
  });
});
