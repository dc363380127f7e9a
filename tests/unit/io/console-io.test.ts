import { PassThrough, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { ConsoleIo } from "../../../src/io/console-io.js";

function setup() {
  const input = new PassThrough();
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { io: new ConsoleIo(input, output), input, written: () => chunks.join("") };
}

describe("ConsoleIo", () => {
  it("underlines section titles", () => {
    const { io, written } = setup();
    io.section("Scan");
    expect(written()).toBe("\nScan\n====\n\n");
  });

  it("tags blocks and indents follow-up lines", () => {
    const { io, written } = setup();
    io.warning(["Found things", "more"]);
    expect(written()).toBe("\n[WARNING] Found things\n          more\n\n");
  });

  it("indents plain text", () => {
    const { io, written } = setup();
    io.text(["a", "b"]);
    expect(written()).toBe(" a\n b\n");
  });

  it("returns the trimmed answer", async () => {
    const { io, input } = setup();
    const answer = io.ask("Remove records [y,a,r,p,d,?]?", "?");
    input.write("  r \n");
    await expect(answer).resolves.toBe("r");
    io.close();
  });

  it("falls back to the default on an empty line", async () => {
    const { io, input } = setup();
    const answer = io.ask("Remove records?", "?");
    input.write("\n");
    await expect(answer).resolves.toBe("?");
    io.close();
  });

  it("returns null once input has ended", async () => {
    const { io, input } = setup();
    const answer = io.ask("Remove records?", "?");
    input.end();
    await expect(answer).resolves.toBeNull();
    await expect(io.ask("Again?", "?")).resolves.toBeNull();
  });

  it("keeps answers typed ahead of the prompt in order", async () => {
    const { io, input } = setup();
    input.end("p\nd\n\na\n");
    const answers: (string | null)[] = [];
    for (let i = 0; i < 5; i += 1) answers.push(await io.ask("Remove records?", "?"));
    expect(answers).toEqual(["p", "d", "?", "a", null]);
  });

  it("queues answers that arrive while a prompt is waiting", async () => {
    const { io, input } = setup();
    const first = io.ask("Remove records?", "?");
    input.write("p\nd\ny\n");
    await expect(first).resolves.toBe("p");
    await expect(io.ask("Remove records?", "?")).resolves.toBe("d");
    await expect(io.ask("Remove records?", "?")).resolves.toBe("y");
    io.close();
  });

  it("writes the question with its default", async () => {
    const { io, input, written } = setup();
    const answer = io.ask("Remove records [y,a,r,p,d,?]?", "?");
    expect(written()).toBe(" Remove records [y,a,r,p,d,?]? [?]: ");
    input.write("a\n");
    await expect(answer).resolves.toBe("a");
    io.close();
  });
});
