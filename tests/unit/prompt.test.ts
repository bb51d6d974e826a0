import {PassThrough} from "stream";
import {describe, expect, it} from "vitest";
import {confirm, isYes} from "../../src/utils/prompt";

describe("isYes", () => {
  it.each([
    ["y", true],
    [" YES \n", true],
    ["n", false],
    ["", false],
    ["yep", false]
  ])("%j is %s", (answer, expected) => {
    expect(isYes(answer)).toBe(expected);
  });
});

describe("confirm", () => {
  it("shows the question and reads the answer", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let shown = "";
    output.on("data", (chunk: Buffer) => {
      shown += chunk.toString();
    });

    const answer = confirm("Remove 2 worktree(s)?", {input, output});
    input.end("yes\n");

    expect(await answer).toBe(true);
    expect(shown).toBe("Remove 2 worktree(s)? (y/N): ");
  });

  it("treats input that ends unanswered as no", async () => {
    const input = new PassThrough();
    const answer = confirm("Proceed?", {input, output: new PassThrough()});
    input.end();
    expect(await answer).toBe(false);
  });
});
