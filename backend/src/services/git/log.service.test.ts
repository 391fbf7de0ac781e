import { describe, expect, it } from "vitest";
import { parseLogOutput } from "./log.service.js";

describe("parseLogOutput", () => {
  it("splits hash, date, and subject on the first two tabs", () => {
    const stdout = [
      "a1b2c3d\t2026-03-02\tAdd pages resolver",
      "e4f5a6b\t2026-03-01\tSubject\twith a tab",
    ].join("\n");

    expect(parseLogOutput(stdout)).toEqual([
      { hash: "a1b2c3d", date: "2026-03-02", subject: "Add pages resolver" },
      { hash: "e4f5a6b", date: "2026-03-01", subject: "Subject\twith a tab" },
    ]);
  });

  it("keeps empty subjects and skips lines missing fields", () => {
    const stdout = ["0a0b0c0\t2026-01-05\t", "broken line", "1a1b1c1\tno-subject-tab", ""].join(
      "\n",
    );

    expect(parseLogOutput(stdout)).toEqual([{ hash: "0a0b0c0", date: "2026-01-05", subject: "" }]);
  });

  it("returns no commits for empty output", () => {
    expect(parseLogOutput("")).toEqual([]);
  });
});
