import { describe, expect, it } from "vitest";
import { buildSearchPath } from "../utils/searchPathUtil";

describe("buildSearchPath", () => {
  it("appends extras and conventional prefixes after the inherited entries", () => {
    expect(buildSearchPath("/home/dev/bin:/usr/bin", ["/custom/bin"])).toBe(
      "/home/dev/bin:/usr/bin:/custom/bin:/usr/local/bin:/opt/homebrew/bin:/opt/local/bin:/bin:/usr/sbin:/sbin",
    );
  });

  it("falls back to the conventional prefixes when nothing is inherited", () => {
    expect(buildSearchPath(undefined)).toBe(
      "/usr/local/bin:/opt/homebrew/bin:/opt/local/bin:/usr/bin:/bin:/usr/sbin:/sbin",
    );
  });

  it("drops empty and duplicate entries", () => {
    expect(buildSearchPath("/a::/a:/sbin", ["/a", ""])).toBe(
      "/a:/sbin:/usr/local/bin:/opt/homebrew/bin:/opt/local/bin:/usr/bin:/bin:/usr/sbin",
    );
  });
});
