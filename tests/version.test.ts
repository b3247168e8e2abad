import { describe, expect, it } from "vitest";
import { readVersion } from "../src/lib/version";

describe("readVersion", () => {
  it("reads the package version", () => {
    expect(readVersion()).toBe("0.1.0");
  });
});
