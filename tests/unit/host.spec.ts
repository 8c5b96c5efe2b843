import { describe, it, expect } from "vitest";
import {
  createHost,
  formatHost,
  hostEquals,
  hostLabels,
  parseHost,
} from "../../src/host";
import { parseLabel } from "../../src/label";
import { InvalidHostError, InvalidLabelError } from "../../src/errors";

describe("parseHost", () => {
  it("splits example.com into name and domains", () => {
    const host = parseHost("example.com");
    expect(host.name).toBe("example");
    expect(host.domains).toEqual(["com"]);
  });

  it("keeps further labels in written order", () => {
    const host = parseHost("www.example.co.uk");
    expect(host.name).toBe("www");
    expect(host.domains).toEqual(["example", "co", "uk"]);
  });

  it("requires at least two labels", () => {
    expect(() => parseHost("example")).toThrow(InvalidHostError);
  });

  it("reports a bad label before counting labels", () => {
    expect(() => parseHost("")).toThrow(InvalidLabelError);
    expect(() => parseHost("example..com")).toThrow(InvalidLabelError);
    expect(() => parseHost("example.com.")).toThrow(InvalidLabelError);
    expect(() => parseHost("ex_ample.com")).toThrow(InvalidLabelError);
  });

  it("rejects names longer than 253 characters", () => {
    const label = "a".repeat(63);
    // 4 * 63 + 3 dots = 255
    const text = [label, label, label, label].join(".");
    expect(() => parseHost(text)).toThrow(InvalidHostError);
  });

  it("returns a frozen value", () => {
    const host = parseHost("example.com");
    expect(Object.isFrozen(host)).toBe(true);
    expect(Object.isFrozen(host.domains)).toBe(true);
  });
});

describe("createHost", () => {
  it("builds from labels", () => {
    const host = createHost(parseLabel("vm1"), [
      parseLabel("example"),
      parseLabel("com"),
    ]);
    expect(formatHost(host)).toBe("vm1.example.com");
  });

  it("rejects an empty domain list", () => {
    expect(() => createHost(parseLabel("localhost"), [])).toThrow(
      InvalidHostError,
    );
  });
});

describe("formatHost / hostLabels / hostEquals", () => {
  it("round-trips the written form", () => {
    expect(formatHost(parseHost("a.b.c.d"))).toBe("a.b.c.d");
  });

  it("lists every label", () => {
    expect(hostLabels(parseHost("a.b.c"))).toEqual(["a", "b", "c"]);
  });

  it("compares label by label", () => {
    expect(hostEquals(parseHost("a.b"), parseHost("a.b"))).toBe(true);
    expect(hostEquals(parseHost("a.b"), parseHost("a.c"))).toBe(false);
    expect(hostEquals(parseHost("a.b"), parseHost("a.b.c"))).toBe(false);
    expect(hostEquals(parseHost("A.b"), parseHost("a.b"))).toBe(false);
  });
});
