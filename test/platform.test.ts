import { describe, expect, it } from "vitest";
import {
  formatPlatform,
  hostPlatform,
  isSupported,
  parsePlatform,
  platformsMatch,
  resolvePlatform,
} from "../src/platform/platform.js";

describe("platform", () => {
  it("parses os/arch", () => {
    expect(parsePlatform("linux/amd64")).toEqual({ os: "linux", architecture: "amd64" });
  });

  it("drops the default arm64 variant", () => {
    expect(parsePlatform("linux/arm64/v8")).toEqual({ os: "linux", architecture: "arm64" });
  });

  it("defaults arm to v7", () => {
    expect(formatPlatform(parsePlatform("linux/arm"))).toBe("linux/arm/v7");
  });

  it("rejects malformed text", () => {
    expect(() => parsePlatform("amd64")).toThrow(/Invalid target platform/);
    expect(() => parsePlatform("linux/amd64/v1/x")).toThrow(/Invalid target platform/);
  });

  it("maps Node architectures to image platforms", () => {
    expect(formatPlatform(hostPlatform("x64"))).toBe("linux/amd64");
    expect(formatPlatform(hostPlatform("arm64"))).toBe("linux/arm64");
    expect(formatPlatform(hostPlatform("ia32"))).toBe("linux/386");
    expect(() => hostPlatform("mips")).toThrow(/Unsupported host architecture/);
  });

  it("resolves CLI over config over TARGETPLATFORM", () => {
    const env = { TARGETPLATFORM: "linux/386" };
    expect(formatPlatform(resolvePlatform({ cli: "linux/arm64", config: "linux/amd64", env }))).toBe("linux/arm64");
    expect(formatPlatform(resolvePlatform({ config: "linux/amd64", env }))).toBe("linux/amd64");
    expect(formatPlatform(resolvePlatform({ env }))).toBe("linux/386");
  });

  it("matches platforms after normalization", () => {
    expect(platformsMatch({ os: "linux", architecture: "arm64", variant: "v8" }, parsePlatform("linux/arm64"))).toBe(true);
    expect(platformsMatch(parsePlatform("linux/amd64"), parsePlatform("linux/arm64"))).toBe(false);
  });

  it("knows which platforms the base images publish", () => {
    expect(isSupported(parsePlatform("linux/amd64"))).toBe(true);
    expect(isSupported(parsePlatform("windows/amd64"))).toBe(false);
  });
});
