import fc from "fast-check";
import { describe, expect, it } from "vitest";

import semver from "semver";

import {
  formatVersion,
  validateCommands,
  validateLicense,
  validateName,
  validatePackageName,
  validateVersion,
  validateWasmSource
} from "../src/core/prompts.js";

describe("name validation", () => {
  it("accepts identifiers made of letters, digits, dashes and underscores", () => {
    expect(validateName("my-pkg_1")).toEqual({ ok: true, value: "my-pkg_1" });
  });

  it("rejects empty names", () => {
    expect(validateName("")).toEqual({ ok: false, message: "Name cannot be empty." });
  });

  it("rejects names with other characters", () => {
    expect(validateName("bad name")).toEqual({
      ok: false,
      message: 'The name "bad name" contains invalid characters. Valid characters are [-a-zA-Z0-9_].'
    });
  });

  it("allows a single namespace prefix on package names", () => {
    expect(validatePackageName("acme/tool")).toEqual({ ok: true, value: "acme/tool" });
    expect(validatePackageName("a/b/c")).toEqual({
      ok: false,
      message: 'The package name "a/b/c" may contain at most one "/" namespace separator.'
    });
    expect(validatePackageName("acme/")).toEqual({
      ok: false,
      message: 'The package name "acme/" has an empty segment.'
    });
    expect(validatePackageName("/tool")).toEqual({
      ok: false,
      message: 'The package name "/tool" has an empty segment.'
    });
    expect(validatePackageName("")).toEqual({ ok: false, message: "Name cannot be empty." });
  });
});

describe("version validation", () => {
  it("normalizes accepted versions", () => {
    expect(validateVersion("1.2.3")).toEqual({ ok: true, value: "1.2.3" });
    expect(validateVersion("v1.2.3")).toEqual({ ok: true, value: "1.2.3" });
    expect(validateVersion("1.0.0-beta.1+build.7")).toEqual({ ok: true, value: "1.0.0-beta.1+build.7" });
  });

  it("carries the parser message on rejection", () => {
    const result = validateVersion("1.0");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.message).toContain("Invalid Version");
  });

  it("round-trips generated versions unchanged", () => {
    const versionArb = fc
      .record({
        major: fc.nat({ max: 5000 }),
        minor: fc.nat({ max: 5000 }),
        patch: fc.nat({ max: 5000 }),
        prerelease: fc.option(fc.constantFrom("alpha", "beta.1", "rc.2", "0.3.7"), { nil: undefined }),
        build: fc.option(fc.constantFrom("build.5", "sha.0abc", "20240101"), { nil: undefined })
      })
      .map(
        ({ major, minor, patch, prerelease, build }) =>
          `${major}.${minor}.${patch}${prerelease ? `-${prerelease}` : ""}${build ? `+${build}` : ""}`
      );

    fc.assert(
      fc.property(versionArb, (version) => {
        const first = validateVersion(version);
        expect(first).toEqual({ ok: true, value: version });
        if (first.ok) {
          expect(validateVersion(first.value)).toEqual(first);
          expect(formatVersion(new semver.SemVer(version))).toBe(first.value);
        }
      })
    );
  });
});

describe("module source validation", () => {
  it("accepts the none sentinel and .wasm paths", () => {
    expect(validateWasmSource("none")).toEqual({ ok: true, value: "none" });
    expect(validateWasmSource("target/app.wasm")).toEqual({ ok: true, value: "target/app.wasm" });
  });

  it("rejects other paths with a fixed message", () => {
    expect(validateWasmSource("app.wat")).toEqual({
      ok: false,
      message: "The module source path must have a .wasm extension"
    });
    expect(validateWasmSource("None").ok).toBe(false);
  });

  it("accepts exactly none and strings ending in .wasm", () => {
    fc.assert(
      fc.property(fc.string(), (value) => {
        const expected = value === "none" || value.endsWith(".wasm");
        expect(validateWasmSource(value).ok).toBe(expected);
      })
    );
    fc.assert(
      fc.property(fc.string(), (prefix) => {
        expect(validateWasmSource(`${prefix}.wasm`).ok).toBe(true);
      })
    );
  });
});

describe("license validation", () => {
  it("accepts SPDX-style identifiers", () => {
    expect(validateLicense("ISC")).toEqual({ ok: true, value: "ISC" });
    expect(validateLicense("Apache-2.0")).toEqual({ ok: true, value: "Apache-2.0" });
    expect(validateLicense("GPL-2.0+")).toEqual({ ok: true, value: "GPL-2.0+" });
  });

  it("rejects blanks and free text", () => {
    expect(validateLicense("")).toEqual({ ok: false, message: "License cannot be empty." });
    expect(validateLicense("MIT License").ok).toBe(false);
  });
});

describe("command list validation", () => {
  it("treats an empty answer as no commands", () => {
    expect(validateCommands("")).toEqual({ ok: true, value: "" });
  });

  it("keeps a space separated list as one value", () => {
    expect(validateCommands("run serve")).toEqual({ ok: true, value: "run serve" });
  });

  it("collapses surrounding and repeated whitespace", () => {
    expect(validateCommands(" app ")).toEqual({ ok: true, value: "app" });
    expect(validateCommands("run   serve ")).toEqual({ ok: true, value: "run serve" });
    expect(validateCommands("\tapp")).toEqual({ ok: true, value: "app" });
  });

  it("rejects lists containing an invalid name", () => {
    expect(validateCommands("run s!")).toEqual({
      ok: false,
      message: 'The name "s!" contains invalid characters. Valid characters are [-a-zA-Z0-9_].'
    });
  });

  it("rejects whitespace-only lists", () => {
    expect(validateCommands("   ")).toEqual({ ok: false, message: "Command names cannot be blank." });
  });
});
