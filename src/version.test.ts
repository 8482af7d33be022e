import { describe, expect, it } from "vitest";
import {
  checkExitCode,
  compareVersions,
  decide,
  describeVersion,
  extractVersionFromText,
  isStandardVersion,
  knownVersion,
} from "./version";

describe("compareVersions", () => {
  it("compares components numerically", () => {
    expect(compareVersions("1.21.44.1", "1.21.50.7")).toBe(-1);
    expect(compareVersions("1.21.100.1", "1.21.99.9")).toBe(1);
    expect(compareVersions("1.21.44.01", "1.21.44.1")).toBe(0);
  });
});

describe("extractVersionFromText", () => {
  it("finds the version in a package URL", () => {
    expect(extractVersionFromText("https://example.test/bin-linux/bedrock-server-1.21.50.7.zip")).toBe("1.21.50.7");
  });

  it("returns null when no version is present", () => {
    expect(extractVersionFromText("https://example.test/server.zip")).toBeNull();
  });
});

describe("isStandardVersion", () => {
  it("accepts only four numeric parts", () => {
    expect(isStandardVersion("1.21.44.1")).toBe(true);
    expect(isStandardVersion("1.21.44")).toBe(false);
    expect(isStandardVersion("installed-20250101")).toBe(false);
  });
});

describe("decide", () => {
  it("installs when nothing is installed, even if latest is unknown", () => {
    const decision = decide({ kind: "not-installed" }, { kind: "unresolved" });
    expect(decision.outcome).toBe("fresh-install");
    expect(decision.updateNeeded).toBe(true);
  });

  it("skips when the latest version cannot be determined", () => {
    const decision = decide(knownVersion("1.21.44.1"), { kind: "unresolved" });
    expect(decision).toMatchObject({ outcome: "latest-unknown", updateNeeded: false });
  });

  it("reports up to date on identical versions", () => {
    const decision = decide(knownVersion("1.21.44.1"), knownVersion("1.21.44.1"));
    expect(decision).toMatchObject({ outcome: "up-to-date", updateNeeded: false });
  });

  it("treats numerically equal versions as up to date", () => {
    const decision = decide(knownVersion("1.21.44.01"), knownVersion("1.21.44.1"));
    expect(decision.outcome).toBe("up-to-date");
  });

  it("updates when the installed version is older", () => {
    const decision = decide(knownVersion("1.21.44.1"), knownVersion("1.21.50.7"));
    expect(decision).toEqual({
      updateNeeded: true,
      outcome: "update-available",
      reason: "Server update available: 1.21.44.1 -> 1.21.50.7",
    });
  });

  it("does not downgrade when the installed version is newer", () => {
    const decision = decide(knownVersion("1.21.60.1"), knownVersion("1.21.50.7"));
    expect(decision).toMatchObject({ outcome: "installed-newer", updateNeeded: false });
  });

  it("updates when the installed version has a synthesized label", () => {
    const decision = decide(knownVersion("installed-20250101"), knownVersion("1.21.50.7"));
    expect(decision).toMatchObject({ outcome: "non-standard-format", updateNeeded: true });
  });

  it("updates when the installed version is unresolved", () => {
    const decision = decide({ kind: "unresolved" }, knownVersion("1.21.50.7"));
    expect(decision.outcome).toBe("non-standard-format");
  });
});

describe("checkExitCode", () => {
  it("maps outcomes to the check command's exit codes", () => {
    const codeFor = (installed: Parameters<typeof decide>[0], latest: Parameters<typeof decide>[1]) =>
      checkExitCode(decide(installed, latest));

    expect(codeFor(knownVersion("1.21.50.7"), knownVersion("1.21.50.7"))).toBe(0);
    expect(codeFor({ kind: "not-installed" }, knownVersion("1.21.50.7"))).toBe(1);
    expect(codeFor(knownVersion("1.21.50.7"), { kind: "unresolved" })).toBe(1);
    expect(codeFor(knownVersion("1.21.44.1"), knownVersion("1.21.50.7"))).toBe(2);
    expect(codeFor(knownVersion("custom"), knownVersion("1.21.50.7"))).toBe(2);
    expect(codeFor(knownVersion("1.21.60.1"), knownVersion("1.21.50.7"))).toBe(3);
  });
});

describe("describeVersion", () => {
  it("renders each variant", () => {
    expect(describeVersion({ kind: "not-installed" })).toBe("not-installed");
    expect(describeVersion({ kind: "unresolved" })).toBe("unknown");
    expect(describeVersion(knownVersion("1.21.50.7"))).toBe("1.21.50.7");
  });
});
