export type InstalledVersion =
  | { kind: "not-installed" }
  | { kind: "unresolved" }
  | { kind: "known"; version: string };

export type LatestVersion = { kind: "unresolved" } | { kind: "known"; version: string };

export type UpdateOutcome =
  | "fresh-install"
  | "latest-unknown"
  | "up-to-date"
  | "update-available"
  | "installed-newer"
  | "non-standard-format";

export type UpdateDecision = {
  updateNeeded: boolean;
  outcome: UpdateOutcome;
  reason: string;
};

const STANDARD_VERSION = /^\d+\.\d+\.\d+\.\d+$/;
const URL_VERSION = /bedrock-server-(\d+\.\d+\.\d+\.\d+)/;

export function knownVersion(version: string): { kind: "known"; version: string } {
  return { kind: "known", version };
}

export function isStandardVersion(version: string): boolean {
  return STANDARD_VERSION.test(version);
}

export function extractVersionFromText(text: string): string | null {
  const match = text.match(URL_VERSION);
  return match?.[1] ?? null;
}

export function describeVersion(version: InstalledVersion | LatestVersion): string {
  switch (version.kind) {
    case "not-installed":
      return "not-installed";
    case "unresolved":
      return "unknown";
    case "known":
      return version.version;
  }
}

/**
 * Numeric, component-wise comparison of two four-part versions.
 * Returns a negative number when `a` is older, positive when newer, 0 when equal.
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split(".").map(Number);
  const right = b.split(".").map(Number);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i += 1) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l !== r) {
      return l < r ? -1 : 1;
    }
  }

  return 0;
}

export function decide(installed: InstalledVersion, latest: LatestVersion): UpdateDecision {
  if (installed.kind === "not-installed") {
    return {
      updateNeeded: true,
      outcome: "fresh-install",
      reason: "Server is not installed, proceeding with fresh installation",
    };
  }

  if (latest.kind === "unresolved") {
    return {
      updateNeeded: false,
      outcome: "latest-unknown",
      reason: "Could not determine latest version, skipping update",
    };
  }

  if (installed.kind === "known" && installed.version === latest.version) {
    return { updateNeeded: false, outcome: "up-to-date", reason: "Server is already up to date" };
  }

  if (installed.kind === "known" && isStandardVersion(installed.version) && isStandardVersion(latest.version)) {
    const order = compareVersions(installed.version, latest.version);
    if (order < 0) {
      return {
        updateNeeded: true,
        outcome: "update-available",
        reason: `Server update available: ${installed.version} -> ${latest.version}`,
      };
    }
    if (order > 0) {
      return {
        updateNeeded: false,
        outcome: "installed-newer",
        reason: `Installed version (${installed.version}) appears newer than detected latest (${latest.version}); this might indicate a detection issue`,
      };
    }
    // Numerically equal but textually different (e.g. 1.21.44.01 vs 1.21.44.1).
    return { updateNeeded: false, outcome: "up-to-date", reason: "Server is already up to date" };
  }

  return {
    updateNeeded: true,
    outcome: "non-standard-format",
    reason: "Cannot reliably compare versions (non-standard format), updating as a safety measure",
  };
}

// Exit codes of `bedrock-manager check`.
export function checkExitCode(decision: UpdateDecision): number {
  switch (decision.outcome) {
    case "up-to-date":
      return 0;
    case "fresh-install":
    case "latest-unknown":
      return 1;
    case "update-available":
    case "non-standard-format":
      return 2;
    case "installed-newer":
      return 3;
  }
}
