import chalk from "chalk";
import { describe, expect, test } from "vitest";
import type { StatusOutput, SyncOutput } from "../../types/task";
import { colorFor, formatSummary, paint, shortSha, singleLine } from "../../utils/formatters";

const plain = new chalk.Instance({ level: 0 });

const baseOutput = { exitCode: 0, stdOutLineCount: 1, stdErrLineCount: 0, vars: {}, rawOutput: "{}" };

describe("colorFor", () => {
  test("should color states case-insensitively", () => {
    expect(colorFor("Synced")).toEqual({ color: "green" });
    expect(colorFor("HEALTHY")).toEqual({ color: "green" });
    expect(colorFor("OutOfSync")).toEqual({ color: "red" });
    expect(colorFor("Progressing")).toEqual({ color: "yellow" });
    expect(colorFor("Unknown")).toEqual({ dimColor: true });
    expect(colorFor("Other")).toEqual({});
    expect(colorFor("")).toEqual({});
  });
});

describe("paint", () => {
  test("should leave text unchanged without colors", () => {
    expect(paint("Degraded", plain)).toBe("Degraded");
  });
});

describe("shortSha", () => {
  test("should keep seven characters", () => {
    expect(shortSha("723b86e1a2b3c4d5")).toBe("723b86e");
    expect(shortSha(undefined)).toBe("");
  });
});

describe("singleLine", () => {
  test("should collapse whitespace and newlines", () => {
    expect(singleLine("  Unexpected token\n\tin   JSON  ")).toBe("Unexpected token in JSON");
  });
});

describe("formatSummary", () => {
  test("should summarize a sync result", () => {
    const output: SyncOutput = {
      ...baseOutput,
      syncStatus: "Synced",
      healthStatus: "Healthy",
      revision: "723b86e1a2b3c4d5",
      resources: [{ kind: "Deployment" }],
    };

    expect(formatSummary("my-app", output, plain)).toBe(
      "App: my-app • Sync: Synced • Health: Healthy • Revision: 723b86e • Resources: 1",
    );
  });

  test("should count conditions of a status result", () => {
    const output: StatusOutput = {
      ...baseOutput,
      syncStatus: "OutOfSync",
      conditions: [{ type: "SyncError" }, { type: "ComparisonError" }],
    };

    expect(formatSummary("web", output, plain)).toBe("App: web • Sync: OutOfSync • Health: — • Conditions: 2");
  });

  test("should mention why the output could not be parsed", () => {
    const output: StatusOutput = {
      ...baseOutput,
      rawOutput: "time=... level=fatal",
      parseWarning: { reason: "no-json", message: "No JSON object found in ArgoCD output" },
    };

    expect(formatSummary("web", output, plain)).toBe(
      "App: web • Sync: — • Health: — • (unparsed: No JSON object found in ArgoCD output)",
    );
  });
});
