import { describe, expect, test } from "vitest";
import {
  extractJson,
  extractOutcome,
  parseOutcome,
  STATUS_OUTCOME_FIELDS,
  SYNC_OUTCOME_FIELDS,
} from "../../tasks/result-extractor";

describe("extractJson", () => {
  test("should cut the object out of surrounding noise", () => {
    expect(extractJson('noise {"a":1} trailer')).toBe('{"a":1}');
  });

  test("should span from the first to the last brace", () => {
    expect(extractJson('x {"a":{"b":2}} y }')).toBe('{"a":{"b":2}} y }');
  });

  test("should return null without braces", () => {
    expect(extractJson("no braces here")).toBeNull();
    expect(extractJson("")).toBeNull();
  });

  test("should return null when the closing brace comes first", () => {
    expect(extractJson("} then {")).toBeNull();
  });
});

describe("parseOutcome", () => {
  const syncJson =
    '{"status":{"sync":{"status":"Synced","revision":"abc123"},"health":{"status":"Healthy"},"resources":[{"kind":"Deployment"}]}}';

  test("should map the known status fields", () => {
    expect(parseOutcome(syncJson)._unsafeUnwrap()).toEqual({
      syncStatus: "Synced",
      healthStatus: "Healthy",
      revision: "abc123",
      resources: [{ kind: "Deployment" }],
    });
  });

  test("should only pick the requested fields", () => {
    const json = '{"status":{"sync":{"status":"Synced","revision":"abc"},"conditions":[{"type":"SyncError"}]}}';
    expect(parseOutcome(json, SYNC_OUTCOME_FIELDS)._unsafeUnwrap()).toEqual({ syncStatus: "Synced", revision: "abc" });
    expect(parseOutcome(json, STATUS_OUTCOME_FIELDS)._unsafeUnwrap()).toEqual({
      syncStatus: "Synced",
      conditions: [{ type: "SyncError" }],
    });
  });

  test("should populate conditions without resources", () => {
    const outcome = parseOutcome('{"status":{"conditions":[{"type":"OrphanedResourceWarning"}]}}')._unsafeUnwrap();
    expect(outcome.conditions).toEqual([{ type: "OrphanedResourceWarning" }]);
    expect(outcome.resources).toBeUndefined();
  });

  test("should treat a missing status object as empty", () => {
    expect(parseOutcome('{"metadata":{"name":"demo"}}')._unsafeUnwrap()).toEqual({});
  });

  test("should ignore fields of the wrong type", () => {
    const json = '{"status":{"sync":{"status":3},"health":"Healthy","resources":{"kind":"Pod"}}}';
    expect(parseOutcome(json)._unsafeUnwrap()).toEqual({});
  });

  test("should pass resource entries through untouched", () => {
    const json = '{"status":{"resources":[{"kind":"Service","health":{"status":"Healthy"},"requiresPruning":true}]}}';
    expect(parseOutcome(json)._unsafeUnwrap().resources).toEqual([
      { kind: "Service", health: { status: "Healthy" }, requiresPruning: true },
    ]);
  });

  test("should keep array entries as decoded", () => {
    const json = '{"status":{"resources":[{"kind":"Pod"},"orphan",null,7],"conditions":[["nested"],{"type":"SyncError"}]}}';
    const outcome = parseOutcome(json)._unsafeUnwrap();
    expect(outcome.resources).toEqual([{ kind: "Pod" }, "orphan", null, 7]);
    expect(outcome.conditions).toEqual([["nested"], { type: "SyncError" }]);
  });

  test("should report a decode failure", () => {
    const warning = parseOutcome("{not json}")._unsafeUnwrapErr();
    expect(warning.reason).toBe("decode");
    expect(warning.message.startsWith("Failed to parse ArgoCD output as JSON: ")).toBe(true);
  });

  test("should reject a top-level array", () => {
    expect(parseOutcome("[1,2]")._unsafeUnwrapErr()).toEqual({
      reason: "decode",
      message: "Failed to parse ArgoCD output as JSON: expected an object",
    });
  });
});

describe("extractOutcome", () => {
  test("should keep only raw text for malformed output", () => {
    expect(extractOutcome("not-json", SYNC_OUTCOME_FIELDS)).toEqual({
      outcome: { rawOutput: "not-json" },
      warning: { reason: "no-json", message: "No JSON object found in ArgoCD output" },
    });
  });

  test("should warn on empty output", () => {
    expect(extractOutcome("", SYNC_OUTCOME_FIELDS)).toEqual({
      outcome: { rawOutput: "" },
      warning: { reason: "empty", message: "ArgoCD produced no output to parse" },
    });
  });

  test("should keep raw text when the braces do not hold JSON", () => {
    const result = extractOutcome("level=warn {oops}", SYNC_OUTCOME_FIELDS);
    expect(result.outcome).toEqual({ rawOutput: "level=warn {oops}" });
    expect(result.warning?.reason).toBe("decode");
  });

  test("should parse JSON printed between log lines", () => {
    const raw = 'WARN: client is outdated\n{"status":{"sync":{"status":"OutOfSync"},"health":{"status":"Progressing"}}}\ndone';
    expect(extractOutcome(raw, STATUS_OUTCOME_FIELDS)).toEqual({
      outcome: { syncStatus: "OutOfSync", healthStatus: "Progressing", rawOutput: raw },
    });
  });

  test("should give identical results for identical input", () => {
    const raw = '{"status":{"sync":{"status":"Synced"},"resources":[{"kind":"Deployment"}]}}';
    const first = extractOutcome(raw, SYNC_OUTCOME_FIELDS);
    const second = extractOutcome(raw, SYNC_OUTCOME_FIELDS);
    expect(second).toEqual(first);
    expect(second.outcome.resources).not.toBe(first.outcome.resources);
  });
});
