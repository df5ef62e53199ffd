import { describe, expect, test } from "vitest";
import { parseCliArgs } from "../../cli/args";

describe("parseCliArgs", () => {
  test("should collect task properties from flags", () => {
    const parsed = parseCliArgs([
      "sync",
      "my-app",
      "--server",
      "argocd.example.com",
      "--token",
      "test-token",
      "--prune",
      "--no-insecure",
      "--timeout=5m",
      "--env",
      "FOO=bar",
      "--env",
      "BAZ=a=b",
    ]);

    expect(parsed._unsafeUnwrap()).toEqual({
      command: "sync",
      help: false,
      version: false,
      format: "json",
      overrides: {
        application: "my-app",
        server: "argocd.example.com",
        token: "test-token",
        prune: true,
        insecure: false,
        timeout: "5m",
        env: { FOO: "bar", BAZ: "a=b" },
      },
    });
  });

  test("should map get to the status command", () => {
    expect(parseCliArgs(["get", "my-app", "--refresh"])._unsafeUnwrap().command).toBe("status");
    expect(parseCliArgs(["status"])._unsafeUnwrap().command).toBe("status");
  });

  test("should keep inline boolean values for later validation", () => {
    expect(parseCliArgs(["sync", "--dry-run=false"])._unsafeUnwrap().overrides).toEqual({ dryRun: "false" });
  });

  test("should accept values that start with dashes", () => {
    const pem = "-----BEGIN CERTIFICATE-----";
    expect(parseCliArgs(["sync", "--server-cert", pem])._unsafeUnwrap().overrides.serverCert).toBe(pem);
  });

  test("should read file and format options", () => {
    const parsed = parseCliArgs(["status", "--config", "task.yaml", "--server-cert-file", "ca.pem", "--format", "text"]);
    expect(parsed._unsafeUnwrap()).toMatchObject({ configFile: "task.yaml", serverCertFile: "ca.pem", format: "text" });
  });

  test("should map alias flags to the same property", () => {
    const parsed = parseCliArgs(["sync", "--app", "web", "--auth-token", "test-token", "--image", "alpine:3"]);
    expect(parsed._unsafeUnwrap().overrides).toEqual({ application: "web", token: "test-token", containerImage: "alpine:3" });
  });

  test("should report help and version without a command", () => {
    const help = parseCliArgs(["-h"])._unsafeUnwrap();
    expect(help.help).toBe(true);
    expect(help.command).toBeUndefined();
    expect(parseCliArgs(["--version"])._unsafeUnwrap().version).toBe(true);
  });

  test.each([
    { argv: ["sync", "--bogus"], message: "Unknown option --bogus" },
    { argv: ["sync", "--server"], message: "Option --server requires a value" },
    { argv: ["sync", "--format", "yaml"], message: "Option --format must be json or text, got 'yaml'" },
    { argv: ["sync", "--env", "FOO"], message: "Option --env expects KEY=VALUE, got 'FOO'" },
    { argv: ["sync", "a", "b"], message: "Unexpected argument 'b'" },
    { argv: ["deploy"], message: "Unknown command 'deploy'" },
  ])("should reject $argv", ({ argv, message }) => {
    expect(parseCliArgs(argv)._unsafeUnwrapErr()).toEqual({ type: "configuration", message });
  });
});
