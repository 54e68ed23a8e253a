import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: "voicelens.db",
      vaultDirCandidates: [path.join(os.homedir(), ".voicelens", "audio_analysis")],
      recordingTmpDir: path.resolve(os.tmpdir()),
      port: 4000,
      logLevel: "info",
    });
  });

  it("puts the external vault dir first and expands ~", () => {
    const config = loadConfig({
      VAULT_EXTERNAL_DIR: "/mnt/shared/voicelens",
      VAULT_PRIVATE_DIR: "~/private-vault",
      RECORDING_TMP_DIR: "/var/tmp/voicelens",
      PORT: "8080",
      LOG_LEVEL: "debug",
      DATABASE_URL: ":memory:",
    });

    expect(config.vaultDirCandidates).toEqual([
      "/mnt/shared/voicelens",
      path.join(os.homedir(), "private-vault"),
    ]);
    expect(config.recordingTmpDir).toBe("/var/tmp/voicelens");
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.databaseUrl).toBe(":memory:");
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it("lists every invalid variable", () => {
    expect(() => loadConfig({ PORT: "0", LOG_LEVEL: "loud" })).toThrow(
      /^Invalid environment configuration: PORT: .*; LOG_LEVEL: /,
    );
  });
});
