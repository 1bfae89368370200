import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";
import { ZodError } from "zod";
import { DEFAULT_CONFIG, expandPath, loadConfig, mergeConfig } from "./index.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agenda-stf-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("has defaults", () => {
    expect(DEFAULT_CONFIG).toEqual({
      dateFormat: 1,
      encoding: "latin1",
      indent: 2,
      showComments: true,
    });
  });

  it("loads a file and fills in missing settings", () => {
    const path = join(dir, "settings.json");
    writeFileSync(path, JSON.stringify({ dateFormat: 7, encoding: "utf8" }));

    expect(loadConfig(path)).toEqual({
      dateFormat: 7,
      encoding: "utf8",
      indent: 2,
      showComments: true,
    });
  });

  it("fails on a missing explicit file", () => {
    const path = join(dir, "missing.json");
    expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
  });

  it("fails on invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ dateFormat: ");
    expect(() => loadConfig(path)).toThrow(`Invalid JSON in config file: ${path}`);
  });

  it("validates values", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ dateFormat: 13 }));
    expect(() => loadConfig(path)).toThrow(ZodError);
  });

  it("merges only the overrides that are set", () => {
    expect(mergeConfig(DEFAULT_CONFIG, { dateFormat: 5, encoding: undefined })).toEqual({
      ...DEFAULT_CONFIG,
      dateFormat: 5,
    });
    expect(() => mergeConfig(DEFAULT_CONFIG, { indent: -1 })).toThrow(ZodError);
  });

  it("expands home-relative paths", () => {
    expect(expandPath("~/exports/agenda.stf")).toBe(join(homedir(), "exports/agenda.stf"));
    expect(expandPath("$HOME/agenda.stf")).toBe(join(homedir(), "agenda.stf"));
  });
});
