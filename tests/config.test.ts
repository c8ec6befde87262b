import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync } from "node:fs";
import { delimiter, join } from "node:path";
import { parseArgs } from "../src/cli/args.js";
import { parseBool, resolveOptions, trustedIdFilePath } from "../src/cli/config.js";
import { ValidationError } from "../src/pipeline/errors.js";
import { tempDir, writeText } from "./helpers/fixtures.js";

function resolve(argv: string[], env: Record<string, string> = {}) {
  return resolveOptions(parseArgs(["config", "show", ...argv]), env);
}

describe("parseArgs", () => {
  it("collects repeated flags in order", () => {
    const args = parseArgs(["validate", "a.pkg", "--allow-symlink-prefix", "/x", "--allow-symlink-prefix", "/y"]);
    expect(args.positional).toEqual(["validate", "a.pkg"]);
    expect(args.flags.get("allow-symlink-prefix")).toEqual(["/x", "/y"]);
  });

  it("treats a flag followed by another flag as boolean", () => {
    const args = parseArgs(["--json", "--verbose"]);
    expect([...args.boolFlags]).toEqual(["json", "verbose"]);
    expect(args.flags.get("verbose")).toEqual(["true"]);
  });

  it("never takes a value for switches", () => {
    const args = parseArgs(["validate", "--json", "Example.app", "--ids", "ids.txt"]);
    expect(args.positional).toEqual(["validate", "Example.app"]);
    expect(args.boolFlags.has("json")).toBe(true);
    expect(args.flags.get("ids")).toEqual(["ids.txt"]);
  });

  it("lets --verbose take only a boolean word", () => {
    const bare = parseArgs(["validate", "--verbose", "Example.app"]);
    expect(bare.positional).toEqual(["validate", "Example.app"]);
    expect(bare.flags.get("verbose")).toEqual(["true"]);

    const valued = parseArgs(["validate", "--verbose", "no", "Example.app"]);
    expect(valued.positional).toEqual(["validate", "Example.app"]);
    expect(valued.flags.get("verbose")).toEqual(["no"]);
  });

  it("maps -h to help", () => {
    expect(parseArgs(["-h"]).boolFlags.has("help")).toBe(true);
  });
});

describe("parseBool", () => {
  it("accepts the usual spellings", () => {
    expect(parseBool("YES", "x")).toBe(true);
    expect(parseBool(" 0 ", "x")).toBe(false);
  });

  it("rejects anything else with the source named", () => {
    expect(() => parseBool("maybe", "INSTALLGUARD_VERBOSE")).toThrow(
      'INSTALLGUARD_VERBOSE: expected a boolean (true/false, yes/no, 1/0), got "maybe"',
    );
  });
});

describe("resolveOptions", () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir("config-");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults", () => {
    expect(resolve([])).toEqual({
      failOnWorldWritable: true,
      failOnSetuid: true,
      failOnSymlinkEscape: true,
      verbose: false,
      allowedSymlinkPrefixes: [],
      toolTimeoutMs: 300_000,
    });
  });

  it("returns frozen options", () => {
    const options = resolve(["--allow-symlink-prefix", "/opt"]);
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.allowedSymlinkPrefixes)).toBe(true);
  });

  it("reads the environment", () => {
    const options = resolve([], {
      INSTALLGUARD_FAIL_ON_SETUID: "no",
      INSTALLGUARD_VERBOSE: "1",
      INSTALLGUARD_ALLOWED_SYMLINK_PREFIXES: ["/opt/a", "/opt/b"].join(delimiter),
      INSTALLGUARD_TOOL_TIMEOUT_MS: "1500",
    });
    expect(options.failOnSetuid).toBe(false);
    expect(options.verbose).toBe(true);
    expect(options.allowedSymlinkPrefixes).toEqual(["/opt/a", "/opt/b"]);
    expect(options.toolTimeoutMs).toBe(1500);
  });

  it("lets flags override the environment", () => {
    const options = resolve(
      ["--fail-on-world-writable", "true", "--allow-symlink-prefix", "/x"],
      {
        INSTALLGUARD_FAIL_ON_WORLD_WRITABLE: "false",
        INSTALLGUARD_ALLOWED_SYMLINK_PREFIXES: "/env",
      },
    );
    expect(options.failOnWorldWritable).toBe(true);
    expect(options.allowedSymlinkPrefixes).toEqual(["/x"]);
  });

  it("uses NAME as the recipe hint unless the dedicated variable is set", () => {
    expect(resolve([], { NAME: "Firefox" }).recipeHint).toBe("Firefox");
    expect(
      resolve([], { NAME: "Firefox", INSTALLGUARD_RECIPE_NAME: "Thunderbird" }).recipeHint,
    ).toBe("Thunderbird");
    expect(resolve(["--recipe", "Zed"], { NAME: "Firefox" }).recipeHint).toBe("Zed");
  });

  it("rejects a malformed boolean in the environment", () => {
    try {
      resolve([], { INSTALLGUARD_VERBOSE: "maybe" });
      expect.unreachable("should have thrown");
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(ValidationError);
      if (e instanceof ValidationError) expect(e.code).toBe("CONFIG_INVALID");
    }
  });

  it("rejects a malformed timeout flag", () => {
    expect(() => resolve(["--timeout-ms", "abc"])).toThrow(
      '--timeout-ms: expected a non-negative integer, got "abc"',
    );
  });

  it("reports out-of-range values as invalid options", () => {
    expect(() => resolve(["--timeout-ms", "90000000"])).toThrow(/^Invalid options: toolTimeoutMs: /);
  });

  it("layers a YAML file below the environment", () => {
    const file = writeText(
      join(dir, "installguard.yaml"),
      "failOnSetuid: false\nverbose: true\nallowedSymlinkPrefixes:\n  - /opt/shared\n",
    );
    const options = resolve(["--config", file], { INSTALLGUARD_VERBOSE: "false" });
    expect(options.failOnSetuid).toBe(false);
    expect(options.verbose).toBe(false);
    expect(options.allowedSymlinkPrefixes).toEqual(["/opt/shared"]);
  });

  it("finds the config file through the environment", () => {
    const file = writeText(join(dir, "installguard.yaml"), "toolTimeoutMs: 2000\n");
    expect(resolve([], { INSTALLGUARD_CONFIG: file }).toolTimeoutMs).toBe(2000);
  });

  it("treats an empty config file as no settings", () => {
    const file = writeText(join(dir, "empty.yaml"), "");
    expect(resolve(["--config", file]).failOnSetuid).toBe(true);
  });

  it("rejects unknown keys in the config file", () => {
    const file = writeText(join(dir, "bad.yaml"), "failOnEverything: true\n");
    expect(() => resolve(["--config", file])).toThrow(/failOnEverything/);
  });

  it("rejects wrongly typed values in the config file", () => {
    const file = writeText(join(dir, "bad.yaml"), "verbose: sometimes\n");
    expect(() => resolve(["--config", file])).toThrow(`${file}: verbose: `);
  });

  it("rejects a missing config file", () => {
    const file = join(dir, "missing.yaml");
    expect(() => resolve(["--config", file])).toThrow(`Config file not found: ${file}`);
  });
});

describe("trustedIdFilePath", () => {
  it("prefers --ids over the environment", () => {
    const env = { INSTALLGUARD_ID_FILE: "/env/ids.txt" };
    expect(trustedIdFilePath(parseArgs(["--ids", "/flag/ids.txt"]), env)).toBe("/flag/ids.txt");
    expect(trustedIdFilePath(parseArgs([]), env)).toBe("/env/ids.txt");
  });
});
