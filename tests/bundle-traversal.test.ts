import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync } from "node:fs";
import { join } from "node:path";
import { scanComponents } from "../src/signing/bundle-traversal.js";
import {
  FakeInspector,
  OTHER_TRUSTED,
  TRUSTED,
  UNTRUSTED,
  componentText,
  exited,
  link,
  makeApp,
  makeDir,
  tempDir,
  writeBinary,
  writeText,
} from "./helpers/fixtures.js";

const TRUSTED_SET: ReadonlySet<string> = new Set([TRUSTED]);

describe("scanComponents", () => {
  let base: string;
  let app: string;
  let main: string;
  let inspector: FakeInspector;

  beforeEach(() => {
    base = tempDir("bundle-");
    ({ app, main } = makeApp(base));
    inspector = new FakeInspector();
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it("passes an app whose only binary is trusted", async () => {
    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result).toEqual({
      ok: true,
      value: { components: [{ path: main, kind: "binary", teamId: TRUSTED }] },
    });
    expect(inspector.inspected).toEqual([main]);
  });

  it("fails on a framework with an untrusted identity", async () => {
    const framework = makeDir(join(app, "Contents", "Frameworks", "Helper.framework"));
    inspector.team(framework, UNTRUSTED);

    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure).toEqual({
      code: "UNTRUSTED_COMPONENT_IDENTITY",
      message: `Untrusted Team ID in ${framework} (team ID: ${UNTRUSTED})`,
      path: framework,
      detail: UNTRUSTED,
    });
  });

  it("never descends into a verified nested bundle", async () => {
    const framework = join(app, "Contents", "Frameworks", "Helper.framework");
    const inner = writeBinary(join(framework, "Versions", "A", "Helper"));
    link("Versions/A/Helper", join(framework, "Helper"));
    const plugin = join(app, "Contents", "PlugIns", "Share.appex");
    writeBinary(join(plugin, "Contents", "MacOS", "Share"));
    // Would fail if it were inspected as a loose binary.
    inspector.team(inner, UNTRUSTED);

    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result.ok).toBe(true);
    expect(inspector.inspected).toEqual([framework, main, plugin]);
    if (!result.ok) return;
    expect(result.value.components.map((c) => [c.path, c.kind])).toEqual([
      [framework, "bundle"],
      [main, "binary"],
      [plugin, "bundle"],
    ]);
  });

  it("skips reserved metadata directories", async () => {
    writeBinary(join(app, "Contents", "Resources", "bundled-tool"));
    writeBinary(join(app, "Contents", "Resources", "Extras.bundle", "Contents", "MacOS", "x"));
    writeText(join(app, "Contents", "_CodeSignature", "CodeResources"));
    writeBinary(join(app, "Contents", "_MASReceipt", "receipt"));

    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result.ok).toBe(true);
    expect(inspector.inspected).toEqual([main]);
  });

  it("matches reserved names by whole path segment", async () => {
    const tool = writeBinary(join(app, "Contents", "SharedResources", "tool"));
    await scanComponents(app, TRUSTED_SET, inspector);
    expect(inspector.inspected).toEqual([main, tool]);
  });

  it("does not inspect a binary twice through a symlink", async () => {
    link("Example", join(app, "Contents", "MacOS", "Example-alias"));
    await scanComponents(app, TRUSTED_SET, inspector);
    expect(inspector.inspected).toEqual([main]);
  });

  it("ignores files without a Mach-O header", async () => {
    writeText(join(app, "Contents", "MacOS", "launcher.sh"), "#!/bin/sh\nexec ./Example\n");
    await scanComponents(app, TRUSTED_SET, inspector);
    expect(inspector.inspected).toEqual([main]);
  });

  it("passes trivially with no native components", async () => {
    rmSync(main);
    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result).toEqual({ ok: true, value: { components: [] } });
    expect(inspector.inspected).toEqual([]);
  });

  it("fails when inspection exits non-zero", async () => {
    inspector.components.set(main, exited("", 1, `${main}: code object is not signed at all`));
    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.code).toBe("SIGNATURE_INSPECTION_FAILED");
    expect(result.failure.path).toBe(main);
    expect(result.failure.detail).toBe(`${main}: code object is not signed at all`);
  });

  it("fails on an unsigned loose binary", async () => {
    inspector.team(main, null);
    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.message).toBe(`Untrusted native binary: ${main} (team ID: none)`);
  });

  it("reports inspection timeouts", async () => {
    inspector.components.set(main, { kind: "timeout", command: "codesign", timeoutMs: 50 });
    const result = await scanComponents(app, TRUSTED_SET, inspector);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.code).toBe("EXTERNAL_TOOL_TIMEOUT");
    expect(result.failure.path).toBe(main);
  });

  it("stops at the first failure", async () => {
    const early = makeDir(join(app, "Contents", "Frameworks", "A.framework"));
    makeDir(join(app, "Contents", "Frameworks", "B.framework"));
    inspector.team(early, UNTRUSTED);

    await scanComponents(app, TRUSTED_SET, inspector);
    expect(inspector.inspected).toEqual([early]);
  });

  it("checks each component against the whole trusted set", async () => {
    const framework = makeDir(join(app, "Contents", "Frameworks", "Vendor.framework"));
    inspector.components.set(framework, exited(componentText(OTHER_TRUSTED)));

    const result = await scanComponents(app, new Set([TRUSTED, OTHER_TRUSTED]), inspector);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.components.map((c) => c.teamId)).toEqual([OTHER_TRUSTED, TRUSTED]);
  });

  it("notifies each verified component", async () => {
    const seen: string[] = [];
    await scanComponents(app, TRUSTED_SET, inspector, { onComponent: (c) => seen.push(c.path) });
    expect(seen).toEqual([main]);
  });
});
