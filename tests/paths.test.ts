import { expect } from "chai";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { after, before, describe, it } from "mocha";

import { PathResolutionError, isRegularFile, resolveWithin, sanitizeFilename } from "../src/paths.js";
import { createTempDir } from "./helpers/bridgeHarness.js";

describe("path helpers", () => {
  let root: string;

  before(async () => {
    root = await createTempDir("bridge-paths-");
    await mkdir(path.join(root, "pkg"));
    await writeFile(path.join(root, "pkg", "main.py"), "print('hi')\n");
  });

  after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("resolves nested segments inside the root", () => {
    expect(resolveWithin(root, "pkg", "main.py")).to.equal(path.join(root, "pkg", "main.py"));
  });

  it("rejects traversal and absolute escapes", () => {
    expect(() => resolveWithin(root, "../outside.txt")).to.throw(PathResolutionError, "path escapes base directory");
    expect(() => resolveWithin(root, "/etc/passwd")).to.throw(PathResolutionError);
  });

  it("only accepts regular files", async () => {
    expect(await isRegularFile(path.join(root, "pkg", "main.py"))).to.equal(true);
    expect(await isRegularFile(path.join(root, "pkg"))).to.equal(false);
    expect(await isRegularFile(path.join(root, "missing.py"))).to.equal(false);
    expect(await isRegularFile(path.join(root, "pkg", "main.py", "nested"))).to.equal(false);
  });

  it("sanitises names for directory use", () => {
    expect(sanitizeFilename("weather/../api key")).to.equal("weather_api_key");
    expect(sanitizeFilename("   ")).to.equal("unnamed");
    expect(sanitizeFilename("a".repeat(80))).to.have.lengthOf(64);
  });
});
