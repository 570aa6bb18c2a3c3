import { expect } from "chai";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it } from "mocha";

import { createChildProcessGateway } from "../src/gateways/childProcess.js";
import { DependencyInstaller } from "../src/provisioning/dependencies.js";
import type { Workspace } from "../src/provisioning/workspace.js";
import type { RuntimeProfile } from "../src/runtimes/profiles.js";
import { createTempDir } from "./helpers/bridgeHarness.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Profile whose installer is an inline Node.js script receiving `<manifest> <target>`. */
function scriptedProfile(script: string | null, command = process.execPath): RuntimeProfile {
  return {
    language: "python",
    command,
    buildArgs: (entrypoint) => [entrypoint],
    searchPathVariable: "PYTHONPATH",
    dependencyManifest: "requirements.txt",
    installArgs: (manifest, target) => (script === null ? null : ["-e", script, manifest, target]),
  };
}

describe("dependency installer", () => {
  let root: string;
  let workspace: Workspace;
  let targetDir: string;
  let logger: RecordingLogger;

  beforeEach(async () => {
    root = await createTempDir("bridge-deps-");
    workspace = { name: "weather", root, path: path.join(root, "repo") };
    targetDir = path.join(root, "site-packages");
    logger = new RecordingLogger();
    await mkdir(workspace.path, { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function installer(profile: RuntimeProfile, timeoutMs?: number): DependencyInstaller {
    return new DependencyInstaller({
      profile,
      gateway: createChildProcessGateway(),
      targetDir,
      logger,
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    });
  }

  it("skips workspaces without a manifest", async () => {
    const report = await installer(scriptedProfile("process.exit(0)")).install(workspace);
    expect(report).to.deep.equal({ status: "skipped", reason: "requirements.txt not found" });
    expect(logger.entries).to.deep.equal([]);
  });

  it("skips runtimes without an installer", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "httpx\n");
    const report = await installer(scriptedProfile(null)).install(workspace);
    expect(report).to.deep.equal({ status: "skipped", reason: "runtime python has no installer" });
  });

  it("runs the installer into the shared target", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "httpx\n");
    const script =
      "const fs = require('fs'); const p = require('path');" +
      "fs.writeFileSync(p.join(process.argv[2], 'installed.txt'), fs.readFileSync(process.argv[1], 'utf8'));";
    const report = await installer(scriptedProfile(script)).install(workspace);

    expect(report.status).to.equal("installed");
    if (report.status === "installed") {
      expect(report.manifest).to.equal(path.join(workspace.path, "requirements.txt"));
    }
    expect(await readFile(path.join(targetDir, "installed.txt"), "utf8")).to.equal("httpx\n");
    expect(logger.messages()).to.deep.equal(["dependency_install_started", "dependency_install_completed"]);
  });

  it("reports a failing installer without raising", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "no-such-package==0.0.0\n");
    const script = "process.stderr.write('No matching distribution found'); process.exit(1);";
    const report = await installer(scriptedProfile(script)).install(workspace);

    expect(report.status).to.equal("failed");
    if (report.status === "failed") {
      expect(report.exitCode).to.equal(1);
      expect(report.reason).to.equal("No matching distribution found");
    }
    const warning = logger.find("dependency_install_failed");
    expect(warning?.level).to.equal("warn");
    expect(warning?.payload).to.deep.equal({
      kind: "DependencyInstallFailure",
      manifest: path.join(workspace.path, "requirements.txt"),
      reason: "No matching distribution found",
      exit_code: 1,
    });
  });

  it("kills an installer that outlives its timeout", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "httpx\n");
    const report = await installer(scriptedProfile("setTimeout(() => {}, 10000);"), 200).install(workspace);

    expect(report.status).to.equal("failed");
    if (report.status === "failed") {
      expect(report.exitCode).to.equal(null);
      expect(report.reason).to.equal("installer exited with a signal");
    }
  });

  it("keeps reading a verbose installer so it can finish", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "httpx\n");
    const script = "process.stdout.write('Collecting httpx\\n'.repeat(20000));";
    const startedAt = Date.now();
    const report = await installer(scriptedProfile(script), 10_000).install(workspace);

    expect(report.status).to.equal("installed");
    expect(Date.now() - startedAt).to.be.below(5_000);
  });

  it("stops the installer when the session signal aborts", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "httpx\n");
    const controller = new AbortController();
    const startedAt = Date.now();
    const pending = installer(scriptedProfile("setTimeout(() => {}, 10000);")).install(workspace, controller.signal);
    setTimeout(() => controller.abort(), 200);
    const report = await pending;

    expect(report.status).to.equal("failed");
    if (report.status === "failed") {
      expect(report.exitCode).to.equal(null);
      expect(report.reason).to.equal("installer exited with a signal");
    }
    expect(Date.now() - startedAt).to.be.below(5_000);
  });

  it("skips the install when the session is already closing", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "httpx\n");
    const controller = new AbortController();
    controller.abort();
    const report = await installer(scriptedProfile("process.exit(0)")).install(workspace, controller.signal);
    expect(report).to.deep.equal({ status: "skipped", reason: "installation cancelled" });
    expect(logger.entries).to.deep.equal([]);
  });

  it("reports a missing interpreter", async () => {
    await writeFile(path.join(workspace.path, "requirements.txt"), "httpx\n");
    const missing = path.join(root, "no-such-python");
    const report = await installer(scriptedProfile("process.exit(0)", missing)).install(workspace);

    expect(report.status).to.equal("failed");
    if (report.status === "failed") {
      expect(report.exitCode).to.equal(null);
      expect(report.reason).to.contain("ENOENT");
    }
  });
});
