import { expect } from "chai";
import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it } from "mocha";
import sinon from "sinon";

import { createChildProcessGateway, type ChildProcessGateway } from "../src/gateways/childProcess.js";
import { HANDSHAKE_LINES } from "../src/process/handshake.js";
import type { ServerProcess } from "../src/process/serverProcess.js";
import { ProcessSupervisor, type ProcessSupervisorOptions } from "../src/process/supervisor.js";
import { allocateWorkspace, type Workspace } from "../src/provisioning/workspace.js";
import { createNodeProfile } from "../src/runtimes/profiles.js";
import { FIXTURE_ENTRYPOINT, createTempDir } from "./helpers/bridgeHarness.js";
import { installFixture } from "./helpers/childRunner.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("process supervisor", () => {
  let root: string;
  let logger: RecordingLogger;
  let gateway: ChildProcessGateway;
  let spawnSpy: sinon.SinonSpy;
  const running: Array<{ supervisor: ProcessSupervisor; server: ServerProcess }> = [];

  beforeEach(async () => {
    root = await createTempDir("bridge-supervisor-");
    logger = new RecordingLogger();
    gateway = createChildProcessGateway();
    spawnSpy = sinon.spy(gateway, "spawn");
  });

  afterEach(async () => {
    while (running.length > 0) {
      const entry = running.pop();
      if (entry) {
        await entry.supervisor.kill(entry.server);
      }
    }
    sinon.restore();
    await rm(root, { recursive: true, force: true });
  });

  function supervisor(overrides: Partial<ProcessSupervisorOptions> = {}): ProcessSupervisor {
    return new ProcessSupervisor({
      profile: createNodeProfile(),
      gateway,
      logger,
      killGraceMs: 300,
      ...overrides,
    });
  }

  async function workspaceWith(fixture: string): Promise<Workspace> {
    const workspace = await allocateWorkspace(root, fixture);
    installFixture(fixture, path.join(workspace.path, FIXTURE_ENTRYPOINT));
    return workspace;
  }

  async function start(target: ProcessSupervisor, fixture: string): Promise<ServerProcess> {
    const spawned = await target.spawn(await workspaceWith(fixture), FIXTURE_ENTRYPOINT, "node");
    if (!spawned.ok) {
      throw spawned.error;
    }
    running.push({ supervisor: target, server: spawned.value });
    return spawned.value;
  }

  it("announces the fixed client identity", () => {
    expect(HANDSHAKE_LINES).to.deep.equal([
      '{"jsonrpc":"2.0","id":0,"method":"initialize","params":{"protocolVersion":"2025-11-25","capabilities":{},"clientInfo":{"name":"stdio-bridge","version":"1.0.0"}}}\n',
      '{"jsonrpc":"2.0","method":"notifications/initialized"}\n',
    ]);
  });

  it("completes the handshake before relaying the first request", async () => {
    const target = supervisor();
    const server = await start(target, "echo-server");
    expect(server.pid).to.be.a("number");

    expect(await target.handshake(server)).to.deep.equal({ ok: true, value: undefined });
    expect(server.ready).to.equal(true);
    expect(await target.send(server, '{"jsonrpc":"2.0","id":7,"method":"tools/list","params":{}}')).to.deep.equal({
      ok: true,
      value: undefined,
    });
    expect(await target.receiveLine(server)).to.deep.equal({
      ok: true,
      value:
        '{"jsonrpc":"2.0","id":7,"result":{"method":"tools/list","params":{},"seen":["initialize","notifications/initialized","tools/list"]}}',
    });
    expect(logger.messages()).to.include.members(["server_spawned", "handshake_completed"]);
  });

  it("performs the handshake only once", async () => {
    const target = supervisor();
    const server = await start(target, "echo-server");
    await target.handshake(server);
    await target.handshake(server);
    await target.send(server, '{"jsonrpc":"2.0","id":1,"method":"ping","params":{}}');
    const line = await target.receiveLine(server);
    expect(line.ok && JSON.parse(line.value).result.seen).to.deep.equal([
      "initialize",
      "notifications/initialized",
      "ping",
    ]);
  });

  it("prepends the dependency target and the workspace to the search path", async () => {
    const dependencyTarget = path.join(root, "deps");
    await mkdir(dependencyTarget);
    const target = supervisor({ dependencyTarget, inheritEnv: { NODE_PATH: "/opt/previous" } });
    const server = await start(target, "echo-server");
    await target.handshake(server);
    await target.send(server, '{"jsonrpc":"2.0","id":2,"method":"env","params":{}}');
    const line = await target.receiveLine(server);

    expect(line.ok).to.equal(true);
    if (line.ok) {
      expect(JSON.parse(line.value).result).to.deep.equal({
        searchPath: [dependencyTarget, server.workspace.path, "/opt/previous"].join(path.delimiter),
        cwd: server.workspace.path,
      });
    }
  });

  it("leaves out a dependency target that does not exist", async () => {
    const target = supervisor({ dependencyTarget: path.join(root, "absent"), inheritEnv: {} });
    const server = await start(target, "echo-server");
    await target.handshake(server);
    await target.send(server, '{"jsonrpc":"2.0","id":3,"method":"env","params":{}}');
    const line = await target.receiveLine(server);
    expect(line.ok && JSON.parse(line.value).result.searchPath).to.equal(server.workspace.path);
  });

  it("refuses a missing entrypoint without spawning", async () => {
    const workspace = await workspaceWith("echo-server");
    const missing = await supervisor().spawn(workspace, "nope.mjs", "node");
    expect(missing.ok).to.equal(false);
    if (!missing.ok) {
      expect(missing.error.kind).to.equal("EntrypointMissing");
      expect(missing.error.message).to.equal("Entrypoint not found: nope.mjs");
    }

    const escaping = await supervisor().spawn(workspace, "../escape.mjs", "node");
    expect(escaping.ok).to.equal(false);
    if (!escaping.ok) {
      expect(escaping.error.kind).to.equal("EntrypointMissing");
      expect(escaping.error.message).to.equal("Entrypoint escapes the workspace: ../escape.mjs");
    }
    expect(spawnSpy.called).to.equal(false);
  });

  it("refuses an unsupported language without spawning", async () => {
    const target = supervisor();
    expect(target.supportsLanguage(" NODE ")).to.equal(true);
    const outcome = await target.spawn(await workspaceWith("echo-server"), FIXTURE_ENTRYPOINT, "python");
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).to.equal("UnsupportedLanguage");
      expect(outcome.error.message).to.equal("Unsupported language: python");
    }
    expect(spawnSpy.called).to.equal(false);
  });

  it("reports a missing interpreter as ProcessExited", async () => {
    const missing = path.join(root, "no-such-node");
    const outcome = await supervisor({ profile: createNodeProfile(missing) }).spawn(
      await workspaceWith("echo-server"),
      FIXTURE_ENTRYPOINT,
      "node",
    );
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).to.equal("ProcessExited");
      expect(outcome.error.message.startsWith(`Unable to start ${missing}: `)).to.equal(true);
    }
    expect(logger.find("server_spawn_failed")?.level).to.equal("error");
  });

  it("fails the handshake of a server that exits on start-up", async () => {
    const target = supervisor();
    const server = await start(target, "exiting-server");
    const outcome = await target.handshake(server);
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).to.equal("HandshakeFailure");
    }
    expect(server.ready).to.equal(false);
  });

  it("describes a crash with its exit code and stderr", async () => {
    const target = supervisor();
    const server = await start(target, "echo-server");
    await target.handshake(server);
    await target.send(server, '{"jsonrpc":"2.0","id":4,"method":"crash","params":{}}');
    const outcome = await target.receiveLine(server, { captureStderr: true });

    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).to.equal("ProcessExited");
      expect(outcome.error.message).to.match(/^Server process crashed with exit code 3/);
      expect(outcome.error.details?.exit_code).to.equal(3);
    }
    expect(target.isAlive(server)).to.equal(false);
  });

  it("kills idempotently and refuses further writes", async () => {
    const target = supervisor();
    const server = await start(target, "echo-server");
    await target.handshake(server);

    await target.kill(server);
    await target.kill(server);
    expect(server.kill()).to.equal(server.kill());
    expect(target.isAlive(server)).to.equal(false);
    expect(logger.entries.filter((entry) => entry.message === "server_killed")).to.have.lengthOf(1);

    const sent = await target.send(server, '{"jsonrpc":"2.0","id":5,"method":"ping","params":{}}');
    expect(sent.ok).to.equal(false);
    if (!sent.ok) {
      expect(sent.error.kind).to.equal("BrokenPipe");
    }
  });

  it("escalates to SIGKILL when SIGTERM is ignored", async () => {
    const target = supervisor({ killGraceMs: 200 });
    const server = await start(target, "stubborn-server");
    await target.handshake(server);
    await target.kill(server);
    expect(server.exit).to.deep.equal({ code: null, signal: "SIGKILL" });
  });
});
