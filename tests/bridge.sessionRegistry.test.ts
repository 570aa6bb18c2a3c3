import { expect } from "chai";
import { afterEach, beforeEach, describe, it } from "mocha";

import type { ConnectionParams } from "../src/bridge/connectionParams.js";
import { createBridgeHarness, listDirectory, waitFor, type BridgeHarness } from "./helpers/bridgeHarness.js";

const ECHO: ConnectionParams = {
  name: "echo",
  testMode: false,
  repoUrl: undefined,
  entrypoint: "main.py",
  lang: "python",
};

const SILENT: ConnectionParams = { ...ECHO, name: "silent" };

function request(id: number, method = "ping"): string {
  return JSON.stringify({ jsonrpc: "2.0", id, method });
}

function replyId(outcome: { ok: boolean; value?: string | null }): unknown {
  return outcome.ok && typeof outcome.value === "string" ? JSON.parse(outcome.value).id : undefined;
}

describe("session registry", () => {
  let harness: BridgeHarness;

  beforeEach(async () => {
    harness = await createBridgeHarness();
  });

  afterEach(async () => {
    await harness.dispose();
  });

  it("registers an idle session on connect without starting anything", async () => {
    const session = await harness.registry.connect("conn-1", "websocket", ECHO);
    expect(session.state).to.equal("Idle");
    expect(harness.registry.size).to.equal(1);
    expect(harness.registry.get("conn-1")).to.equal(session);
    expect(harness.provisioner.materialized).to.deep.equal([]);
  });

  it("relays concurrent messages one at a time in arrival order", async () => {
    await harness.registry.connect("conn-1", "websocket", ECHO);
    const outcomes = await Promise.all([1, 2, 3].map((id) => harness.registry.dispatch("conn-1", "websocket", ECHO, request(id))));

    expect(outcomes.map(replyId)).to.deep.equal([1, 2, 3]);
    expect(harness.provisioner.materialized).to.have.lengthOf(1);
    expect(harness.registry.get("conn-1")?.state).to.equal("Ready");
  });

  it("refuses messages queued before a disconnect", async () => {
    await harness.registry.connect("conn-1", "websocket", ECHO);
    const queued = harness.registry.dispatch("conn-1", "websocket", ECHO, request(1));
    await harness.registry.disconnect("conn-1");

    const outcome = await queued;
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).to.equal("ProcessExited");
      expect(outcome.error.message).to.equal("Connection conn-1 was closed");
    }
    expect(harness.provisioner.materialized).to.deep.equal([]);
    expect(harness.registry.size).to.equal(0);
  });

  it("tears down a server that never answers the handshake", async () => {
    const pending = harness.registry.dispatch("conn-1", "websocket", SILENT, request(1));
    await waitFor(() => harness.registry.get("conn-1")?.process?.isAlive() === true);
    const session = harness.registry.get("conn-1");
    const server = session?.process;
    expect(session?.state).to.equal("Handshaking");

    const startedAt = Date.now();
    await harness.registry.disconnect("conn-1");
    expect(Date.now() - startedAt).to.be.below(2_000);
    expect(server?.isAlive()).to.equal(false);
    expect(session?.state).to.equal("Closed");
    expect(await listDirectory(harness.workspaceRoot)).to.deep.equal([]);

    expect((await pending).ok).to.equal(false);
    expect(harness.registry.size).to.equal(0);
  });

  it("tears down a session whose server never answers a request", async () => {
    await harness.registry.dispatch("conn-1", "websocket", ECHO, request(1));
    const session = harness.registry.get("conn-1");
    const server = session?.process;
    const pending = harness.registry.dispatch("conn-1", "websocket", ECHO, request(2, "hang"));
    await waitFor(() => session?.state === "Relaying");

    await harness.registry.disconnect("conn-1");
    expect(server?.isAlive()).to.equal(false);
    expect(await listDirectory(harness.workspaceRoot)).to.deep.equal([]);

    const outcome = await pending;
    expect(outcome.ok).to.equal(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).to.equal("ProcessExited");
    }
    expect(harness.registry.size).to.equal(0);
  });

  it("cancels a dependency install when the client disconnects", async () => {
    harness.provisioner.holdInstalls = true;
    const pending = harness.registry.dispatch("conn-1", "websocket", ECHO, request(1));
    await waitFor(() => harness.provisioner.installs.length === 1);

    await harness.registry.disconnect("conn-1");
    await waitFor(() => harness.provisioner.cancelledInstalls.length === 1);
    expect((await pending).ok).to.equal(false);
    expect(harness.logger.messages()).to.not.include("server_spawned");
    expect(await listDirectory(harness.workspaceRoot)).to.deep.equal([]);
  });

  it("starts a fresh session when a disconnected id sends again", async () => {
    await harness.registry.connect("conn-1", "websocket", ECHO);
    await harness.registry.dispatch("conn-1", "websocket", ECHO, request(1));
    const firstSession = harness.registry.get("conn-1");
    const firstProcess = firstSession?.process;
    await harness.registry.disconnect("conn-1");

    expect(firstSession?.state).to.equal("Closed");
    expect(firstProcess?.isAlive()).to.equal(false);
    expect(await listDirectory(harness.workspaceRoot)).to.deep.equal([]);

    const outcome = await harness.registry.dispatch("conn-1", "websocket", ECHO, request(9));
    expect(replyId(outcome)).to.equal(9);
    const secondSession = harness.registry.get("conn-1");
    expect(secondSession).to.not.equal(firstSession);
    expect(secondSession?.transitions).to.deep.equal(["Idle", "Provisioning", "Handshaking", "Ready", "Relaying", "Ready"]);
    const [first, second] = harness.provisioner.materialized;
    expect(harness.provisioner.materialized).to.have.lengthOf(2);
    expect(first?.root).to.not.equal(second?.root);
    expect(await listDirectory(harness.workspaceRoot)).to.have.lengthOf(1);
  });

  it("drops a failed session and recovers on the next message", async () => {
    await harness.registry.connect("conn-1", "websocket", ECHO);
    await harness.registry.dispatch("conn-1", "websocket", ECHO, request(1));
    const crashed = await harness.registry.dispatch("conn-1", "websocket", ECHO, request(2, "crash"));
    expect(crashed.ok).to.equal(false);
    expect(harness.registry.size).to.equal(0);

    const recovered = await harness.registry.dispatch("conn-1", "websocket", ECHO, request(3));
    expect(replyId(recovered)).to.equal(3);
    expect(harness.provisioner.materialized).to.have.lengthOf(2);
    expect(harness.registry.size).to.equal(1);
  });

  it("closes every session and refuses later messages", async () => {
    await Promise.all([
      harness.registry.dispatch("conn-1", "websocket", ECHO, request(1)),
      harness.registry.dispatch("conn-2", "websocket", ECHO, request(1)),
    ]);
    expect(harness.registry.size).to.equal(2);
    await harness.registry.closeAll();
    expect(harness.registry.size).to.equal(0);
    expect(await listDirectory(harness.workspaceRoot)).to.deep.equal([]);

    const late = await harness.registry.dispatch("conn-3", "websocket", ECHO, request(1));
    expect(late.ok).to.equal(false);
    expect(harness.provisioner.materialized).to.have.lengthOf(2);
  });

  it("ignores a disconnect for an unknown key", async () => {
    await harness.registry.disconnect("nobody");
    expect(harness.registry.size).to.equal(0);
  });
});
