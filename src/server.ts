#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { resolve as resolvePath } from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { ProtocolBridge } from "./bridge/protocolBridge.js";
import { SessionRegistry } from "./bridge/sessionRegistry.js";
import { StoreDescriptorResolver } from "./descriptors/resolver.js";
import { FileDescriptorStore, HttpDescriptorStore, type DescriptorStore } from "./descriptors/stores.js";
import { createChildProcessGateway, type ChildProcessGateway } from "./gateways/childProcess.js";
import { startHttpServer, type HttpServerHandle } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";
import { ProcessSupervisor } from "./process/supervisor.js";
import { ArchiveProvisioner } from "./provisioning/archiveProvisioner.js";
import { DependencyInstaller } from "./provisioning/dependencies.js";
import { createPythonProfile, type RuntimeProfile } from "./runtimes/profiles.js";
import { parseBridgeRuntimeOptions, type BridgeRuntimeOptions } from "./serverOptions.js";
import { attachWebSocketGateway, type WebSocketGatewayHandle } from "./websocketServer.js";

/** Collaborators the runtime can be built with instead of the defaults. */
export interface BridgeRuntimeOverrides {
  readonly logger?: StructuredLogger;
  readonly profile?: RuntimeProfile;
  readonly gateway?: ChildProcessGateway;
  readonly store?: DescriptorStore;
  readonly fetchImpl?: typeof fetch;
}

export interface BridgeRuntime {
  readonly logger: StructuredLogger;
  readonly bridge: ProtocolBridge;
  readonly registry: SessionRegistry;
}

/** Descriptor store selected by the options: directory first, then HTTP, then `./registry`. */
export function selectDescriptorStore(options: BridgeRuntimeOptions, fetchImpl?: typeof fetch): DescriptorStore {
  if (options.registryDir) {
    return new FileDescriptorStore(options.registryDir);
  }
  if (options.registryUrl) {
    return new HttpDescriptorStore({ baseUrl: options.registryUrl, ...(fetchImpl ? { fetchImpl } : {}) });
  }
  return new FileDescriptorStore(resolvePath(process.cwd(), "registry"));
}

/** Wires resolver, provisioner, supervisor, bridge and registry together. */
export function createBridgeRuntime(options: BridgeRuntimeOptions, overrides: BridgeRuntimeOverrides = {}): BridgeRuntime {
  const logger = overrides.logger ?? new StructuredLogger({ logFile: options.logFile });
  const profile = overrides.profile ?? createPythonProfile(options.runtimeCommand);
  const gateway = overrides.gateway ?? createChildProcessGateway();

  const installer = new DependencyInstaller({
    profile,
    gateway,
    targetDir: options.dependencyTarget,
    timeoutMs: options.installTimeoutMs,
    logger,
  });
  const provisioner = new ArchiveProvisioner({
    workspaceRoot: options.workspaceRoot,
    branch: options.archiveBranch,
    maxArchiveBytes: options.maxArchiveBytes,
    installer,
    logger,
    ...(overrides.fetchImpl ? { fetchImpl: overrides.fetchImpl } : {}),
  });
  const supervisor = new ProcessSupervisor({
    profile,
    gateway,
    dependencyTarget: profile.dependencyManifest ? options.dependencyTarget : null,
    logger,
  });
  const resolver = new StoreDescriptorResolver(overrides.store ?? selectDescriptorStore(options, overrides.fetchImpl), logger);

  const bridge = new ProtocolBridge({
    resolver,
    provisioner,
    supervisor,
    logger,
    singleShotTimeoutMs: options.singleShotTimeoutMs,
  });
  const registry = new SessionRegistry(bridge, logger);
  return { logger, bridge, registry };
}

export interface RunningBridge extends BridgeRuntime {
  readonly http: HttpServerHandle;
  readonly websocket: WebSocketGatewayHandle;
  /** Closes transports, then tears every session down. */
  shutdown(): Promise<void>;
}

/** Starts the HTTP listener and the WebSocket gateway sharing it. */
export async function startBridge(
  options: BridgeRuntimeOptions,
  overrides: BridgeRuntimeOverrides = {},
): Promise<RunningBridge> {
  const runtime = createBridgeRuntime(options, overrides);
  const { logger, bridge, registry } = runtime;
  const http = await startHttpServer(options.http, { bridge, registry, logger });
  const websocket = attachWebSocketGateway(http.server, registry, { path: options.wsPath }, logger);

  logger.info("runtime_started", {
    http_port: http.port,
    ws_path: options.wsPath,
    workspace_root: options.workspaceRoot,
  });

  const shutdown = async (): Promise<void> => {
    const closers: Array<[string, () => Promise<void>]> = [
      ["websocket", () => websocket.close()],
      ["http", () => http.close()],
      ["sessions", () => registry.closeAll()],
    ];
    for (const [name, closer] of closers) {
      try {
        await closer();
      } catch (error) {
        logger.error("transport_close_failed", { transport: name, message: describeError(error) });
      }
    }
    await logger.flush();
  };

  return { ...runtime, http, websocket, shutdown };
}

async function main(): Promise<void> {
  let options: BridgeRuntimeOptions;
  try {
    options = parseBridgeRuntimeOptions(process.argv.slice(2));
  } catch (error) {
    new StructuredLogger().error("cli_options_invalid", { message: describeError(error) });
    process.exit(1);
  }

  const running = await startBridge(options);
  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    running.logger.warn("shutdown_signal", { signal });
    running.shutdown().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

// `npm` links the binary through a symlink; compare real paths.
const entry = process.argv[1];
const isMain = entry ? pathToFileURL(realpathSync(entry)).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    new StructuredLogger().error("runtime_start_failed", { message: describeError(error) });
    process.exit(1);
  });
}
