import { tmpdir } from "node:os";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { readInt, readOptionalString, readString } from "./config/env.js";
import { DEFAULT_SINGLE_SHOT_TIMEOUT_MS } from "./bridge/protocolBridge.js";
import { DEFAULT_ARCHIVE_BRANCH, DEFAULT_MAX_ARCHIVE_BYTES } from "./provisioning/archiveProvisioner.js";
import { DEFAULT_INSTALL_TIMEOUT_MS } from "./provisioning/dependencies.js";

/** Runtime configuration of the bridge, resolved from flags then environment. */
export interface BridgeRuntimeOptions {
  http: {
    host: string;
    port: number;
  };
  /** Path accepting WebSocket upgrades. */
  wsPath: string;
  /** Descriptor directory; takes precedence over {@link registryUrl}. */
  registryDir: string | null;
  /** Base URL of an HTTP descriptor store. */
  registryUrl: string | null;
  workspaceRoot: string;
  dependencyTarget: string;
  runtimeCommand: string;
  singleShotTimeoutMs: number;
  installTimeoutMs: number;
  archiveBranch: string;
  maxArchiveBytes: number;
  logFile: string | null;
}

const FLAG_WITH_VALUE = new Set([
  "--http-host",
  "--http-port",
  "--ws-path",
  "--registry-dir",
  "--registry-url",
  "--workspace-root",
  "--deps-target",
  "--runtime-command",
  "--timeout-ms",
  "--install-timeout-ms",
  "--archive-branch",
  "--log-file",
]);

/** Raised when a command-line flag is malformed. */
export class OptionParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionParseError";
  }
}

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new OptionParseError(`The value ${value} for ${flag} must be a positive integer.`);
  }
  return num;
}

function parsePort(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0 || num > 65_535) {
    throw new OptionParseError(`The value ${value} for ${flag} must be a port between 0 and 65535.`);
  }
  return num;
}

function requireText(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new OptionParseError(`The flag ${flag} cannot be empty.`);
  }
  return trimmed;
}

/** Defaults read from the `BRIDGE_*` environment variables. */
export function readEnvironmentDefaults(): BridgeRuntimeOptions {
  return {
    http: {
      host: readString("BRIDGE_HTTP_HOST", "0.0.0.0"),
      port: readInt("BRIDGE_HTTP_PORT", 8080, { min: 0, max: 65_535 }),
    },
    wsPath: readString("BRIDGE_WS_PATH", "/ws"),
    registryDir: readOptionalString("BRIDGE_REGISTRY_DIR") ?? null,
    registryUrl: readOptionalString("BRIDGE_REGISTRY_URL") ?? null,
    workspaceRoot: readString("BRIDGE_WORKSPACE_ROOT", tmpdir()),
    dependencyTarget: readString("BRIDGE_DEPS_TARGET", path.join(tmpdir(), "pip_modules")),
    runtimeCommand: readString("BRIDGE_RUNTIME_COMMAND", "python3"),
    singleShotTimeoutMs: readInt("BRIDGE_SINGLE_SHOT_TIMEOUT_MS", DEFAULT_SINGLE_SHOT_TIMEOUT_MS, { min: 1 }),
    installTimeoutMs: readInt("BRIDGE_INSTALL_TIMEOUT_MS", DEFAULT_INSTALL_TIMEOUT_MS, { min: 1 }),
    archiveBranch: readString("BRIDGE_ARCHIVE_BRANCH", DEFAULT_ARCHIVE_BRANCH),
    maxArchiveBytes: readInt("BRIDGE_MAX_ARCHIVE_BYTES", DEFAULT_MAX_ARCHIVE_BYTES, { min: 1 }),
    logFile: readOptionalString("BRIDGE_LOG_FILE") ?? null,
  };
}

/**
 * Parses `process.argv.slice(2)`. Flags override the environment defaults;
 * unknown flags and positional arguments are ignored.
 */
export function parseBridgeRuntimeOptions(
  argv: readonly string[],
  defaults: BridgeRuntimeOptions = readEnvironmentDefaults(),
): BridgeRuntimeOptions {
  const options: BridgeRuntimeOptions = { ...defaults, http: { ...defaults.http } };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new OptionParseError(`The flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }
    const text = value ?? "";

    switch (flag) {
      case "--http-host":
        options.http.host = requireText(text, flag);
        break;
      case "--http-port":
        options.http.port = parsePort(text, flag);
        break;
      case "--ws-path": {
        const wsPath = requireText(text, flag);
        options.wsPath = wsPath.startsWith("/") ? wsPath : `/${wsPath}`;
        break;
      }
      case "--registry-dir":
        options.registryDir = requireText(text, flag);
        break;
      case "--registry-url":
        options.registryUrl = requireText(text, flag);
        break;
      case "--workspace-root":
        options.workspaceRoot = requireText(text, flag);
        break;
      case "--deps-target":
        options.dependencyTarget = requireText(text, flag);
        break;
      case "--runtime-command":
        options.runtimeCommand = requireText(text, flag);
        break;
      case "--timeout-ms":
        options.singleShotTimeoutMs = parsePositiveInteger(text, flag);
        break;
      case "--install-timeout-ms":
        options.installTimeoutMs = parsePositiveInteger(text, flag);
        break;
      case "--archive-branch":
        options.archiveBranch = requireText(text, flag);
        break;
      case "--log-file":
        options.logFile = requireText(text, flag);
        break;
      default:
        break;
    }
  }

  return options;
}
