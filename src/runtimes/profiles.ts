/**
 * Describes how the bridge drives the single interpreted runtime a session
 * may use: which command launches an entrypoint, which variable carries the
 * module search path and how a dependency manifest is installed.
 */
export interface RuntimeProfile {
  /** Language tag matched (case-insensitively) against descriptors. */
  readonly language: string;
  /** Interpreter executable. */
  readonly command: string;
  /** Arguments launching {@link entrypoint} (an absolute path). */
  buildArgs(entrypoint: string): string[];
  /** Environment variable holding the module search path, if the runtime has one. */
  readonly searchPathVariable: string;
  /** Manifest file name looked up at the workspace root. */
  readonly dependencyManifest: string | null;
  /** Installer arguments (run with {@link command}) or `null` when unsupported. */
  installArgs(manifest: string, target: string): string[] | null;
}

export function createPythonProfile(command = "python3"): RuntimeProfile {
  return {
    language: "python",
    command,
    buildArgs: (entrypoint) => [entrypoint],
    searchPathVariable: "PYTHONPATH",
    dependencyManifest: "requirements.txt",
    installArgs: (manifest, target) => ["-m", "pip", "install", "-r", manifest, "--target", target, "--upgrade"],
  };
}

/**
 * Profile running JavaScript entrypoints with the current Node.js binary.
 * Used by the test-suite so it does not depend on a Python installation.
 */
export function createNodeProfile(command = process.execPath): RuntimeProfile {
  return {
    language: "node",
    command,
    buildArgs: (entrypoint) => [entrypoint],
    searchPathVariable: "NODE_PATH",
    dependencyManifest: null,
    installArgs: () => null,
  };
}

/** Case-insensitive comparison between a descriptor language and a profile. */
export function matchesLanguage(profile: RuntimeProfile, language: string): boolean {
  return profile.language.toLowerCase() === language.trim().toLowerCase();
}
