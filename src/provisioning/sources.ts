import { fail, succeed, type Outcome } from "../bridge/errors.js";

/** Hosts whose repositories can be downloaded as branch archives. */
const SUPPORTED_HOSTS = new Set(["github.com", "www.github.com"]);

/**
 * Computes the zip archive URL of {@link branch} for a repository location.
 * Only GitHub locations are recognised; anything else is `UnsupportedSource`.
 */
export function archiveUrlFor(repositoryLocation: string, branch: string): Outcome<string> {
  let parsed: URL;
  try {
    parsed = new URL(repositoryLocation);
  } catch {
    return fail("UnsupportedSource", `Repository location is not a URL: ${repositoryLocation}`);
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    return fail("UnsupportedSource", `Unsupported repository scheme: ${parsed.protocol}`);
  }
  if (!SUPPORTED_HOSTS.has(parsed.hostname.toLowerCase())) {
    return fail("UnsupportedSource", `Unsupported repository host: ${parsed.hostname}`, {
      repositoryLocation,
    });
  }

  let base = repositoryLocation.trim();
  while (base.endsWith("/")) {
    base = base.slice(0, -1);
  }
  if (base.endsWith(".git")) {
    base = base.slice(0, -".git".length);
  }
  return succeed(`${base}/archive/refs/heads/${encodeURIComponent(branch)}.zip`);
}
