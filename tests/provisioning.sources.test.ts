import { expect } from "chai";
import { describe, it } from "mocha";

import { archiveUrlFor } from "../src/provisioning/sources.js";

describe("repository sources", () => {
  it("builds the branch archive URL of a GitHub repository", () => {
    expect(archiveUrlFor("https://github.com/example/weather-mcp", "main")).to.deep.equal({
      ok: true,
      value: "https://github.com/example/weather-mcp/archive/refs/heads/main.zip",
    });
  });

  it("strips trailing slashes and the .git suffix", () => {
    const outcome = archiveUrlFor("https://github.com/example/weather-mcp.git/", "release/v1");
    expect(outcome.ok && outcome.value).to.equal(
      "https://github.com/example/weather-mcp/archive/refs/heads/release%2Fv1.zip",
    );
  });

  it("rejects other hosts, schemes and non-URLs", () => {
    for (const location of ["https://gitlab.com/example/demo", "ftp://github.com/example/demo", "example/demo"]) {
      const outcome = archiveUrlFor(location, "main");
      expect(outcome.ok, location).to.equal(false);
      if (!outcome.ok) {
        expect(outcome.error.kind).to.equal("UnsupportedSource");
      }
    }
  });
});
