import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { createManifestResolver, describeEntries, ManifestError } from "../src/children/manifest.js";

function withWorkspace(run: (directory: string) => void): void {
  const directory = mkdtempSync(path.join(tmpdir(), "pluginplex-manifest-"));
  try {
    run(directory);
  } finally {
    rmSync(directory, { recursive: true, force: true });
  }
}

describe("children/manifest", () => {
  it("describes every plugin declared at the top of the root", () => {
    withWorkspace((directory) => {
      mkdirSync(path.join(directory, "tools", "lint"), { recursive: true });
      writeFileSync(
        path.join(directory, "pluginplex.json"),
        JSON.stringify({
          plugins: [
            { name: "lint", command: "node", args: ["main.js"], cwd: "tools/lint", env: { LINT_LEVEL: "strict" } },
            { name: "metrics", command: "metrics-plugin" },
          ],
        }),
      );

      const resolve = createManifestResolver();
      const children = resolve({ root: directory, exclude: [] });

      expect(children).to.deep.equal([
        {
          identity: `lint@${path.join(directory, "tools", "lint")}`,
          name: "lint",
          launch: {
            command: "node",
            args: ["main.js"],
            cwd: path.join(directory, "tools", "lint"),
            env: { LINT_LEVEL: "strict" },
          },
        },
        {
          identity: `metrics@${directory}`,
          name: "metrics",
          launch: { command: "metrics-plugin", args: [], cwd: directory, env: {} },
        },
      ]);
    });
  });

  it("treats a root without manifest as having no plugin", () => {
    withWorkspace((directory) => {
      expect(createManifestResolver()({ root: directory, exclude: [] })).to.deep.equal([]);
    });
  });

  it("honours a custom manifest name", () => {
    withWorkspace((directory) => {
      writeFileSync(path.join(directory, "plugins.json"), JSON.stringify({ plugins: [{ name: "a", command: "a" }] }));
      const children = createManifestResolver({ fileName: "plugins.json" })({ root: directory, exclude: [] });
      expect(children.map((child) => child.name)).to.deep.equal(["a"]);
    });
  });

  it("raises a ManifestError naming the offending field", () => {
    const resolve = createManifestResolver({
      readFile: () => JSON.stringify({ plugins: [{ name: "", command: "x" }] }),
    });

    expect(() => resolve({ root: "/work", exclude: [] })).to.throw(
      ManifestError,
      "invalid plugin manifest /work/pluginplex.json: plugins.0.name: plugin name must not be empty",
    );
  });

  it("raises a ManifestError on malformed JSON", () => {
    const resolve = createManifestResolver({ readFile: () => "{ plugins" });
    expect(() => resolve({ root: "/work", exclude: [] })).to.throw(
      ManifestError,
      "invalid plugin manifest /work/pluginplex.json: not valid JSON",
    );
  });

  it("derives the same identity for the same plugin directory from different roots", () => {
    const [fromA] = describeEntries("/work/a", [{ name: "shared", command: "x", args: [], cwd: "../tools", env: {} }]);
    const [fromB] = describeEntries("/work/b", [{ name: "shared", command: "x", args: [], cwd: "../tools", env: {} }]);
    expect(fromA.identity).to.equal("shared@/work/tools");
    expect(fromB.identity).to.equal(fromA.identity);
  });
});
