import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { PluginHub } from "../src/orchestrator/hub.js";
import type { HubRuntimeOptions } from "../src/serverOptions.js";
import { waitFor } from "./helpers/async.js";
import { FakeChild, FakeConnector, tableResolver } from "./helpers/fakeChild.js";
import { HostClient } from "./helpers/hostClient.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const RUNTIME: HubRuntimeOptions = {
  logFile: null,
  requestTimeoutMs: 500,
  handshakeTimeoutMs: 500,
  pluginVersions: { min: "0.0.1", max: "2.0.0" },
  minHostVersion: "1.0.0",
  manifestFile: "pluginplex.json",
};

const TABLE = { "/work/a": ["alpha", "beta"], "/work/b": ["gamma"] };

function diagnostic(code: string, file: string) {
  return { severity: "warning", code, message: code, location: { file, offset: 2, length: 3 } };
}

describe("PluginHub end to end", () => {
  const hubs: PluginHub[] = [];

  afterEach(async () => {
    await Promise.all(hubs.splice(0).map((hub) => hub.dispose()));
  });

  async function startHub(connector = new FakeConnector(), table: Record<string, readonly string[]> = TABLE) {
    const logger = new RecordingLogger();
    const resolver = tableResolver(table);
    const hub = new PluginHub({ logger, runtime: RUNTIME, connector, resolver });
    hubs.push(hub);
    const host = await HostClient.connect(hub);
    return { hub, host, connector, logger, resolver };
  }

  it("starts the plugins of the workspace roots", async () => {
    const { hub, host, connector } = await startHub();

    expect(await host.request("roots/set", { roots: [{ root: "/work/a" }] })).to.deep.equal({ result: {} });
    await hub.whenIdle();

    expect(connector.connects).to.deep.equal(["alpha@/plugins/alpha", "beta@/plugins/beta"]);
    expect(hub.lifecycle.readyLinks().map((link) => link.name)).to.deep.equal(["alpha", "beta"]);
    expect(connector.child("alpha").received[1]).to.deep.equal({
      method: "roots/set",
      params: { roots: [{ root: "/work/a", exclude: [] }] },
    });
  });

  it("merges diagnostics requested by the host", async () => {
    const connector = new FakeConnector((d) =>
      new FakeChild(d).on("diagnostics/get", () => ({
        diagnostics: [{ file: "/work/a/main.src", diagnostics: [diagnostic(d.name, "/work/a/main.src")] }],
      })),
    );
    const { hub, host } = await startHub(connector);
    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();

    const response = await host.request("diagnostics/get", { files: ["/work/a/main.src"] });

    expect(response).to.deep.equal({
      result: {
        diagnostics: [
          {
            file: "/work/a/main.src",
            diagnostics: [diagnostic("alpha", "/work/a/main.src"), diagnostic("beta", "/work/a/main.src")],
          },
        ],
      },
    });
  });

  it("forwards pushed diagnostics once per change", async () => {
    const { hub, host, connector } = await startHub();
    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();
    const alpha = connector.child("alpha");

    await alpha.notify("diagnostics/changed", { file: "/work/a/x.src", diagnostics: [diagnostic("one", "/work/a/x.src")] });
    await alpha.notify("diagnostics/changed", { file: "/work/a/x.src", diagnostics: [diagnostic("one", "/work/a/x.src")] });
    await alpha.notify("log/print", { message: "marker" });
    await waitFor(() => host.received("log/print").length === 1, "marker print");

    expect(host.received("diagnostics/changed")).to.deep.equal([
      { file: "/work/a/x.src", diagnostics: [diagnostic("one", "/work/a/x.src")] },
    ]);
    expect(host.received("log/print")).to.deep.equal([{ message: "[alpha] marker" }]);
  });

  it("rejects malformed params with -32602", async () => {
    const { host } = await startHub();

    const response = await host.request("fixes/get", { file: "/work/a/x.src" });

    expect(response.error?.code).to.equal(-32602);
    expect(response.error?.message).to.equal("Invalid params for fixes/get");
  });

  it("rejects unknown methods with -32601", async () => {
    const { host } = await startHub();

    const response = await host.request("workspace/explode", {});

    expect(response.error?.code).to.equal(-32601);
    expect(response.error?.message).to.equal("Method not found: workspace/explode");
  });

  it("keeps plugins running when the same roots are sent again", async () => {
    const { hub, host, connector, resolver } = await startHub();
    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();

    await host.request("roots/set", { roots: [{ root: "/work/a", exclude: [] }] });
    await hub.whenIdle();

    expect(connector.connects).to.have.length(2);
    expect(resolver.calls).to.deep.equal(["/work/a"]);
  });

  it("answers with the other plugins when one of them fails", async () => {
    const connector = new FakeConnector((d) =>
      new FakeChild(d).on("fixes/get", () => {
        if (d.name === "beta") {
          throw new Error("boom");
        }
        return { fixes: [{ title: "Add import" }] };
      }),
    );
    const { hub, host } = await startHub(connector);
    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();

    const response = await host.request("fixes/get", { file: "/work/a/x.src", offset: 4 });
    await waitFor(() => host.received("plugin/error").length === 1, "plugin error");

    expect(response).to.deep.equal({ result: { fixes: [{ title: "Add import" }] } });
    expect(host.received("plugin/error")[0]).to.include({
      identity: "beta@/plugins/beta",
      name: "beta",
      isFatal: false,
      message: "fixes/get failed: boom",
    });
  });

  it("reports plugins that fail their handshake", async () => {
    const connector = new FakeConnector((d) => new FakeChild(d, d.name === "gamma" ? "9.0.0" : "1.0.0"));
    const { hub, host } = await startHub(connector);

    await host.request("roots/set", { roots: [{ root: "/work/b" }] });
    await hub.whenIdle();
    await waitFor(() => host.received("plugin/error").length === 1, "handshake failure");

    expect(host.received("plugin/error")[0]).to.include({
      identity: "gamma@/plugins/gamma",
      name: "gamma",
      isFatal: false,
      message: "gamma 9.0.0 is outside the supported plugin versions (0.0.1 - 2.0.0)",
    });
    expect(hub.lifecycle.readyLinks()).to.deep.equal([]);
  });

  it("stops removed plugins and withdraws their diagnostics", async () => {
    const { hub, host, connector } = await startHub();
    await host.request("roots/set", { roots: [{ root: "/work/a" }, { root: "/work/b" }] });
    await hub.whenIdle();
    await connector.child("gamma").notify("diagnostics/changed", {
      file: "/work/b/y.src",
      diagnostics: [diagnostic("stale", "/work/b/y.src")],
    });
    await waitFor(() => host.received("diagnostics/changed").length === 1, "gamma diagnostics");

    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();
    await waitFor(() => host.received("diagnostics/changed").length === 2, "withdrawn diagnostics");

    expect(host.received("diagnostics/changed")[1]).to.deep.equal({ file: "/work/b/y.src", diagnostics: [] });
    expect(connector.child("gamma").closed).to.equal(true);
    expect(hub.lifecycle.links().map((link) => link.name)).to.deep.equal(["alpha", "beta"]);
  });

  it("forwards shutdown, answers it and then closes everything", async () => {
    const { hub, host, connector } = await startHub();
    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();

    expect(await host.request("shutdown")).to.deep.equal({ result: {} });
    await hub.whenClosed();

    expect(connector.child("alpha").methods().at(-1)).to.equal("shutdown");
    expect(connector.child("alpha").closed).to.equal(true);
    expect(connector.child("beta").closed).to.equal(true);
    expect(host.closed).to.equal(true);
    expect(hub.isDisposed).to.equal(true);
  });

  it("disposes itself when the host goes away", async () => {
    const { hub, host, connector } = await startHub();
    await host.request("roots/set", { roots: [{ root: "/work/b" }] });
    await hub.whenIdle();

    await host.close();
    await hub.whenClosed();

    expect(connector.child("gamma").closed).to.equal(true);
    expect(hub.lifecycle.links()).to.deep.equal([]);
  });

  it("adds a plugin without disturbing the running one and isolates its failure", async () => {
    const connector = new FakeConnector((d) =>
      new FakeChild(d, d.name === "second" ? "9.0.0" : "1.0.0").on("fixes/get", () => ({ fixes: [{ from: d.name }] })),
    );
    const { hub, host } = await startHub(connector, { "/r1": ["first"], "/r2": ["second"] });

    await host.request("roots/set", { roots: [{ root: "/r1" }] });
    await hub.whenIdle();
    const first = hub.lifecycle.get("first@/plugins/first");
    expect(first?.isReady).to.equal(true);

    await host.request("roots/set", { roots: [{ root: "/r1" }, { root: "/r2" }] });
    await hub.whenIdle();
    await waitFor(() => host.received("plugin/error").length === 1, "second plugin failure");

    expect(hub.lifecycle.get("first@/plugins/first")).to.equal(first);
    expect(connector.child("first").methods().filter((method) => method === "version/check")).to.have.length(1);
    expect(connector.connects).to.deep.equal(["first@/plugins/first", "second@/plugins/second"]);

    const response = await host.request("fixes/get", { file: "/r1/main.src", offset: 0 });

    expect(response).to.deep.equal({ result: { fixes: [{ from: "first" }] } });
    expect(connector.child("second").methods()).to.deep.equal(["version/check"]);
    expect(host.received("plugin/error")).to.have.length(1);
    expect(host.received("plugin/error")[0]).to.include({ name: "second", isFatal: false });
  });

  it("handshakes again with a failed plugin that leaves and re-enters the workspace", async () => {
    let attempts = 0;
    const connector = new FakeConnector((d) => {
      if (d.name !== "second") {
        return new FakeChild(d);
      }
      attempts += 1;
      return new FakeChild(d, attempts === 1 ? "9.0.0" : "1.0.0");
    });
    const { hub, host } = await startHub(connector, { "/r1": ["first"], "/r2": ["second"] });

    await host.request("roots/set", { roots: [{ root: "/r1" }, { root: "/r2" }] });
    await hub.whenIdle();
    const failed = hub.lifecycle.get("second@/plugins/second");
    await host.request("roots/set", { roots: [{ root: "/r1" }] });
    await hub.whenIdle();
    await host.request("roots/set", { roots: [{ root: "/r1" }, { root: "/r2" }] });
    await hub.whenIdle();

    const second = hub.lifecycle.get("second@/plugins/second");
    expect(failed?.status.state).to.equal("failed");
    expect(second).to.not.equal(failed);
    expect(second?.isReady).to.equal(true);
    expect(connector.connects.filter((identity) => identity === "second@/plugins/second")).to.have.length(2);
    expect(connector.child("second").methods()).to.deep.equal(["version/check", "roots/set"]);
  });

  it("sends a file's diagnostics again only when their content changes", async () => {
    const { hub, host, connector } = await startHub();
    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();
    const alpha = connector.child("alpha");
    const err1 = diagnostic("err1", "/work/a/x.src");
    const err2 = diagnostic("err2", "/work/a/x.src");

    await alpha.notify("diagnostics/changed", { file: "/work/a/x.src", diagnostics: [err1] });
    await alpha.notify("diagnostics/changed", { file: "/work/a/x.src", diagnostics: [err1, err2] });
    await alpha.notify("diagnostics/changed", { file: "/work/a/x.src", diagnostics: [err1, err2] });
    await alpha.notify("log/print", { message: "marker" });
    await waitFor(() => host.received("log/print").length === 1, "marker print");

    expect(host.received("diagnostics/changed")).to.deep.equal([
      { file: "/work/a/x.src", diagnostics: [err1] },
      { file: "/work/a/x.src", diagnostics: [err1, err2] },
    ]);
  });

  it("answers with the first and third plugins when the second fails", async () => {
    const connector = new FakeConnector((d) =>
      new FakeChild(d).on("fixes/get", () => {
        if (d.name === "b") {
          throw new Error("rule crashed");
        }
        return { fixes: [{ from: d.name }] };
      }),
    );
    const { hub, host } = await startHub(connector, { "/work/c": ["a", "b", "c"] });
    await host.request("roots/set", { roots: [{ root: "/work/c" }] });
    await hub.whenIdle();

    const response = await host.request("fixes/get", { file: "/work/c/main.src", offset: 1 });
    await waitFor(() => host.received("plugin/error").length === 1, "plugin error");

    expect(response).to.deep.equal({ result: { fixes: [{ from: "a" }, { from: "c" }] } });
    expect(host.received("plugin/error")[0]).to.include({ name: "b", message: "fixes/get failed: rule crashed" });
  });

  it("delivers priority files and subscriptions sent while a plugin is still handshaking", async () => {
    const connector = new FakeConnector((d) =>
      new FakeChild(d).on("version/check", async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return { name: d.name, version: "1.0.0" };
      }),
    );
    const { hub, host } = await startHub(connector, { "/work/a": ["alpha"] });

    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await host.request("priorityFiles/set", { files: ["/work/a/open.src"] });
    await host.request("subscriptions/set", { subscriptions: { OUTLINE: ["/work/a/open.src"] } });
    await hub.whenIdle();

    expect(hub.lifecycle.readyLinks()).to.have.length(1);
    expect(connector.child("alpha").received.slice(2)).to.deep.equal([
      { method: "priorityFiles/set", params: { files: ["/work/a/open.src"] } },
      { method: "subscriptions/set", params: { subscriptions: { OUTLINE: ["/work/a/open.src"] } } },
    ]);
  });

  it("routes a kythe entries request to every plugin", async () => {
    const { hub, host, connector } = await startHub();
    await host.request("roots/set", { roots: [{ root: "/work/a" }] });
    await hub.whenIdle();

    const response = await host.request("kytheEntries/get", { file: "/work/a/main.src" });

    expect(response).to.deep.equal({ result: {} });
    expect(connector.child("beta").received.at(-1)).to.deep.equal({
      method: "kytheEntries/get",
      params: { file: "/work/a/main.src" },
    });
  });
});
