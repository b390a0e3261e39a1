import { describe, it } from "mocha";
import { expect } from "chai";

import { DiagnosticsAggregator } from "../src/orchestrator/diagnostics.js";
import type { Diagnostic } from "../src/protocol/schemas.js";

function diagnostic(code: string): Diagnostic {
  return { severity: "info", code, message: code, location: { file: "/f", offset: 1, length: 2 } };
}

function createAggregator(order: string[] = ["a", "b"]) {
  const emitted: Array<{ file: string; diagnostics: Diagnostic[] }> = [];
  const aggregator = new DiagnosticsAggregator({
    order: () => order,
    emit: (file, diagnostics) => emitted.push({ file, diagnostics }),
  });
  return { aggregator, emitted };
}

describe("DiagnosticsAggregator", () => {
  it("emits only when the union for a file changes", () => {
    const { aggregator, emitted } = createAggregator();

    expect(aggregator.update("a", "/f", [diagnostic("x")])).to.equal(true);
    expect(aggregator.update("a", "/f", [diagnostic("x")])).to.equal(false);

    expect(emitted).to.deep.equal([{ file: "/f", diagnostics: [diagnostic("x")] }]);
    expect(aggregator.lastSent("/f")).to.deep.equal([diagnostic("x")]);
  });

  it("unions contributions in link order", () => {
    const { aggregator, emitted } = createAggregator();

    aggregator.update("b", "/f", [diagnostic("from-b")]);
    aggregator.update("a", "/f", [diagnostic("from-a")]);

    expect(emitted.at(-1)).to.deep.equal({ file: "/f", diagnostics: [diagnostic("from-a"), diagnostic("from-b")] });
  });

  it("appends contributors missing from the order after the ordered ones", () => {
    const { aggregator } = createAggregator(["b"]);

    aggregator.update("z", "/f", [diagnostic("from-z")]);
    aggregator.update("b", "/f", [diagnostic("from-b")]);

    expect(aggregator.merged("/f")).to.deep.equal([diagnostic("from-b"), diagnostic("from-z")]);
  });

  it("treats an unseen file as having no diagnostics", () => {
    const { aggregator, emitted } = createAggregator();

    expect(aggregator.update("a", "/never", [])).to.equal(false);
    expect(emitted).to.deep.equal([]);
    expect(aggregator.lastSent("/never")).to.deep.equal([]);
  });

  it("emits an empty list when a file is cleared", () => {
    const { aggregator, emitted } = createAggregator();
    aggregator.update("a", "/f", [diagnostic("x")]);

    aggregator.update("a", "/f", []);

    expect(emitted.at(-1)).to.deep.equal({ file: "/f", diagnostics: [] });
    expect(aggregator.lastSent("/f")).to.deep.equal([]);
  });

  it("re-publishes the files of a removed contributor", () => {
    const { aggregator, emitted } = createAggregator();
    aggregator.update("a", "/f", [diagnostic("from-a")]);
    aggregator.update("b", "/f", [diagnostic("from-b")]);
    aggregator.update("a", "/g", [diagnostic("only-a")]);
    emitted.length = 0;

    expect(aggregator.remove("a")).to.deep.equal(["/f", "/g"]);
    expect(emitted).to.deep.equal([
      { file: "/f", diagnostics: [diagnostic("from-b")] },
      { file: "/g", diagnostics: [] },
    ]);
    expect(aggregator.remove("a")).to.deep.equal([]);
  });
});
