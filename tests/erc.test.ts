import { describe, expect, it } from "vitest";
import { DEVICE_KINDS, deviceSpec } from "../src/catalog.js";
import { describeViolations, runErc, type ErcRunOptions } from "../src/erc.js";
import { catalog, graphOf } from "./helpers.js";

const NM1_FULL = "NM1->M_G->NET1->M_D->VOUT->M_S->VSS->M_B->VSS->";
const NM2_FULL = "NM2->M_G->NET1->M_D->VOUT->M_S->VSS->M_B->VSS";

function erc(text: string, options?: Partial<ErcRunOptions>) {
  return runErc(graphOf(text), catalog, { minFanin: 2, faninCount: "pins", shortCircuit: false, ...options });
}

describe("runErc scenarios", () => {
  it("fails Rule 4 for an internal net touched once", () => {
    const v = erc(NM1_FULL);
    expect([v.rule1.status, v.rule2.status, v.rule3.status, v.rule4.status]).toEqual(["pass", "pass", "pass", "fail"]);
    expect(v.rule4.violations).toEqual([{ net: "NET1", incidences: 1 }]);
    expect(v.passed).toBe(false);
    expect(describeViolations(v)).toEqual(["Internal net NET1 has only 1 connection"]);
  });

  it("passes once a second device shares the net", () => {
    const v = erc(NM1_FULL + NM2_FULL);
    expect(v.passed).toBe(true);
    expect(describeViolations(v)).toEqual([]);
  });

  it("lists missing pins in catalog order", () => {
    const v = erc("NM1->M_G->NET1->M_D->VOUT->");
    expect(v.rule2.violations).toEqual([{ device: "NM1", kind: "MOSFET", missing: ["S", "B"] }]);
    expect(describeViolations(v)[0]).toBe("Device NM1 missing required pins: S, B");
  });

  it("reports a pin bound to two nets with the nets in first-seen order", () => {
    const v = erc("NM1->M_G->NET1->M_G->NET2->M_D->VOUT->M_S->VSS->M_B->VSS->");
    expect(v.rule3.status).toBe("fail");
    expect(v.rule3.violations).toEqual([{ device: "NM1", pin: "G", nets: ["NET1", "NET2"] }]);
    expect(describeViolations(v)).toContain("Device NM1 pin G connected to multiple nets: NET1, NET2");
  });

  it("flags devices without any binding under Rule 1", () => {
    const v = erc("NM1->NM2->M_G->VDD->M_D->VDD->M_S->VSS->M_B->VSS");
    expect(v.rule1.violations).toEqual([{ device: "NM1", kind: "MOSFET" }]);
    expect(describeViolations(v)[0]).toBe("Device NM1 (MOSFET) has no pin connections");
  });
});

describe("runErc properties", () => {
  it("gives the same verdict on repeated runs", () => {
    const text = "NM1->M_G->NET1->M_G->NET2->M_D->VOUT->";
    expect(erc(text)).toEqual(erc(text));
    const g = graphOf(text);
    expect(runErc(g, catalog)).toEqual(runErc(g, catalog));
  });

  it("checks required pins for every device kind regardless of order", () => {
    for (const kind of DEVICE_KINDS) {
      const spec = deviceSpec(catalog, kind);
      const device = `${spec.prefixes[0]}1`;
      const edges = (pins: readonly string[]) => pins.map((p) => `${spec.edgePrefix}_${p}->VDD`).join("->");
      expect(erc(`${device}->${edges([...spec.pins].reverse())}`).rule2.status).toBe("pass");
      for (const dropped of spec.pins) {
        const v = erc(`${device}->${edges(spec.pins.filter((p) => p !== dropped))}`);
        expect(v.rule2.violations).toEqual([{ device, kind, missing: [dropped] }]);
      }
    }
  });

  it("flags a third net on a passive's unordered terminals under Rule 3", () => {
    const v = erc("R1->R_C->NET1->R_C->NET2->R_C->NET3");
    expect(v.rule3.status).toBe("fail");
    expect(v.rule3.violations).toEqual([{ device: "R1", pin: "P2", nets: ["NET2", "NET3"] }]);
  });

  it("allows a pin bound twice to the same net", () => {
    expect(erc("NM1->M_G->NET1->M_G->NET1").rule3.status).toBe("pass");
    expect(erc("NM1->M_G->NET1").rule3.status).toBe("pass");
  });

  it("needs two incidences on an internal net", () => {
    expect(erc("NM1->M_G->NET1").rule4.violations).toEqual([{ net: "NET1", incidences: 1 }]);
    expect(erc("NM1->M_D->NET1->M_G->NET1").rule4.status).toBe("pass");
    expect(erc("NM1->M_G->NET1->NM2->M_G->NET1").rule4.status).toBe("pass");
  });

  it("counts distinct devices when asked to", () => {
    const v = erc("NM1->M_D->NET1->M_G->NET1", { faninCount: "devices" });
    expect(v.rule4.violations).toEqual([{ net: "NET1", incidences: 1 }]);
  });

  it("exempts external nets from fan-in", () => {
    for (const net of ["VDD", "VSS", "0", "VIN3", "IREF"]) {
      expect(erc(`NM1->M_G->${net}`).rule4.status).toBe("pass");
    }
  });

  it("skips the remaining rules after the first failure when short-circuiting", () => {
    const v = erc("NM1->M_G->NET1->M_D->VOUT->", { shortCircuit: true });
    expect([v.rule1.status, v.rule2.status, v.rule3.status, v.rule4.status]).toEqual(["pass", "fail", "skipped", "skipped"]);
    expect(v.passed).toBe(false);
    expect(describeViolations(v)).toEqual(["Device NM1 missing required pins: S, B"]);
  });
});
